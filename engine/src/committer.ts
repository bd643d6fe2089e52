/**
 * Commits pending store changes under a forced change description
 */

import type { ChangeCommitter, RevertChangeInfo } from "./types.js";
import { formatChangeInfo } from "./change-info.js";

/**
 * The part of the git backend the committer writes through
 */
export interface CommitTarget {
  stageAll(): void;
  commit(message: string): void;
}

export class Committer implements ChangeCommitter {
  private forcedChangeInfo: RevertChangeInfo | null = null;

  constructor(private readonly repository: CommitTarget) {}

  /**
   * Use this description for the next commit
   */
  forceChangeInfo(changeInfo: RevertChangeInfo): void {
    this.forcedChangeInfo = changeInfo;
  }

  commit(): void {
    const changeInfo = this.forcedChangeInfo;
    if (!changeInfo) {
      throw new Error("Cannot commit without a change description");
    }

    this.repository.stageAll();
    this.repository.commit(formatChangeInfo(changeInfo));
    this.forcedChangeInfo = null;
  }
}
