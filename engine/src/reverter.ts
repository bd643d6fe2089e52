/**
 * Revert orchestration
 *
 * A single-commit revert is applied speculatively, validated against the
 * reference declarations of every entity the reverted commit touched, and
 * only then committed. Nothing is committed or synchronized when a revert
 * is rejected.
 */

import {
  RevertStatus,
  type ChangeCommitter,
  type ChangeInfo,
  type ChangeInfoParser,
  type PostChangeDateUpdater,
  type RevertChangeInfo,
  type Synchronizer,
  type VersionControl,
} from "./types.js";
import { buildChangeInfo, getEntityChanges } from "./change-info.js";
import { detectEntitiesToSynchronize, getAffectedPosts } from "./change-set.js";
import type { ReferenceChecker } from "./reference-checker.js";

export interface ReverterDependencies {
  repository: VersionControl;
  committer: ChangeCommitter;
  referenceChecker: ReferenceChecker;
  synchronizer: Synchronizer;
  postUpdater: PostChangeDateUpdater;
  changeInfoParser?: ChangeInfoParser;
  verbose?: boolean;
}

export class Reverter {
  private readonly repository: VersionControl;
  private readonly committer: ChangeCommitter;
  private readonly referenceChecker: ReferenceChecker;
  private readonly synchronizer: Synchronizer;
  private readonly postUpdater: PostChangeDateUpdater;
  private readonly parseChangeInfo: ChangeInfoParser;
  private readonly verbose: boolean;

  constructor(dependencies: ReverterDependencies) {
    this.repository = dependencies.repository;
    this.committer = dependencies.committer;
    this.referenceChecker = dependencies.referenceChecker;
    this.synchronizer = dependencies.synchronizer;
    this.postUpdater = dependencies.postUpdater;
    this.parseChangeInfo = dependencies.changeInfoParser ?? buildChangeInfo;
    this.verbose = dependencies.verbose ?? Boolean(process.env.REVERTGUARD_DEBUG);
  }

  /**
   * Undo a single commit
   */
  revert(commitHash: string): RevertStatus {
    if (!this.repository.isCleanWorkingDirectory()) {
      return RevertStatus.NOT_CLEAN_WORKING_DIRECTORY;
    }

    const modifiedFiles = this.repository.getModifiedFiles(`${commitHash}~1..${commitHash}`);
    const revertedCommit = this.repository.getCommit(commitHash);
    this.debug(`reverting ${commitHash} (${modifiedFiles.length} files)`);

    if (!this.repository.revert(commitHash)) {
      console.warn(`[reverter] Revert of ${commitHash} conflicts with later changes`);
      return RevertStatus.MERGE_CONFLICT;
    }

    if (!this.checkReferencesForRevertedCommit(this.parseChangeInfo(revertedCommit.message))) {
      this.repository.abortRevert();
      console.warn(`[reverter] Revert of ${commitHash} would break entity references`);
      return RevertStatus.VIOLATED_REFERENTIAL_INTEGRITY;
    }

    this.commit({ kind: "revert", action: "undo", commitHash });
    this.synchronizeAfterRevert(modifiedFiles);

    return RevertStatus.OK;
  }

  /**
   * Return the store to the state of `commitHash`, undoing every later
   * commit at once. References are not validated on this path: the target
   * is a state the store has already been in.
   */
  revertAll(commitHash: string): RevertStatus {
    if (!this.repository.isCleanWorkingDirectory()) {
      return RevertStatus.NOT_CLEAN_WORKING_DIRECTORY;
    }

    const modifiedFiles = this.repository.getModifiedFiles(`${commitHash}..HEAD`);
    this.debug(`rolling back to ${commitHash} (${modifiedFiles.length} files)`);

    this.repository.revertAll(commitHash);

    if (!this.repository.willCommit()) {
      return RevertStatus.NOTHING_TO_COMMIT;
    }

    this.commit({ kind: "revert", action: "rollback", commitHash });
    this.synchronizeAfterRevert(modifiedFiles);

    return RevertStatus.OK;
  }

  private checkReferencesForRevertedCommit(changeInfo: ChangeInfo): boolean {
    if (changeInfo.kind === "untracked") {
      return true;
    }

    for (const change of getEntityChanges(changeInfo)) {
      const ok = this.referenceChecker.checkEntityReferences(
        change.entityType,
        change.entityId,
        change.parentId
      );
      this.debug(`${change.entityType}/${change.entityId}: ${ok ? "ok" : "violated"}`);
      if (!ok) {
        return false;
      }
    }

    return true;
  }

  private commit(changeInfo: RevertChangeInfo): void {
    this.committer.forceChangeInfo(changeInfo);
    this.committer.commit();
  }

  private synchronizeAfterRevert(modifiedFiles: string[]): void {
    const entitiesToSynchronize = detectEntitiesToSynchronize(modifiedFiles);
    this.debug(`synchronizing ${entitiesToSynchronize.join(", ") || "nothing"}`);
    this.synchronizer.synchronize(entitiesToSynchronize);

    this.postUpdater.updateChangeDateForPosts(getAffectedPosts(modifiedFiles));
  }

  private debug(message: string): void {
    if (this.verbose) {
      console.log(`[reverter] ${message}`);
    }
  }
}
