/**
 * Stamps the modification date of reverted posts in the mirror
 */

import type Database from "better-sqlite3";
import type { Clock, PostChangeDateUpdater } from "./types.js";
import { formatSqlDate, systemClock } from "./clock.js";
import { withTransaction } from "./db.js";

export interface PostTimestampOptions {
  clock?: Clock;
  /** Offset of local time from UTC */
  gmtOffsetMinutes?: number;
}

export class PostTimestampUpdater implements PostChangeDateUpdater {
  private readonly clock: Clock;
  private readonly gmtOffsetMinutes: number;

  constructor(
    private readonly db: Database.Database,
    options: PostTimestampOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.gmtOffsetMinutes = options.gmtOffsetMinutes ?? 0;
  }

  /**
   * Set `post_modified` (local time) and `post_modified_gmt` of the posts
   * to the current time. Ids without a mirrored post are skipped.
   */
  updateChangeDateForPosts(vpIds: string[]): void {
    if (vpIds.length === 0) {
      return;
    }

    const now = this.clock.now();
    const date = formatSqlDate(now, this.gmtOffsetMinutes);
    const dateGmt = formatSqlDate(now);

    const stmt = this.db.prepare(`
      UPDATE posts
      SET post_modified = @date, post_modified_gmt = @dateGmt
      WHERE vp_id = @vpId
    `);

    withTransaction(this.db, () => {
      for (const vpId of vpIds) {
        stmt.run({ date, dateGmt, vpId });
      }
    });
  }
}
