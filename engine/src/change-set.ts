/**
 * Classification of modified entity files
 *
 * Maps the paths touched by a revert to the entity types whose mirror
 * tables must be resynchronized, and to the posts whose modification date
 * must be stamped.
 */

interface SyncRule {
  pathPart: string;
  entityNames: readonly string[];
}

const SYNC_RULES: readonly SyncRule[] = [
  { pathPart: "posts", entityNames: ["post", "postmeta"] },
  // comment counts are denormalized onto posts
  { pathPart: "comments", entityNames: ["comment", "post"] },
  { pathPart: "users.ini", entityNames: ["user", "usermeta"] },
  { pathPart: "terms.ini", entityNames: ["term", "term_taxonomy"] },
  { pathPart: "options.ini", entityNames: ["option"] },
];

const POST_FILE_PATTERN = /\/posts\/.*\/(.*)\.ini/;

/**
 * Returns true if any of the files contains `pathPart`
 */
export function wasModified(modifiedFiles: readonly string[], pathPart: string): boolean {
  return modifiedFiles.some((file) => file.includes(pathPart));
}

/**
 * Entity types to resynchronize after the given files changed.
 * Every rule is evaluated against the whole list, so a type may be
 * listed more than once.
 */
export function detectEntitiesToSynchronize(modifiedFiles: readonly string[]): string[] {
  const entitiesToSynchronize: string[] = [];

  for (const rule of SYNC_RULES) {
    if (wasModified(modifiedFiles, rule.pathPart)) {
      entitiesToSynchronize.push(...rule.entityNames);
    }
  }

  return entitiesToSynchronize;
}

/**
 * Ids of the posts whose files are among the modified ones
 */
export function getAffectedPosts(modifiedFiles: readonly string[]): string[] {
  const posts: string[] = [];

  for (const file of modifiedFiles) {
    const match = POST_FILE_PATTERN.exec(file);
    if (match?.[1] !== undefined) {
      posts.push(match[1]);
    }
  }

  return posts;
}
