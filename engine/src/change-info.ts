/**
 * Change descriptions carried in commit messages
 *
 * A tracked commit lists its changes as trailer lines:
 *
 * ```
 * Edited post 'Hello world'
 *
 * Entity-Action: post/edit/ABCD1234
 * Entity-Action: postmeta/create/EF56/ABCD1234
 * ```
 *
 * `Entity-Action` values are `<type>/<action>/<id>[/<parentId>]`; reverts
 * are recorded as `Revert-Action: <undo|rollback> <hash>`. A message with
 * neither trailer is untracked.
 */

import type {
  ChangeInfo,
  EntityChangeInfo,
  RevertAction,
  RevertChangeInfo,
  SubChangeInfo,
} from "./types.js";

export const ENTITY_ACTION_TRAILER = "Entity-Action";
export const REVERT_ACTION_TRAILER = "Revert-Action";

const TRAILER_PATTERN = /^([A-Za-z-]+):\s*(.+?)\s*$/;

function parseEntityAction(value: string): EntityChangeInfo | null {
  const parts = value.split("/");
  if (parts.length !== 3 && parts.length !== 4) {
    return null;
  }
  if (parts.some((part) => part === "")) {
    return null;
  }

  const [entityType, action, entityId, parentId] = parts;
  return {
    kind: "entity",
    entityType,
    action,
    entityId,
    parentId: parentId ?? null,
  };
}

function isRevertAction(value: string): value is RevertAction {
  return value === "undo" || value === "rollback";
}

function parseRevertAction(value: string): RevertChangeInfo | null {
  const [action, commitHash, ...rest] = value.split(/\s+/);
  if (!isRevertAction(action) || !commitHash || rest.length > 0) {
    return null;
  }
  return { kind: "revert", action, commitHash };
}

/**
 * Build the structured change description of a commit message.
 * Malformed trailer lines are skipped.
 */
export function buildChangeInfo(commitMessage: string): ChangeInfo {
  const changes: SubChangeInfo[] = [];

  for (const line of commitMessage.split(/\r?\n/)) {
    const match = TRAILER_PATTERN.exec(line.trim());
    if (!match) {
      continue;
    }

    const [, key, value] = match;
    let change: SubChangeInfo | null = null;
    if (key === ENTITY_ACTION_TRAILER) {
      change = parseEntityAction(value);
    } else if (key === REVERT_ACTION_TRAILER) {
      change = parseRevertAction(value);
    }

    if (change) {
      changes.push(change);
    }
  }

  if (changes.length === 0) {
    return { kind: "untracked", message: commitMessage };
  }

  return { kind: "tracked", changes };
}

/**
 * Entity changes of a description, in declared order
 */
export function getEntityChanges(changeInfo: ChangeInfo): EntityChangeInfo[] {
  if (changeInfo.kind === "untracked") {
    return [];
  }
  return changeInfo.changes.filter(
    (change): change is EntityChangeInfo => change.kind === "entity"
  );
}

/**
 * Commit message recording a revert
 */
export function formatChangeInfo(changeInfo: RevertChangeInfo): string {
  const shortHash = changeInfo.commitHash.slice(0, 7);
  const subject =
    changeInfo.action === "undo"
      ? `Reverted change ${shortHash}`
      : `Rolled back to ${shortHash}`;

  return `${subject}\n\n${REVERT_ACTION_TRAILER}: ${changeInfo.action} ${changeInfo.commitHash}\n`;
}
