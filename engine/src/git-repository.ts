/**
 * Git backend of the versioned entity store
 *
 * Uses execFileSync with argument arrays, never a shell.
 */

import { execFileSync } from "child_process";
import type { CommitInfo, VersionControl } from "./types.js";
import { GitCommandError } from "./errors.js";

function outputOf(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString("utf8");
  }
  return "";
}

function exitStatusOf(error: Error): number | null {
  return "status" in error && typeof error.status === "number" ? error.status : null;
}

export class GitRepository implements VersionControl {
  constructor(private readonly repoRoot: string) {}

  /**
   * Run git in the repository and return its stdout
   *
   * @throws GitCommandError if git exits with a non-zero status
   */
  run(args: string[]): string {
    try {
      return execFileSync("git", args, {
        cwd: this.repoRoot,
        encoding: "utf8",
        stdio: "pipe",
      });
    } catch (error) {
      if (!(error instanceof Error)) {
        throw error;
      }
      const stderr = "stderr" in error ? outputOf(error.stderr).trim() : "";
      throw new GitCommandError(
        `git ${args.join(" ")} failed: ${stderr || error.message}`,
        args,
        exitStatusOf(error),
        stderr
      );
    }
  }

  isCleanWorkingDirectory(): boolean {
    return this.run(["status", "--porcelain"]).trim() === "";
  }

  getModifiedFiles(range: string): string[] {
    return this.run(["diff", "--name-only", "--no-renames", range])
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line !== "");
  }

  getCommit(hash: string): CommitInfo {
    const resolved = this.run(["rev-parse", "--verify", `${hash}^{commit}`]).trim();
    const message = this.run(["log", "-1", "--format=%B", resolved]);
    return { hash: resolved, message };
  }

  revert(hash: string): boolean {
    try {
      this.run(["revert", "--no-commit", hash]);
      return true;
    } catch (error) {
      if (!(error instanceof GitCommandError)) {
        throw error;
      }
      this.abortRevert();
      return false;
    }
  }

  abortRevert(): void {
    this.run(["reset", "--hard", "HEAD"]);
  }

  revertAll(hash: string): void {
    this.run(["read-tree", "-u", "--reset", hash]);
  }

  willCommit(): boolean {
    return !this.isCleanWorkingDirectory();
  }

  stageAll(): void {
    this.run(["add", "--all"]);
  }

  commit(message: string): void {
    this.run(["commit", "--message", message]);
  }
}
