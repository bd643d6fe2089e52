/**
 * Unit tests for modified-file classification
 */

import { describe, it, expect } from "vitest";
import {
  detectEntitiesToSynchronize,
  getAffectedPosts,
  wasModified,
} from "../../src/change-set.js";

describe("Change-set classification", () => {
  describe("detectEntitiesToSynchronize", () => {
    it("should map post files to posts and their meta", () => {
      const entities = detectEntitiesToSynchronize(["wp-content/db/posts/0/abcd1234.ini"]);

      expect(new Set(entities)).toEqual(new Set(["post", "postmeta"]));
    });

    it("should add posts for comment files because of comment counts", () => {
      const entities = detectEntitiesToSynchronize([
        "wp-content/db/comments/xy/xyz.ini",
        "wp-content/db/posts/0/abcd1234.ini",
      ]);

      expect(entities).toEqual(["post", "postmeta", "comment", "post"]);
      expect(new Set(entities)).toEqual(new Set(["comment", "post", "postmeta"]));
    });

    it("should map the single-file stores", () => {
      expect(detectEntitiesToSynchronize(["db/users.ini"])).toEqual(["user", "usermeta"]);
      expect(detectEntitiesToSynchronize(["db/terms.ini"])).toEqual(["term", "term_taxonomy"]);
      expect(detectEntitiesToSynchronize(["db/options.ini"])).toEqual(["option"]);
    });

    it("should evaluate every rule against the whole list", () => {
      const entities = detectEntitiesToSynchronize([
        "db/options.ini",
        "db/users.ini",
        "db/terms.ini",
      ]);

      expect(entities).toEqual(["user", "usermeta", "term", "term_taxonomy", "option"]);
    });

    it("should return nothing for unrelated files", () => {
      expect(detectEntitiesToSynchronize(["README.md", "assets/theme/app.js"])).toEqual([]);
      expect(detectEntitiesToSynchronize([])).toEqual([]);
    });
  });

  describe("getAffectedPosts", () => {
    it("should extract post ids from post file paths", () => {
      expect(
        getAffectedPosts(["wp-content/db/posts/0/abcd1234.ini", "wp-content/db/terms.ini"])
      ).toEqual(["abcd1234"]);
    });

    it("should keep the order of the modified files", () => {
      expect(
        getAffectedPosts(["db/posts/EF/EF01.ini", "db/comments/C1/C1.ini", "db/posts/AB/ABCD.ini"])
      ).toEqual(["EF01", "ABCD"]);
    });

    it("should ignore files directly under the posts directory", () => {
      expect(getAffectedPosts(["db/posts/index.ini", "db/posts/AB/notes.txt"])).toEqual([]);
    });
  });

  describe("wasModified", () => {
    it("should match substrings anywhere in a path", () => {
      expect(wasModified(["a/b/users.ini"], "users.ini")).toBe(true);
      expect(wasModified(["a/b/user.ini"], "users.ini")).toBe(false);
    });
  });
});
