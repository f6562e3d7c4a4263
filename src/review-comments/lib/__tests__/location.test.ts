import { describe, expect, it } from "vitest";
import { describePositionFields, lineFromDiffHunk, resolveCommentLine } from "../location";
import { makeComment } from "./test-utils";

const MIXED_HUNK = "@@ -10,3 +10,4 @@\n context\n+added\n-removed\n context2";

describe("lineFromDiffHunk", () => {
    it("counts context and added lines up to the original position", () => {
        expect(lineFromDiffHunk(MIXED_HUNK, 2)).toBe(11);
    });

    it("handles a pure addition", () => {
        expect(lineFromDiffHunk("@@ -5,0 +6,3 @@\n+a\n+b\n+c", 3)).toBe(8);
    });

    it("falls back to the hunk start for a pure deletion", () => {
        expect(lineFromDiffHunk("@@ -20,3 +19,0 @@\n-x\n-y\n-z", 2)).toBe(19);
    });

    it("skips removed lines in a mixed hunk", () => {
        expect(lineFromDiffHunk("@@ -1,4 +1,4 @@\n a\n-b\n+c\n d", 4)).toBe(3);
    });

    it("returns the hunk start without a position", () => {
        expect(lineFromDiffHunk(MIXED_HUNK)).toBe(10);
    });

    it("returns the hunk start when the position is past the hunk", () => {
        expect(lineFromDiffHunk("@@ -1,1 +40,2 @@\n a\n+b", 9)).toBe(40);
    });

    it("returns 0 when there is no hunk header", () => {
        expect(lineFromDiffHunk("no header here\n+added", 1)).toBe(0);
    });
});

describe("resolveCommentLine", () => {
    it("prefers the line field", () => {
        expect(resolveCommentLine(makeComment(1, { line: 15, diffHunk: MIXED_HUNK }))).toBe(15);
    });

    it("uses the diff hunk when line is missing", () => {
        expect(resolveCommentLine(makeComment(1, { line: null, diffHunk: MIXED_HUNK, originalPosition: 2 }))).toBe(11);
    });

    it("uses originalLine before startLine when there is no hunk", () => {
        const comment = makeComment(1, { line: null, diffHunk: "", originalLine: 7, startLine: 99 });
        expect(resolveCommentLine(comment)).toBe(7);
    });

    it("uses originalLine when the hunk has no header", () => {
        const comment = makeComment(1, { line: null, diffHunk: "garbage", originalLine: 5, startLine: 99 });
        expect(resolveCommentLine(comment)).toBe(5);
    });

    it("uses startLine when nothing else is set", () => {
        const comment = makeComment(1, { line: null, diffHunk: "", originalLine: null, startLine: 99 });
        expect(resolveCommentLine(comment)).toBe(99);
    });

    it("defaults to line 1", () => {
        const comment = makeComment(1, { line: null, diffHunk: "", originalLine: null, startLine: null });
        expect(resolveCommentLine(comment)).toBe(1);
    });
});

describe("describePositionFields", () => {
    it("lists every positional field with - for missing values", () => {
        expect(describePositionFields(makeComment(1))).toBe(
            "line=10 original_line=10 start_line=- position=2 original_position=2 side=RIGHT"
        );
    });
});
