import { describe, expect, it } from "vitest";
import type { CommentDetail, FormatOptions, ThreadReply } from "../../types";
import { DEFAULT_BOT_AUTHORS } from "../config";
import {
    addResolvedTag,
    classifySeverity,
    cleanCommentBody,
    formatComment,
    formatCommentText,
    isCommentResolved,
    stripResolvedTag,
    summarizeReplies,
} from "../formatter";
import { makeComment } from "./test-utils";

const options: FormatOptions = {
    maxLength: 300,
    snippetLength: 60,
    showFull: false,
    botAuthors: DEFAULT_BOT_AUTHORS,
};

function reply(author: string, body: string): ThreadReply {
    return { author, body, createdAt: "2026-01-15T12:00:00Z" };
}

describe("cleanCommentBody", () => {
    it("replaces suggestion blocks", () => {
        expect(cleanCommentBody("Looks good\n```suggestion\nconst x = 1;\n```\nThanks")).toBe(
            "Looks good [suggestion] Thanks"
        );
    });

    it("replaces other fenced code blocks", () => {
        expect(cleanCommentBody("See\n```ts\nfoo()\n```")).toBe("See [code]");
    });

    it("collapses newlines and whitespace", () => {
        expect(cleanCommentBody("  a\r\n\r\n   b  ")).toBe("a b");
    });
});

describe("summarizeReplies", () => {
    it("returns nothing without replies", () => {
        expect(summarizeReplies([], 60)).toBe("");
    });

    it("shows the last two replies and counts the rest", () => {
        const replies = [reply("a", "first"), reply("b", "second"), reply("c", "third"), reply("d", "fourth")];
        expect(summarizeReplies(replies, 60)).toBe(" [+2 more] [↪ c: third] [↪ d: fourth]");
    });

    it("truncates reply snippets", () => {
        expect(summarizeReplies([reply("a", "y".repeat(100))], 60)).toBe(` [↪ a: ${"y".repeat(57)}...]`);
    });
});

describe("formatCommentText", () => {
    it("truncates long bodies to maxLength including the ellipsis", () => {
        const text = formatCommentText(makeComment(1, { body: "x".repeat(1000) }), options);
        expect(text).toHaveLength(300);
        expect(text.endsWith("...")).toBe(true);
    });

    it("keeps the whole body in full mode", () => {
        const text = formatCommentText(makeComment(1, { body: "x".repeat(1000) }), { ...options, showFull: true });
        expect(text).toBe("x".repeat(1000));
    });

    it("appends the reply summary", () => {
        const text = formatCommentText(makeComment(1, { body: "Fix this", replies: [reply("alice", "on it")] }), options);
        expect(text).toBe("Fix this [↪ alice: on it]");
    });
});

describe("isCommentResolved", () => {
    it("checks every resolution source", () => {
        expect(isCommentResolved(makeComment(1))).toBe(false);
        expect(isCommentResolved(makeComment(1, { isResolved: true }))).toBe(true);
        expect(isCommentResolved(makeComment(1, { resolved: true }))).toBe(true);
        expect(isCommentResolved(makeComment(1, { resolvedAt: "2026-01-16T09:00:00Z" }))).toBe(true);
    });
});

describe("classifySeverity", () => {
    it("marks configured bots as info, case-insensitively", () => {
        expect(classifySeverity("GitHub-Actions[bot]", DEFAULT_BOT_AUTHORS)).toBe("info");
        expect(classifySeverity("alice", DEFAULT_BOT_AUTHORS)).toBe("warning");
    });
});

describe("resolved tag", () => {
    it("is inserted after the index prefix once", () => {
        const tagged = addResolvedTag("[3] alice: hi");
        expect(tagged).toBe("[3] [RESOLVED] alice: hi");
        expect(addResolvedTag(tagged)).toBe(tagged);
    });

    it("is prepended to lines without an index", () => {
        expect(addResolvedTag("alice: hi")).toBe("[RESOLVED] alice: hi");
    });

    it("is stripped back out", () => {
        expect(stripResolvedTag("[3] [RESOLVED] alice: hi")).toBe("[3] alice: hi");
        expect(stripResolvedTag("[RESOLVED] alice: hi")).toBe("alice: hi");
        expect(stripResolvedTag("[3] alice: hi")).toBe("[3] alice: hi");
    });
});

describe("formatComment", () => {
    it("builds the display entry and records the detail", () => {
        const details = new Map<number, CommentDetail>();
        const comment = makeComment(5, { author: "copilot-pull-request-reviewer[bot]", isResolved: true });

        const entry = formatComment(comment, 5, options, details);

        expect(entry).toEqual({
            index: 5,
            commentId: 5,
            file: "src/app.ts",
            line: 10,
            severity: "info",
            resolved: true,
            text: "[5] [RESOLVED] copilot-pull-request-reviewer[bot]: Comment 5",
        });
        expect(details.get(5)).toMatchObject({
            commentId: 5,
            resolvedLine: 10,
            isResolved: true,
            positionSummary: "line=10 original_line=10 start_line=- position=2 original_position=2 side=RIGHT",
        });
    });
});
