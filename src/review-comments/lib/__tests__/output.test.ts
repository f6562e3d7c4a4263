import chalk from "chalk";
import { beforeAll, describe, expect, it } from "vitest";
import { DEFAULT_BOT_AUTHORS } from "../config";
import { formatDiffHunk, formatList, formatListQuickfix, formatListTerminal } from "../output";
import { buildReviewList } from "../review-session";
import { makeComment } from "./test-utils";

const repo = { owner: "octo", repo: "widgets" };
const format = { maxLength: 300, snippetLength: 60, showFull: false, botAuthors: DEFAULT_BOT_AUTHORS };

function sampleList() {
    return buildReviewList([makeComment(1), makeComment(2, { author: "github-actions[bot]" })], {
        prNumber: 42,
        repo,
        format,
        showResolved: false,
    }).list;
}

beforeAll(() => {
    chalk.level = 0;
});

describe("formatListQuickfix", () => {
    it("writes one errorformat line per entry", () => {
        expect(formatListQuickfix(sampleList())).toBe(
            "src/app.ts:10:1: W [1] reviewer: Comment 1\nsrc/app.ts:10:1: I [2] github-actions[bot]: Comment 2"
        );
    });
});

describe("formatListTerminal", () => {
    it("prints the title, status and entries", () => {
        expect(formatListTerminal(sampleList()).split("\n")).toEqual([
            "PR #42 review comments (2)",
            "https://github.com/octo/widgets/pull/42 · 2 shown",
            "",
            "src/app.ts:10",
            "  [1] reviewer: Comment 1",
            "src/app.ts:10",
            "  [2] github-actions[bot]: Comment 2",
        ]);
    });

    it("says so when nothing is left to show", () => {
        const { list } = buildReviewList([makeComment(1, { isResolved: true })], {
            prNumber: 42,
            repo,
            format,
            showResolved: false,
        });
        const lines = formatListTerminal(list).split("\n");
        expect(lines[1]).toBe("https://github.com/octo/widgets/pull/42 · 0 shown, 1 resolved hidden");
        expect(lines[lines.length - 1]).toBe("No review comments to show.");
    });
});

describe("formatList", () => {
    it("emits JSON with the repository as owner/repo", () => {
        const parsed: unknown = JSON.parse(formatList(sampleList(), "json"));
        expect(parsed).toMatchObject({
            title: "PR #42 review comments (2)",
            status: "2 shown",
            repo: "octo/widgets",
            prNumber: 42,
            total: 2,
            hiddenResolved: 0,
        });
    });
});

describe("formatDiffHunk", () => {
    it("marks the resolved line", () => {
        expect(formatDiffHunk("@@ -10,3 +10,4 @@\n context\n+added\n-removed\n context2", 11)).toBe(
            "@@ -10,3 +10,4 @@\n    context\n-> +added\n   -removed\n    context2"
        );
    });

    it("returns nothing for an empty hunk", () => {
        expect(formatDiffHunk("", 1)).toBe("");
    });
});
