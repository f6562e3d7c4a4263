import { describe, expect, it } from "vitest";
import { LookupFailure, PreconditionFailure } from "../errors";
import { locatePullRequest, parsePrArgument, parsePrNumberOutput } from "../pr-locator";
import { FakeRunner } from "./test-utils";

const LIST_ARGS = ["pr", "list", "--head", "feature/x", "--state", "open", "--json", "number", "--jq", ".[0].number"];
const STATUS_ARGS = ["pr", "status", "--json", "number", "--jq", ".currentBranch.number"];
const VIEW_ARGS = ["pr", "view", "--json", "number", "--jq", ".number"];

describe("parsePrNumberOutput", () => {
    it("accepts a bare positive number", () => {
        expect(parsePrNumberOutput("42\n")).toBe(42);
    });

    it("treats empty, null and junk output as not found", () => {
        expect(parsePrNumberOutput("")).toBeNull();
        expect(parsePrNumberOutput("null")).toBeNull();
        expect(parsePrNumberOutput("no pull requests found")).toBeNull();
        expect(parsePrNumberOutput("0")).toBeNull();
    });
});

describe("locatePullRequest", () => {
    it("stops at the first strategy that finds a PR", async () => {
        const gh = new FakeRunner().on(LIST_ARGS, "12");

        expect(await locatePullRequest("feature/x", gh)).toBe(12);
        expect(gh.calls).toEqual([LIST_ARGS]);
    });

    it("tries the strategies in order, skipping null output and failures", async () => {
        const gh = new FakeRunner().on(LIST_ARGS, "null").on(STATUS_ARGS, "", 1).on(VIEW_ARGS, "57");

        expect(await locatePullRequest("feature/x", gh)).toBe(57);
        expect(gh.calls).toEqual([LIST_ARGS, STATUS_ARGS, VIEW_ARGS]);
    });

    it("moves on to the next strategy when gh times out", async () => {
        const gh = new FakeRunner()
            .rejectOn(LIST_ARGS, "Command timed out after 30000ms: gh pr list")
            .on(STATUS_ARGS, "42")
            .on(VIEW_ARGS, "42");

        expect(await locatePullRequest("feature/x", gh)).toBe(42);
        expect(gh.calls).toEqual([LIST_ARGS, STATUS_ARGS]);
    });

    it("raises LookupFailure when every strategy times out", async () => {
        const gh = new FakeRunner()
            .rejectOn(LIST_ARGS, "Command timed out")
            .rejectOn(STATUS_ARGS, "Command timed out")
            .rejectOn(VIEW_ARGS, "Command timed out");

        await expect(locatePullRequest("feature/x", gh)).rejects.toBeInstanceOf(LookupFailure);
        expect(gh.calls).toHaveLength(3);
    });

    it("raises LookupFailure with the manual commands when nothing matches", async () => {
        const gh = new FakeRunner();

        const error = await locatePullRequest("feature/x", gh).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(LookupFailure);
        if (error instanceof LookupFailure) {
            expect(error.message).toBe('No pull request found for branch "feature/x"');
            expect(error.hint).toEqual([
                "gh pr list --head feature/x --state open --json number --jq .[0].number",
                "gh pr status --json number --jq .currentBranch.number",
                "gh pr view --json number --jq .number",
                "review-comments list --pr <number>",
            ]);
        }
    });
});

describe("parsePrArgument", () => {
    it("reads plain numbers", () => {
        expect(parsePrArgument("42")).toEqual({ number: 42 });
        expect(parsePrArgument("#7")).toEqual({ number: 7 });
    });

    it("reads the repository from shorthand and URLs", () => {
        expect(parsePrArgument("octo/widgets#9")).toEqual({ number: 9, repo: { owner: "octo", repo: "widgets" } });
        expect(parsePrArgument("https://github.com/octo/widgets/pull/137/files")).toEqual({
            number: 137,
            repo: { owner: "octo", repo: "widgets" },
        });
    });

    it("rejects anything else", () => {
        expect(() => parsePrArgument("abc")).toThrow(PreconditionFailure);
        expect(() => parsePrArgument("0")).toThrow(PreconditionFailure);
    });

    it("rejects PR number zero in shorthand and URLs", () => {
        expect(() => parsePrArgument("octo/widgets#0")).toThrow('Invalid pull request "octo/widgets#0"');
        expect(() => parsePrArgument("https://github.com/octo/widgets/pull/0")).toThrow(PreconditionFailure);
    });
});
