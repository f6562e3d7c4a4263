import { describe, expect, it } from "vitest";
import { LookupFailure } from "../errors";
import { RepoResolver } from "../repo";
import { FakeRunner } from "./test-utils";

const VIEW_ARGS = ["repo", "view", "--json", "nameWithOwner", "--jq", ".nameWithOwner"];

function fakeGit(url: string | null) {
    let calls = 0;
    return {
        get calls() {
            return calls;
        },
        async getRemoteUrl() {
            calls++;
            return url;
        },
    };
}

describe("RepoResolver", () => {
    it("uses an explicit owner/repo without asking git", async () => {
        const git = fakeGit("git@github.com:someone/else.git");
        const resolver = new RepoResolver({ git, gh: new FakeRunner(), explicit: "octo/widgets" });

        expect(await resolver.resolve()).toEqual({ owner: "octo", repo: "widgets" });
        expect(git.calls).toBe(0);
    });

    it("rejects a malformed explicit repo", async () => {
        const resolver = new RepoResolver({ git: fakeGit(null), gh: new FakeRunner(), explicit: "widgets" });

        await expect(resolver.resolve()).rejects.toBeInstanceOf(LookupFailure);
    });

    it("reads the origin remote once", async () => {
        const git = fakeGit("git@github.com:octo/widgets.git");
        const resolver = new RepoResolver({ git, gh: new FakeRunner() });

        await resolver.resolve();
        expect(await resolver.resolve()).toEqual({ owner: "octo", repo: "widgets" });
        expect(git.calls).toBe(1);
    });

    it("falls back to gh repo view", async () => {
        const gh = new FakeRunner().on(VIEW_ARGS, "octo/widgets");
        const resolver = new RepoResolver({ git: fakeGit(null), gh });

        expect(await resolver.resolve()).toEqual({ owner: "octo", repo: "widgets" });
        expect(gh.calls).toEqual([VIEW_ARGS]);
    });

    it("treats a gh repo view timeout as not found", async () => {
        const gh = new FakeRunner().rejectOn(VIEW_ARGS, "Command timed out after 30000ms: gh repo view");
        const resolver = new RepoResolver({ git: fakeGit(null), gh });

        await expect(resolver.resolve()).rejects.toBeInstanceOf(LookupFailure);
        expect(gh.calls).toEqual([VIEW_ARGS]);
    });

    it("fails when no source knows the repository", async () => {
        const resolver = new RepoResolver({ git: fakeGit("https://gitlab.com/octo/widgets.git"), gh: new FakeRunner() });

        await expect(resolver.resolve()).rejects.toThrow("Could not determine the GitHub repository for this directory");
    });
});
