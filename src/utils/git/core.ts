import type { CommandRunner } from "@app/utils/cli";
import { Executor } from "@app/utils/cli";

export interface GitOptions {
    cwd?: string;
    verbose?: boolean;
    debug?: boolean;
    /** Run git through a different runner (tests pass a fake) */
    runner?: CommandRunner;
}

export function createGit(options?: GitOptions) {
    const executor: CommandRunner =
        options?.runner ??
        new Executor({
            prefix: "git",
            cwd: options?.cwd,
            verbose: options?.verbose ?? false,
            debug: options?.debug ?? false,
            label: "git",
        });

    async function execOrThrow(args: string[], errorMsg: string): Promise<string> {
        const result = await executor.exec(args);
        if (!result.success) {
            throw new Error(`${errorMsg}${result.stderr ? `: ${result.stderr}` : ""}`);
        }
        return result.stdout;
    }

    return {
        /** Access the underlying runner for advanced usage */
        executor,

        /**
         * Get current branch name
         */
        async getCurrentBranch(): Promise<string> {
            const branch = await execOrThrow(["rev-parse", "--abbrev-ref", "HEAD"], "Failed to get current branch");
            if (branch === "HEAD") {
                throw new Error("HEAD is detached; check out a branch or pass the PR number explicitly");
            }
            return branch;
        },

        /**
         * URL of a remote, or null when the remote is not configured
         */
        async getRemoteUrl(remote: string = "origin"): Promise<string | null> {
            const result = await executor.exec(["remote", "get-url", remote]);
            return result.success && result.stdout ? result.stdout : null;
        },
    };
}

export type GitClient = ReturnType<typeof createGit>;
