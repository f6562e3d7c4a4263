// Wires the session for a command from its options and the user config

import logger from "@app/logger";
import { CommentFetcher } from "@app/review-comments/lib/comment-fetcher";
import { applyCommandOptions, loadConfig, toFormatOptions } from "@app/review-comments/lib/config";
import { PreconditionFailure, ReviewCommentsError } from "@app/review-comments/lib/errors";
import { OctokitGateway } from "@app/review-comments/lib/gateway";
import { locatePullRequest, parsePrArgument } from "@app/review-comments/lib/pr-locator";
import { RepoResolver } from "@app/review-comments/lib/repo";
import { parseEntryIndex, ReviewSession } from "@app/review-comments/lib/review-session";
import { ThreadActions } from "@app/review-comments/lib/thread-actions";
import type { CommonCommandOptions } from "@app/review-comments/types";
import { Executor } from "@app/utils/cli";
import { createGit } from "@app/utils/git";
import { createGitHubClient } from "@app/utils/github/octokit";
import { Storage } from "@app/utils/storage";
import chalk from "chalk";
import type { Command } from "commander";

export const TOOL_NAME = "review-comments";

/**
 * Build a session. A PR given positionally wins over `--pr`; a PR URL or
 * `owner/repo#N` also supplies the repository unless `--repo` is set.
 */
export async function createSession(options: CommonCommandOptions, prInput?: string): Promise<ReviewSession> {
    const config = applyCommandOptions(await loadConfig(new Storage(TOOL_NAME)), options);

    const input = prInput ?? options.pr;
    const pr = input ? parsePrArgument(input) : undefined;
    const explicitRepo = options.repo ?? (pr?.repo ? `${pr.repo.owner}/${pr.repo.repo}` : undefined);

    const verbose = options.verbose ?? false;
    // -vv also dumps command output
    const debug = logger.isLevelEnabled("trace");
    const gh = new Executor({ prefix: "gh", timeout: config.requestTimeoutMs, verbose, debug, label: "gh" });
    const git = createGit({ verbose, debug });
    const repoResolver = new RepoResolver({ git, gh, explicit: explicitRepo });
    const client = await createGitHubClient({ gh });
    const gateway = new OctokitGateway({
        octokit: client.octokit,
        timeoutMs: config.requestTimeoutMs,
        authenticated: client.token !== null,
    });

    return new ReviewSession({
        fetcher: new CommentFetcher(gateway, repoResolver),
        actions: new ThreadActions(gateway),
        repoResolver,
        locatePr: async () => locatePullRequest(await git.getCurrentBranch(), gh),
        format: toFormatOptions(config),
        showResolved: config.showResolved,
        prNumber: pr?.number,
    });
}

/**
 * Print a failure the way every command does: red message, then hints.
 */
export function printError(error: unknown): void {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    if (error instanceof ReviewCommentsError && error.hint.length > 0) {
        console.error(chalk.dim("Try:"));
        for (const hint of error.hint) {
            console.error(chalk.dim(`  ${hint}`));
        }
    }
}

/**
 * Entry index from a command argument; accepts `3` or `[3]`.
 */
export function requireEntryIndex(input: string): number {
    const index = parseEntryIndex(input);
    if (index === null) {
        throw new PreconditionFailure(`Invalid comment index "${input}"`, {
            hint: [`${TOOL_NAME} list`],
        });
    }
    return index;
}

/** Options every subcommand that loads a list accepts */
export function addCommonOptions(cmd: Command): Command {
    return cmd
        .option("--repo <owner/repo>", "Repository (auto-detected from git)")
        .option("--pr <number>", "Pull request (default: the PR for the current branch)")
        .option("-a, --all", "Include resolved comments", false)
        .option("-f, --full", "Show full comment text", false)
        .option("--max-length <n>", "Truncate comment text to n characters")
        .option("-v, --verbose", "Echo the gh and git commands being run");
}

/**
 * Command action boundary: log, print, exit non-zero.
 */
export async function runCommand(name: string, action: () => Promise<void>): Promise<void> {
    try {
        await action();
    } catch (error) {
        logger.error({ error }, `${name} command failed`);
        printError(error);
        process.exit(1);
    }
}
