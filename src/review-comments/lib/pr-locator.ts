// PR Locator - branch name to pull request number through the gh CLI

import logger from "@app/logger";
import { LookupFailure, PreconditionFailure } from "@app/review-comments/lib/errors";
import { type CommandRunner, execSettled } from "@app/utils/cli";
import { parsePullRequestRef, type RepoRef } from "@app/utils/github/url-parser";

export interface LocatorStrategy {
    name: string;
    /** gh arguments; must print a bare PR number (or `null`) */
    args: (branch: string) => string[];
}

export const LOCATOR_STRATEGIES: LocatorStrategy[] = [
    {
        name: "open PR with matching head branch",
        args: (branch) => ["pr", "list", "--head", branch, "--state", "open", "--json", "number", "--jq", ".[0].number"],
    },
    {
        name: "gh pr status for the current branch",
        args: () => ["pr", "status", "--json", "number", "--jq", ".currentBranch.number"],
    },
    {
        name: "PR for the checked-out ref",
        args: () => ["pr", "view", "--json", "number", "--jq", ".number"],
    },
];

/**
 * Parse a strategy's output. Empty output, the literal `null` and anything
 * that is not a positive integer count as "not found".
 */
export function parsePrNumberOutput(stdout: string): number | null {
    const value = stdout.trim();
    if (!value || value === "null" || !/^\d+$/.test(value)) {
        return null;
    }
    const number = parseInt(value, 10);
    return number > 0 ? number : null;
}

/**
 * Resolve the PR for a branch, trying each strategy only after the previous one
 * came up empty. A gh run that times out counts as empty.
 */
export async function locatePullRequest(
    branch: string,
    gh: CommandRunner,
    strategies: LocatorStrategy[] = LOCATOR_STRATEGIES
): Promise<number> {
    for (const strategy of strategies) {
        const result = await execSettled(gh, strategy.args(branch));
        const number = result.success ? parsePrNumberOutput(result.stdout) : null;

        if (number !== null) {
            logger.debug({ branch, strategy: strategy.name, number }, "Located pull request");
            return number;
        }

        logger.debug(
            { branch, strategy: strategy.name, exitCode: result.exitCode, stderr: result.stderr },
            "PR lookup strategy found nothing"
        );
    }

    throw new LookupFailure(`No pull request found for branch "${branch}"`, {
        hint: [
            ...strategies.map((s) => `gh ${s.args(branch).join(" ")}`),
            "review-comments list --pr <number>",
        ],
    });
}

/**
 * Read a PR given on the command line: `42`, `#42`, `owner/repo#42` or a PR URL.
 * The repo is set only when the input names one.
 */
export function parsePrArgument(input: string): { number: number; repo?: RepoRef } {
    const ref = parsePullRequestRef(input);
    const match = ref ? null : input.trim().match(/^#?(\d+)$/);
    const number = ref?.number ?? (match ? parseInt(match[1], 10) : 0);
    if (!Number.isInteger(number) || number <= 0) {
        throw new PreconditionFailure(`Invalid pull request "${input}"`, {
            hint: ["Use a number, owner/repo#number or a pull request URL"],
        });
    }
    return ref ? { number, repo: { owner: ref.owner, repo: ref.repo } } : { number };
}
