// GitHub URL parsing utilities

import type { GitClient } from "@app/utils/git";

export interface RepoRef {
    owner: string;
    repo: string;
}

export interface PullRequestRef extends RepoRef {
    number: number;
}

/**
 * Parse a pull request reference.
 *
 * Supported formats:
 * - https://github.com/owner/repo/pull/456
 * - https://github.com/owner/repo/pull/456/files#r123
 * - owner/repo#456
 * - #456 or 456 (requires repo context)
 */
export function parsePullRequestRef(input: string, defaultRepo?: RepoRef): PullRequestRef | null {
    const trimmed = input.trim();

    const urlMatch = trimmed.match(/github\.com\/([^/]+)\/([^/]+)\/pull\/(\d+)/);
    if (urlMatch) {
        const [, owner, repo, number] = urlMatch;
        return { owner, repo, number: parseInt(number, 10) };
    }

    const shortMatch = trimmed.match(/^([^/\s]+)\/([^#\s]+)#(\d+)$/);
    if (shortMatch) {
        const [, owner, repo, number] = shortMatch;
        return { owner, repo, number: parseInt(number, 10) };
    }

    const numberMatch = trimmed.match(/^#?(\d+)$/);
    if (numberMatch && defaultRepo) {
        return { ...defaultRepo, number: parseInt(numberMatch[1], 10) };
    }

    return null;
}

/**
 * Parse repo string (owner/repo)
 */
export function parseRepo(input: string): RepoRef | null {
    const match = input.trim().match(/^([^/\s]+)\/([^/\s]+)$/);
    if (match) {
        return {
            owner: match[1],
            repo: match[2],
        };
    }
    return null;
}

/**
 * Extract owner/repo from a git remote URL (SSH or HTTPS)
 */
export function parseRemoteUrl(url: string): RepoRef | null {
    // SSH format: git@github.com:owner/repo.git
    const sshMatch = url.match(/git@github\.com:([^/]+)\/(.+?)(?:\.git)?\/?$/);
    if (sshMatch) {
        return { owner: sshMatch[1], repo: sshMatch[2] };
    }

    // HTTPS format: https://github.com/owner/repo.git
    const httpsMatch = url.match(/github\.com\/([^/]+)\/(.+?)(?:\.git)?\/?$/);
    if (httpsMatch) {
        return { owner: httpsMatch[1], repo: httpsMatch[2] };
    }

    return null;
}

/**
 * Detect repo from the current git directory's origin remote
 */
export async function detectRepoFromGit(git: Pick<GitClient, "getRemoteUrl">): Promise<RepoRef | null> {
    const url = await git.getRemoteUrl("origin");
    return url ? parseRemoteUrl(url) : null;
}

export function buildPullRequestUrl(ref: PullRequestRef): string {
    return `https://github.com/${ref.owner}/${ref.repo}/pull/${ref.number}`;
}
