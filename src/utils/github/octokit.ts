// GitHub client for review-comments: token discovery and the authenticated Octokit

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import logger from "@app/logger";
import { type CommandRunner, execSettled } from "@app/utils/cli";
import { Octokit } from "octokit";

export const USER_AGENT = "review-comments";

/** Shown when a call is denied and no token was found */
export const NO_TOKEN_HINT = ["No GitHub token found. Set GITHUB_TOKEN or run: gh auth login"];

const ENV_TOKEN_VARS = ["GITHUB_TOKEN", "GH_TOKEN", "GITHUB_PERSONAL_ACCESS_TOKEN"] as const;

export interface TokenSources {
    env?: Record<string, string | undefined>;
    /** Runner with the `gh` prefix, asked for `auth token` */
    gh?: CommandRunner;
    /** Legacy gh config holding `oauth_token:` lines */
    hostsPath?: string;
}

export interface ResolvedToken {
    token: string;
    /** Where it came from, for logs and `status` */
    source: string;
}

export interface GitHubClient {
    octokit: Octokit;
    token: ResolvedToken | null;
}

export function defaultHostsPath(): string {
    return join(homedir(), ".config", "gh", "hosts.yml");
}

/**
 * First `oauth_token:` value in a gh hosts.yml.
 */
export function parseHostsToken(content: string): string | null {
    const match = content.match(/oauth_token:\s*(\S+)/);
    return match ? match[1] : null;
}

async function readHostsToken(path: string): Promise<string | null> {
    try {
        return parseHostsToken(await readFile(path, "utf-8"));
    } catch (err) {
        logger.debug({ err, path }, "No readable gh hosts file");
        return null;
    }
}

/**
 * Token lookup order: GITHUB_TOKEN, GH_TOKEN, GITHUB_PERSONAL_ACCESS_TOKEN,
 * `gh auth token`, then the gh hosts file.
 *
 * `gh auth token` usually yields a classic OAuth token with the `repo` scope,
 * which resolveReviewThread needs; some fine-grained PATs lack it.
 */
export async function resolveGitHubToken(sources: TokenSources = {}): Promise<ResolvedToken | null> {
    const env = sources.env ?? process.env;
    for (const name of ENV_TOKEN_VARS) {
        const value = env[name]?.trim();
        if (value) {
            return { token: value, source: name };
        }
    }

    if (sources.gh) {
        const result = await execSettled(sources.gh, ["auth", "token"]);
        if (result.success && result.stdout.trim()) {
            return { token: result.stdout.trim(), source: "gh auth token" };
        }
        logger.debug({ exitCode: result.exitCode, stderr: result.stderr }, "gh auth token returned nothing");
    }

    const hostsPath = sources.hostsPath ?? defaultHostsPath();
    const fromHosts = await readHostsToken(hostsPath);
    if (fromHosts) {
        return { token: fromHosts, source: hostsPath };
    }

    return null;
}

/**
 * Authenticated client for a session. Without a token the client still reads
 * public repositories.
 */
export async function createGitHubClient(sources: TokenSources = {}): Promise<GitHubClient> {
    const token = await resolveGitHubToken(sources);
    if (token) {
        logger.debug({ source: token.source }, "Using GitHub token");
    } else {
        logger.warn("No GitHub token found. Replies and thread resolution will fail without one.");
    }

    const octokit = new Octokit({ auth: token?.token, userAgent: USER_AGENT });
    return { octokit, token };
}

export async function checkAuth(octokit: Octokit): Promise<{ authenticated: boolean; user?: string; scopes?: string[] }> {
    try {
        const { data, headers } = await octokit.rest.users.getAuthenticated();
        const scopesHeader = headers["x-oauth-scopes"];
        const scopes = typeof scopesHeader === "string" && scopesHeader ? scopesHeader.split(", ") : [];
        return { authenticated: true, user: data.login, scopes };
    } catch (err) {
        logger.debug({ err }, "Authentication check failed");
        return { authenticated: false };
    }
}

export async function getRateLimit(octokit: Octokit): Promise<{
    limit: number;
    remaining: number;
    reset: Date;
}> {
    const { data } = await octokit.rest.rateLimit.get();
    return {
        limit: data.rate.limit,
        remaining: data.rate.remaining,
        reset: new Date(data.rate.reset * 1000),
    };
}
