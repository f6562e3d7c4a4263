// Comment Fetcher - REST review comments merged with GraphQL thread state

import logger from "@app/logger";
import { ParseFailure, TransportFailure } from "@app/review-comments/lib/errors";
import type { HostingGateway } from "@app/review-comments/lib/gateway";
import type { RepoResolver } from "@app/review-comments/lib/repo";
import { fetchReviewThreads } from "@app/review-comments/lib/review-threads";
import type { MergedComment, ReviewComment, ReviewThreadNode, ThreadReply } from "@app/review-comments/types";
import type { RepoRef } from "@app/utils/github/url-parser";
import { z } from "zod";

// =============================================================================
// REST payload
// =============================================================================

const restReviewCommentSchema = z.object({
    id: z.number().int(),
    pull_request_review_id: z.number().int().nullish(),
    path: z.string(),
    diff_hunk: z.string().nullish(),
    line: z.number().int().nullish(),
    original_line: z.number().int().nullish(),
    start_line: z.number().int().nullish(),
    position: z.number().int().nullish(),
    original_position: z.number().int().nullish(),
    side: z.enum(["LEFT", "RIGHT"]).nullish(),
    user: z.object({ login: z.string() }).nullish(),
    body: z.string().nullish(),
    created_at: z.string(),
    html_url: z.string().nullish(),
    resolved_at: z.string().nullish(),
    resolved: z.boolean().nullish(),
});

export type RestReviewComment = z.input<typeof restReviewCommentSchema>;

/**
 * Validate and normalise the pulls/{n}/comments payload.
 */
export function parseReviewComments(data: unknown): ReviewComment[] {
    const parsed = z.array(restReviewCommentSchema).safeParse(data);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ParseFailure(
            `Unexpected review comments response${issue ? ` at ${issue.path.join(".")}: ${issue.message}` : ""}`,
            { cause: parsed.error }
        );
    }

    return parsed.data.map((c) => ({
        id: c.id,
        reviewId: c.pull_request_review_id ?? null,
        path: c.path,
        diffHunk: c.diff_hunk ?? "",
        line: c.line ?? null,
        originalLine: c.original_line ?? null,
        startLine: c.start_line ?? null,
        position: c.position ?? null,
        originalPosition: c.original_position ?? null,
        side: c.side ?? "RIGHT",
        author: c.user?.login ?? "Unknown",
        body: c.body ?? "",
        createdAt: c.created_at,
        htmlUrl: c.html_url ?? "",
        resolvedAt: c.resolved_at ?? null,
        resolved: c.resolved ?? null,
    }));
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Fold thread replies into their starters.
 *
 * Every comment after the first in a thread is a reply and is dropped from the
 * top level; the first comment gets the thread's replies and resolution flag.
 * Comments no thread mentions keep `isResolved: false` and no replies.
 */
export function mergeReviewThreads(comments: ReviewComment[], threads: ReviewThreadNode[]): MergedComment[] {
    const replyIds = new Set<number>();
    const starters = new Map<number, { isResolved: boolean; replies: ThreadReply[] }>();

    for (const thread of threads) {
        const [first, ...rest] = thread.comments;
        if (!first) {
            continue;
        }

        for (const reply of rest) {
            if (reply.databaseId !== null) {
                replyIds.add(reply.databaseId);
            }
        }

        if (first.databaseId !== null) {
            starters.set(first.databaseId, {
                isResolved: thread.isResolved,
                replies: rest.map(({ author, body, createdAt }) => ({ author, body, createdAt })),
            });
        }
    }

    return comments
        .filter((c) => !replyIds.has(c.id))
        .map((c) => {
            const thread = starters.get(c.id);
            return {
                ...c,
                isResolved: thread?.isResolved ?? false,
                replies: thread?.replies ?? [],
            };
        });
}

/** Unenriched view used when thread data is unavailable */
export function withoutThreads(comments: ReviewComment[]): MergedComment[] {
    return comments.map((c) => ({ ...c, isResolved: false, replies: [] }));
}

// =============================================================================
// Session cache
// =============================================================================

interface CacheEntry {
    repo: RepoRef;
    prNumber: number;
    comments: MergedComment[];
}

/**
 * Last successful fetch, one PR deep, in process memory only.
 */
export class SessionCache {
    private entry: CacheEntry | null = null;

    get(repo: RepoRef, prNumber: number): MergedComment[] | undefined {
        const entry = this.entry;
        if (!entry || entry.prNumber !== prNumber || !sameRepo(entry.repo, repo)) {
            return undefined;
        }
        return entry.comments;
    }

    set(repo: RepoRef, prNumber: number, comments: MergedComment[]): void {
        this.entry = { repo, prNumber, comments };
    }

    get prNumber(): number | null {
        return this.entry?.prNumber ?? null;
    }

    invalidate(): void {
        this.entry = null;
    }

    /**
     * Record a thread state change made through the action engine.
     */
    markResolved(commentId: number, isResolved: boolean): void {
        if (!this.entry) {
            return;
        }
        this.entry = {
            ...this.entry,
            comments: this.entry.comments.map((c) => (c.id === commentId ? withResolution(c, isResolved) : c)),
        };
    }
}

/**
 * Apply a thread state. Unresolving also clears the REST resolution fields so
 * they cannot keep the comment classified as resolved.
 */
export function withResolution(comment: MergedComment, isResolved: boolean): MergedComment {
    return isResolved ? { ...comment, isResolved } : { ...comment, isResolved, resolvedAt: null, resolved: null };
}

function sameRepo(a: RepoRef, b: RepoRef): boolean {
    return a.owner.toLowerCase() === b.owner.toLowerCase() && a.repo.toLowerCase() === b.repo.toLowerCase();
}

// =============================================================================
// Fetcher
// =============================================================================

export interface FetchOptions {
    forceRefresh?: boolean;
}

export class CommentFetcher {
    constructor(
        private readonly gateway: HostingGateway,
        private readonly repoResolver: Pick<RepoResolver, "resolve">,
        readonly cache: SessionCache = new SessionCache()
    ) {}

    /**
     * Thread starters for a PR, with replies and resolution attached.
     * Served from the session cache unless `forceRefresh` is set.
     */
    async fetch(prNumber: number, options: FetchOptions = {}): Promise<MergedComment[]> {
        const repo = await this.repoResolver.resolve();

        if (!options.forceRefresh) {
            const cached = this.cache.get(repo, prNumber);
            if (cached) {
                logger.debug({ prNumber, count: cached.length }, "Using cached review comments");
                return cached;
            }
        }

        const ref = { ...repo, number: prNumber };
        const result = await this.gateway.rest(
            { method: "GET", path: `/repos/${repo.owner}/${repo.repo}/pulls/${prNumber}/comments` },
            { paginate: true }
        );

        if (!result.ok) {
            throw new TransportFailure(`Failed to fetch review comments for PR #${prNumber}: ${result.message}`, {
                status: result.status,
                hint: [
                    ...(result.hint ?? []),
                    `gh api repos/${repo.owner}/${repo.repo}/pulls/${prNumber}/comments`,
                    "gh auth status",
                ],
            });
        }

        const comments = parseReviewComments(result.data);

        let merged: MergedComment[];
        try {
            const threads = await fetchReviewThreads(this.gateway, ref);
            merged = mergeReviewThreads(comments, threads);
        } catch (error) {
            logger.warn(
                { error: error instanceof Error ? error.message : String(error), prNumber },
                "Review thread data unavailable; showing comments without thread state"
            );
            merged = withoutThreads(comments);
        }

        logger.debug({ prNumber, rest: comments.length, shown: merged.length }, "Fetched review comments");
        this.cache.set(repo, prNumber, merged);
        return merged;
    }
}
