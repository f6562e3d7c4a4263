// Thread Action Engine - resolve, unresolve and reply with endpoint fallbacks

import logger from "@app/logger";
import {
    LookupFailure,
    ParseFailure,
    PermissionFailure,
    PreconditionFailure,
    TransportFailure,
} from "@app/review-comments/lib/errors";
import type { GatewayFailure, GatewayResult, HostingGateway, RestRequest } from "@app/review-comments/lib/gateway";
import { isPendingReviewConflict, isPermissionDenied } from "@app/review-comments/lib/gateway";
import { resolveCommentLine } from "@app/review-comments/lib/location";
import { fetchReviewThreads, findThreadForComment, setThreadResolved } from "@app/review-comments/lib/review-threads";
import type { ReviewComment } from "@app/review-comments/types";
import type { RepoRef } from "@app/utils/github/url-parser";
import { z } from "zod";

export interface ThreadActionContext {
    repo: RepoRef;
    prNumber: number;
    comment: ReviewComment;
}

export interface ReplyContext extends ThreadActionContext {
    body: string;
}

export interface ThreadStateResult {
    changed: boolean;
    isResolved: boolean;
    threadId: string;
    message: string;
}

export interface ReplyResult {
    /** Strategy that succeeded */
    strategy: string;
    /** Every strategy tried, in order */
    attempts: string[];
    data: unknown;
}

/**
 * Builds one request of a strategy from the context and the previous step's
 * response (undefined for the first step).
 */
export type ReplyStep = (context: ReplyContext, previous: unknown) => RestRequest;

export interface ReplyStrategy {
    name: string;
    steps: ReplyStep[];
}

function pullPath(context: ThreadActionContext): string {
    return `/repos/${context.repo.owner}/${context.repo.repo}/pulls/${context.prNumber}`;
}

function singleReviewComment(context: ReplyContext): Record<string, unknown> {
    return {
        path: context.comment.path,
        line: resolveCommentLine(context.comment),
        side: context.comment.side,
        body: context.body,
    };
}

const createdReviewSchema = z.object({ id: z.number().int() });

export const REPLIES_ENDPOINT: ReplyStrategy = {
    name: "replies-endpoint",
    steps: [
        (context) => ({
            method: "POST",
            path: `${pullPath(context)}/comments/${context.comment.id}/replies`,
            body: { body: context.body },
        }),
    ],
};

export const IN_REPLY_TO: ReplyStrategy = {
    name: "in-reply-to",
    steps: [
        (context) => ({
            method: "POST",
            path: `${pullPath(context)}/comments`,
            body: { body: context.body, in_reply_to: context.comment.id },
        }),
    ],
};

export const PENDING_REVIEW: ReplyStrategy = {
    name: "pending-review",
    steps: [
        // No event: the review is created PENDING
        (context) => ({
            method: "POST",
            path: `${pullPath(context)}/reviews`,
            body: { comments: [singleReviewComment(context)] },
        }),
        (context, previous) => {
            const review = createdReviewSchema.safeParse(previous);
            if (!review.success) {
                throw new ParseFailure("Pending review response has no id", { cause: review.error });
            }
            return {
                method: "POST",
                path: `${pullPath(context)}/reviews/${review.data.id}/events`,
                body: { event: "COMMENT" },
            };
        },
    ],
};

export const NEW_REVIEW: ReplyStrategy = {
    name: "new-review",
    steps: [
        (context) => ({
            method: "POST",
            path: `${pullPath(context)}/reviews`,
            body: { event: "COMMENT", comments: [singleReviewComment(context)] },
        }),
    ],
};

/**
 * Strategies to try after the replies endpoint failed.
 */
export function fallbackStrategiesFor(failure: GatewayFailure): ReplyStrategy[] {
    return isPendingReviewConflict(failure) ? [IN_REPLY_TO, PENDING_REVIEW] : [NEW_REVIEW];
}

function requireReviewId(comment: ReviewComment, action: string): void {
    if (comment.reviewId === null) {
        throw new PreconditionFailure(
            `Cannot ${action} comment ${comment.id}: it is not part of a pull request review`
        );
    }
}

export class ThreadActions {
    constructor(private readonly gateway: HostingGateway) {}

    resolve(context: ThreadActionContext): Promise<ThreadStateResult> {
        return this.setResolution(context, true);
    }

    unresolve(context: ThreadActionContext): Promise<ThreadStateResult> {
        return this.setResolution(context, false);
    }

    /**
     * Post a reply. The replies endpoint goes first; fallbacks depend on how it failed.
     * The first strategy that succeeds ends the chain.
     */
    async reply(context: ThreadActionContext, body: string): Promise<ReplyResult> {
        requireReviewId(context.comment, "reply to");
        if (!body.trim()) {
            throw new PreconditionFailure("Reply text is empty");
        }

        const replyContext: ReplyContext = { ...context, body };
        const attempts: string[] = [];

        const primary = await this.runStrategy(REPLIES_ENDPOINT, replyContext);
        attempts.push(REPLIES_ENDPOINT.name);
        if (primary.ok) {
            return { strategy: REPLIES_ENDPOINT.name, attempts, data: primary.data };
        }

        logger.debug({ commentId: context.comment.id, failure: primary }, "Replies endpoint failed, trying fallbacks");

        let lastFailure: GatewayFailure = primary;
        for (const strategy of fallbackStrategiesFor(primary)) {
            const result = await this.runStrategy(strategy, replyContext);
            attempts.push(strategy.name);
            if (result.ok) {
                logger.debug({ commentId: context.comment.id, strategy: strategy.name }, "Reply posted via fallback");
                return { strategy: strategy.name, attempts, data: result.data };
            }
            lastFailure = result;
        }

        const message = `Reply to comment ${context.comment.id} failed (tried ${attempts.join(", ")}): ${lastFailure.message}`;
        if (isPermissionDenied(lastFailure)) {
            throw new PermissionFailure(message, {
                hint: [...(lastFailure.hint ?? []), "Check the token scopes with: gh auth status"],
            });
        }
        throw new TransportFailure(message, { status: lastFailure.status });
    }

    /**
     * Run a strategy's steps in order; the first failing step fails the strategy.
     */
    private async runStrategy(strategy: ReplyStrategy, context: ReplyContext): Promise<GatewayResult> {
        let previous: unknown;
        for (const step of strategy.steps) {
            let request: RestRequest;
            try {
                request = step(context, previous);
            } catch (error) {
                return { ok: false, message: error instanceof Error ? error.message : String(error) };
            }

            const result = await this.gateway.rest(request);
            if (!result.ok) {
                return result;
            }
            previous = result.data;
        }
        return { ok: true, data: previous };
    }

    private async setResolution(context: ThreadActionContext, resolved: boolean): Promise<ThreadStateResult> {
        const action = resolved ? "resolve" : "unresolve";
        requireReviewId(context.comment, action);

        const threads = await fetchReviewThreads(this.gateway, { ...context.repo, number: context.prNumber });
        const thread = findThreadForComment(threads, context.comment.id);
        if (!thread) {
            throw new LookupFailure(`No review thread contains comment ${context.comment.id}`);
        }

        if (thread.isResolved === resolved) {
            return {
                changed: false,
                isResolved: thread.isResolved,
                threadId: thread.id,
                message: `Thread is already ${resolved ? "resolved" : "unresolved"}`,
            };
        }

        const isResolved = await setThreadResolved(this.gateway, thread.id, resolved);
        logger.debug({ threadId: thread.id, isResolved }, `Thread ${action}d`);

        return {
            changed: true,
            isResolved,
            threadId: thread.id,
            message: `Thread ${resolved ? "resolved" : "unresolved"}`,
        };
    }
}
