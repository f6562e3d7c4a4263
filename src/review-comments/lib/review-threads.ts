// Review thread GraphQL access - thread listing and resolve/unresolve mutations

import { LookupFailure, ParseFailure, PermissionFailure, TransportFailure } from "@app/review-comments/lib/errors";
import { type HostingGateway, isPermissionDenied } from "@app/review-comments/lib/gateway";
import type { ReviewThreadNode } from "@app/review-comments/types";
import type { PullRequestRef } from "@app/utils/github/url-parser";
import { z } from "zod";

// =============================================================================
// GraphQL Queries
// =============================================================================

// One window of 100 threads x 100 comments; anything beyond it is not fetched
export const REVIEW_THREADS_QUERY = `
  query($owner: String!, $repo: String!, $pr: Int!) {
    repository(owner: $owner, name: $repo) {
      pullRequest(number: $pr) {
        reviewThreads(first: 100) {
          nodes {
            id
            isResolved
            comments(first: 100) {
              nodes {
                id
                databaseId
                body
                author {
                  login
                }
                createdAt
              }
            }
          }
        }
      }
    }
  }
`;

const RESOLVE_THREAD_MUTATION = `
  mutation($threadId: ID!) {
    resolveReviewThread(input: {threadId: $threadId}) {
      thread {
        isResolved
      }
    }
  }
`;

const UNRESOLVE_THREAD_MUTATION = `
  mutation($threadId: ID!) {
    unresolveReviewThread(input: {threadId: $threadId}) {
      thread {
        isResolved
      }
    }
  }
`;

// =============================================================================
// GraphQL Response Schemas
// =============================================================================

const threadCommentNodeSchema = z.object({
    id: z.string(),
    databaseId: z.number().int().nullable(),
    body: z.string().nullable(),
    author: z.object({ login: z.string() }).nullable(),
    createdAt: z.string(),
});

const threadNodeSchema = z.object({
    id: z.string(),
    isResolved: z.boolean(),
    comments: z.object({
        nodes: z.array(threadCommentNodeSchema.nullable()),
    }),
});

const reviewThreadsResponseSchema = z.object({
    repository: z
        .object({
            pullRequest: z
                .object({
                    reviewThreads: z.object({
                        nodes: z.array(threadNodeSchema.nullable()),
                    }),
                })
                .nullable(),
        })
        .nullable(),
});

const threadMutationPayloadSchema = z.object({
    thread: z.object({ isResolved: z.boolean() }),
});

const resolveResponseSchema = z.object({ resolveReviewThread: threadMutationPayloadSchema });
const unresolveResponseSchema = z.object({ unresolveReviewThread: threadMutationPayloadSchema });

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a review-threads query response into thread nodes.
 * Null nodes (deleted or inaccessible) are skipped.
 */
export function parseReviewThreadsResponse(data: unknown, ref: PullRequestRef): ReviewThreadNode[] {
    const parsed = reviewThreadsResponseSchema.safeParse(data);
    if (!parsed.success) {
        throw new ParseFailure(`Unexpected review threads response: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
            cause: parsed.error,
        });
    }

    const pullRequest = parsed.data.repository?.pullRequest;
    if (!pullRequest) {
        throw new LookupFailure(`PR #${ref.number} not found in ${ref.owner}/${ref.repo}`);
    }

    const threads: ReviewThreadNode[] = [];
    for (const node of pullRequest.reviewThreads.nodes) {
        if (!node) {
            continue;
        }
        threads.push({
            id: node.id,
            isResolved: node.isResolved,
            comments: node.comments.nodes.flatMap((c) =>
                c
                    ? [
                          {
                              id: c.id,
                              databaseId: c.databaseId,
                              body: c.body ?? "",
                              author: c.author?.login ?? "Unknown",
                              createdAt: c.createdAt,
                          },
                      ]
                    : []
            ),
        });
    }
    return threads;
}

// =============================================================================
// Fetching
// =============================================================================

/**
 * Fetch review threads for a PR. Not cached: every caller gets a fresh view.
 */
export async function fetchReviewThreads(gateway: HostingGateway, ref: PullRequestRef): Promise<ReviewThreadNode[]> {
    const result = await gateway.graphql(REVIEW_THREADS_QUERY, {
        owner: ref.owner,
        repo: ref.repo,
        pr: ref.number,
    });

    if (!result.ok) {
        throw new TransportFailure(`Failed to fetch review threads: ${result.message}`, {
            status: result.status,
            hint: result.hint,
        });
    }

    return parseReviewThreadsResponse(result.data, ref);
}

/**
 * Find the thread whose comments include the given REST comment id.
 */
export function findThreadForComment(threads: ReviewThreadNode[], commentId: number): ReviewThreadNode | undefined {
    return threads.find((thread) => thread.comments.some((c) => c.databaseId === commentId));
}

// =============================================================================
// Mutations
// =============================================================================

/**
 * Resolve or unresolve a review thread.
 * @returns the thread's resolution state reported by the API
 */
export async function setThreadResolved(gateway: HostingGateway, threadId: string, resolved: boolean): Promise<boolean> {
    const result = await gateway.graphql(resolved ? RESOLVE_THREAD_MUTATION : UNRESOLVE_THREAD_MUTATION, { threadId });
    const action = resolved ? "resolve" : "unresolve";

    if (!result.ok) {
        if (isPermissionDenied(result)) {
            throw new PermissionFailure(`Not allowed to ${action} thread ${threadId}: ${result.message}`, {
                hint: [
                    ...(result.hint ?? []),
                    "Resolving threads needs write access to the repository.",
                    "Check the token scopes with: gh auth status",
                ],
            });
        }
        throw new TransportFailure(`Failed to ${action} thread ${threadId}: ${result.message}`, {
            status: result.status,
        });
    }

    if (resolved) {
        const parsed = resolveResponseSchema.safeParse(result.data);
        if (!parsed.success) {
            throw new ParseFailure("Unexpected resolveReviewThread response", { cause: parsed.error });
        }
        return parsed.data.resolveReviewThread.thread.isResolved;
    }

    const parsed = unresolveResponseSchema.safeParse(result.data);
    if (!parsed.success) {
        throw new ParseFailure("Unexpected unresolveReviewThread response", { cause: parsed.error });
    }
    return parsed.data.unresolveReviewThread.thread.isResolved;
}
