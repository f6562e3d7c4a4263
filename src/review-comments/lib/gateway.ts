// Hosting gateway - the only place that talks to the GitHub API.
// Every call returns a GatewayResult instead of throwing, so callers decide
// between aborting and falling back.

import logger from "@app/logger";
import { withTimeout } from "@app/utils/async";
import { NO_TOKEN_HINT } from "@app/utils/github/octokit";
import { type Octokit, RequestError } from "octokit";
import { z } from "zod";

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

export interface RestRequest {
    method: HttpMethod;
    /** Path relative to the API root, e.g. /repos/octo/widgets/pulls/1/comments */
    path: string;
    body?: Record<string, unknown>;
}

export interface GatewayFailure {
    ok: false;
    message: string;
    status?: number;
    /** GraphQL error types (FORBIDDEN, NOT_FOUND, ...) when the API reported any */
    errorTypes?: string[];
    /** Next steps to pass on to the user */
    hint?: string[];
}

export type GatewayResult<T = unknown> = { ok: true; data: T } | GatewayFailure;

export interface HostingGateway {
    rest(request: RestRequest, options?: { paginate?: boolean }): Promise<GatewayResult>;
    graphql(query: string, variables?: Record<string, unknown>): Promise<GatewayResult>;
}

const PER_PAGE = 100;
const MAX_PAGES = 50;

const graphqlErrorsSchema = z.array(
    z.object({
        type: z.string().optional(),
        message: z.string(),
    })
);

export function toGatewayFailure(error: unknown): GatewayFailure {
    if (error instanceof RequestError) {
        return { ok: false, status: error.status, message: error.message };
    }

    if (typeof error === "object" && error !== null && "errors" in error) {
        const parsed = graphqlErrorsSchema.safeParse(error.errors);
        if (parsed.success && parsed.data.length > 0) {
            return {
                ok: false,
                message: parsed.data.map((e) => e.message).join("; "),
                errorTypes: parsed.data.flatMap((e) => (e.type ? [e.type] : [])),
            };
        }
    }

    return { ok: false, message: error instanceof Error ? error.message : String(error) };
}

/**
 * True when the API rejected the call for lack of access rather than a bad request.
 */
export function isPermissionDenied(failure: GatewayFailure): boolean {
    if (failure.status === 401 || failure.status === 403) {
        return true;
    }
    if (failure.errorTypes?.includes("FORBIDDEN")) {
        return true;
    }
    return /resource not accessible|must have (?:write|push|admin)|permission/i.test(failure.message);
}

/**
 * GitHub allows one pending review per user per PR; a reply made while one is
 * open fails with a message about it.
 */
export function isPendingReviewConflict(failure: GatewayFailure): boolean {
    return /pending review/i.test(failure.message);
}

export interface OctokitGatewayOptions {
    octokit: Octokit;
    /** Per-call timeout; 0 waits indefinitely */
    timeoutMs?: number;
    /** False when the client runs without a token; denied calls then say so */
    authenticated?: boolean;
}

export class OctokitGateway implements HostingGateway {
    private readonly octokit: Octokit;
    private readonly timeoutMs: number;
    private readonly authenticated: boolean;

    constructor(options: OctokitGatewayOptions) {
        this.octokit = options.octokit;
        this.timeoutMs = options.timeoutMs ?? 0;
        this.authenticated = options.authenticated ?? true;
    }

    async rest(request: RestRequest, options?: { paginate?: boolean }): Promise<GatewayResult> {
        const route = `${request.method} ${request.path}`;
        logger.debug({ route, paginate: options?.paginate ?? false }, "REST request");

        try {
            if (!options?.paginate) {
                const response = await this.withTimeout(this.octokit.request(route, request.body ?? {}));
                return { ok: true, data: response.data };
            }

            const items: unknown[] = [];
            for (let page = 1; page <= MAX_PAGES; page++) {
                const response = await this.withTimeout(
                    this.octokit.request(route, { ...request.body, per_page: PER_PAGE, page })
                );
                const data: unknown = response.data;
                if (!Array.isArray(data)) {
                    return { ok: true, data };
                }
                items.push(...data);
                if (data.length < PER_PAGE) {
                    break;
                }
            }
            return { ok: true, data: items };
        } catch (error) {
            const failure = this.toFailure(error);
            logger.debug({ route, failure }, "REST request failed");
            return failure;
        }
    }

    async graphql(query: string, variables: Record<string, unknown> = {}): Promise<GatewayResult> {
        try {
            const data = await this.withTimeout(this.octokit.graphql<unknown>(query, variables));
            return { ok: true, data };
        } catch (error) {
            const failure = this.toFailure(error);
            logger.debug({ failure }, "GraphQL request failed");
            return failure;
        }
    }

    private toFailure(error: unknown): GatewayFailure {
        const failure = toGatewayFailure(error);
        if (!this.authenticated && isPermissionDenied(failure)) {
            return { ...failure, hint: NO_TOKEN_HINT };
        }
        return failure;
    }

    private withTimeout<T>(promise: Promise<T>): Promise<T> {
        if (this.timeoutMs <= 0) {
            return promise;
        }
        return withTimeout(promise, this.timeoutMs, new Error(`GitHub request timed out after ${this.timeoutMs}ms`));
    }
}
