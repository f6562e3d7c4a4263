import { Octokit, RequestError } from "octokit";
import { NO_TOKEN_HINT } from "@app/utils/github/octokit";
import { describe, expect, it, vi } from "vitest";
import { isPendingReviewConflict, isPermissionDenied, OctokitGateway, toGatewayFailure } from "../gateway";
import { fail } from "./test-utils";

function jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function requestUrl(input: string | URL | Request): URL {
    if (typeof input === "string") {
        return new URL(input);
    }
    return input instanceof URL ? input : new URL(input.url);
}

function fakeOctokit(handler: (url: URL) => Promise<Response>) {
    const fetch = vi.fn(async (input: string | URL | Request) => handler(requestUrl(input)));
    return { fetch, octokit: new Octokit({ auth: "test-secret", request: { fetch } }) };
}

describe("toGatewayFailure", () => {
    it("keeps the HTTP status of request errors", () => {
        const error = new RequestError("Bad credentials", 401, {
            request: { method: "GET", url: "https://api.github.com/user", headers: {} },
        });
        expect(toGatewayFailure(error)).toEqual({ ok: false, status: 401, message: "Bad credentials" });
    });

    it("collects GraphQL error types", () => {
        const error = { errors: [{ type: "FORBIDDEN", message: "Resource not accessible by integration" }] };
        expect(toGatewayFailure(error)).toEqual({
            ok: false,
            message: "Resource not accessible by integration",
            errorTypes: ["FORBIDDEN"],
        });
    });

    it("falls back to the error message", () => {
        expect(toGatewayFailure(new Error("socket hang up"))).toEqual({ ok: false, message: "socket hang up" });
    });
});

describe("failure classification", () => {
    it("recognises permission problems", () => {
        expect(isPermissionDenied(fail("Forbidden", { status: 403 }))).toBe(true);
        expect(isPermissionDenied(fail("nope", { errorTypes: ["FORBIDDEN"] }))).toBe(true);
        expect(isPermissionDenied(fail("Resource not accessible by integration"))).toBe(true);
        expect(isPermissionDenied(fail("Not Found", { status: 404 }))).toBe(false);
    });

    it("recognises a pending review conflict", () => {
        expect(isPendingReviewConflict(fail("User can only have one pending review per pull request"))).toBe(true);
        expect(isPendingReviewConflict(fail("Validation Failed"))).toBe(false);
    });
});

describe("OctokitGateway", () => {
    it("pages until a short page", async () => {
        const { fetch, octokit } = fakeOctokit(async (url) => {
            const page = url.searchParams.get("page");
            const size = page === "1" ? 100 : 3;
            return jsonResponse(Array.from({ length: size }, (_, i) => ({ id: i })));
        });
        const gateway = new OctokitGateway({ octokit });

        const result = await gateway.rest(
            { method: "GET", path: "/repos/octo/widgets/pulls/42/comments" },
            { paginate: true }
        );

        expect(result.ok && Array.isArray(result.data) ? result.data.length : -1).toBe(103);
        expect(fetch).toHaveBeenCalledTimes(2);
    });

    it("returns HTTP errors as failures", async () => {
        const { octokit } = fakeOctokit(async () => jsonResponse({ message: "Not Found" }, 404));
        const gateway = new OctokitGateway({ octokit });

        const result = await gateway.rest({ method: "POST", path: "/repos/octo/widgets/pulls/42/reviews", body: {} });

        expect(result.ok).toBe(false);
        expect(result.ok ? undefined : result.status).toBe(404);
    });

    it("reports GraphQL errors with their types", async () => {
        const { octokit } = fakeOctokit(async () =>
            jsonResponse({ data: null, errors: [{ type: "FORBIDDEN", message: "Resource not accessible by integration" }] })
        );
        const gateway = new OctokitGateway({ octokit });

        const result = await gateway.graphql("mutation { noop }");

        expect(result).toEqual({
            ok: false,
            message: "Resource not accessible by integration",
            errorTypes: ["FORBIDDEN"],
        });
    });

    it("fails calls that outlive the timeout", async () => {
        const { octokit } = fakeOctokit(() => new Promise<Response>(() => {}));
        const gateway = new OctokitGateway({ octokit, timeoutMs: 20 });

        const result = await gateway.rest({ method: "GET", path: "/repos/octo/widgets/pulls/42/comments" });

        expect(result).toEqual({ ok: false, message: "GitHub request timed out after 20ms" });
    });

    it("points at the missing token when an anonymous call is denied", async () => {
        const { octokit } = fakeOctokit(async () => jsonResponse({ message: "Requires authentication" }, 401));
        const gateway = new OctokitGateway({ octokit, authenticated: false });

        const result = await gateway.rest({ method: "POST", path: "/repos/octo/widgets/pulls/42/comments/7/replies" });

        expect(result.ok ? undefined : result.hint).toEqual(NO_TOKEN_HINT);
    });

    it("adds no token hint when a token was used", async () => {
        const { octokit } = fakeOctokit(async () => jsonResponse({ message: "Requires authentication" }, 401));
        const gateway = new OctokitGateway({ octokit });

        const result = await gateway.rest({ method: "POST", path: "/repos/octo/widgets/pulls/42/comments/7/replies" });

        expect(result.ok ? undefined : result.hint).toBeUndefined();
    });
});
