// Error taxonomy for review-comments operations

export type FailureKind = "lookup" | "transport" | "parse" | "permission" | "precondition";

export interface FailureOptions {
    /** Commands or steps the user can try next */
    hint?: string[];
    cause?: unknown;
}

export class ReviewCommentsError extends Error {
    readonly kind: FailureKind;
    readonly hint: string[];

    constructor(kind: FailureKind, message: string, options: FailureOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = "ReviewCommentsError";
        this.kind = kind;
        this.hint = options.hint ?? [];
    }
}

/** No pull request (or review thread) could be found */
export class LookupFailure extends ReviewCommentsError {
    constructor(message: string, options?: FailureOptions) {
        super("lookup", message, options);
        this.name = "LookupFailure";
    }
}

/** A REST or GraphQL call returned a failure */
export class TransportFailure extends ReviewCommentsError {
    readonly status?: number;

    constructor(message: string, options: FailureOptions & { status?: number } = {}) {
        super("transport", message, options);
        this.name = "TransportFailure";
        this.status = options.status;
    }
}

/** A response did not have the expected shape */
export class ParseFailure extends ReviewCommentsError {
    constructor(message: string, options?: FailureOptions) {
        super("parse", message, options);
        this.name = "ParseFailure";
    }
}

/** A mutation was rejected, usually for lack of write access */
export class PermissionFailure extends ReviewCommentsError {
    constructor(message: string, options?: FailureOptions) {
        super("permission", message, options);
        this.name = "PermissionFailure";
    }
}

/** The action cannot be applied to this comment */
export class PreconditionFailure extends ReviewCommentsError {
    constructor(message: string, options?: FailureOptions) {
        super("precondition", message, options);
        this.name = "PreconditionFailure";
    }
}
