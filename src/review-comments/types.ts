// review-comments tool types

import type { RepoRef } from "@app/utils/github/url-parser";

export type DiffSide = "LEFT" | "RIGHT";

/**
 * One inline review comment as returned by the REST pulls/comments endpoint.
 * The positional fields overlap and GitHub fills them inconsistently;
 * `resolveCommentLine` picks between them.
 */
export interface ReviewComment {
    id: number;
    /** Null for comments that do not belong to a review; those cannot be replied to or resolved */
    reviewId: number | null;
    path: string;
    diffHunk: string;
    line: number | null;
    originalLine: number | null;
    startLine: number | null;
    position: number | null;
    originalPosition: number | null;
    side: DiffSide;
    author: string;
    body: string;
    createdAt: string;
    htmlUrl: string;
    /** Explicit resolution fields, when the payload carries them */
    resolvedAt: string | null;
    resolved: boolean | null;
}

export interface ThreadReply {
    author: string;
    body: string;
    createdAt: string;
}

/** A thread starter with its replies folded in */
export interface MergedComment extends ReviewComment {
    isResolved: boolean;
    replies: ThreadReply[];
}

export interface ReviewThreadCommentNode {
    id: string;
    databaseId: number | null;
    body: string;
    author: string;
    createdAt: string;
}

export interface ReviewThreadNode {
    id: string;
    isResolved: boolean;
    comments: ReviewThreadCommentNode[];
}

export type EntrySeverity = "warning" | "info";

export interface DisplayEntry {
    /** 1-based display index, valid only for the list it belongs to */
    index: number;
    commentId: number;
    file: string;
    line: number;
    severity: EntrySeverity;
    resolved: boolean;
    text: string;
}

export interface CommentDetail {
    index: number;
    commentId: number;
    path: string;
    author: string;
    body: string;
    url: string;
    createdAt: string;
    diffHunk: string;
    positionSummary: string;
    resolvedLine: number;
    isResolved: boolean;
    replies: ThreadReply[];
}

export interface ReviewList {
    prNumber: number;
    repo: RepoRef;
    title: string;
    status: string;
    entries: DisplayEntry[];
    total: number;
    hiddenResolved: number;
}

export interface FormatOptions {
    maxLength: number;
    snippetLength: number;
    showFull: boolean;
    botAuthors: string[];
}

export type ListOutputFormat = "terminal" | "json" | "qf";

export interface CommonCommandOptions {
    repo?: string;
    pr?: string;
    all?: boolean;
    full?: boolean;
    maxLength?: string;
    verbose?: boolean;
}

export interface ListCommandOptions extends CommonCommandOptions {
    format?: ListOutputFormat;
}

export interface ShowCommandOptions extends CommonCommandOptions {
    json?: boolean;
}
