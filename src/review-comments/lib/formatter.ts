// Comment Formatter - one display line per thread starter, full detail on the side

import { describePositionFields, resolveCommentLine } from "@app/review-comments/lib/location";
import type {
    CommentDetail,
    DisplayEntry,
    EntrySeverity,
    FormatOptions,
    MergedComment,
    ThreadReply,
} from "@app/review-comments/types";
import { truncateText } from "@app/utils/string";

export const RESOLVED_TAG = "[RESOLVED]";

/** Replies shown inline; earlier ones collapse into a count */
const VISIBLE_REPLIES = 2;

/**
 * Flatten a markdown comment body onto one line.
 * Suggestion blocks become `[suggestion]`, other fenced blocks `[code]`.
 */
export function cleanCommentBody(body: string): string {
    return body
        .replace(/```suggestion[^\S\r\n]*\r?\n[\s\S]*?```/g, "[suggestion]")
        .replace(/```[\s\S]*?```/g, "[code]")
        .replace(/\r?\n/g, " ")
        .replace(/\s+/g, " ")
        .trim();
}

/**
 * ` [+N more] [↪ author: snippet] [↪ author: snippet]` for the last two replies.
 */
export function summarizeReplies(replies: ThreadReply[], snippetLength: number): string {
    if (replies.length === 0) {
        return "";
    }

    const hidden = replies.length - VISIBLE_REPLIES;
    const marker = hidden > 0 ? ` [+${hidden} more]` : "";
    const shown = replies
        .slice(-VISIBLE_REPLIES)
        .map((r) => ` [↪ ${r.author}: ${truncateText(cleanCommentBody(r.body), snippetLength)}]`)
        .join("");

    return `${marker}${shown}`;
}

/**
 * Resolved when any of the explicit resolution fields or the thread flag says so.
 */
export function isCommentResolved(comment: MergedComment): boolean {
    return comment.resolvedAt !== null || comment.resolved === true || comment.isResolved;
}

export function classifySeverity(author: string, botAuthors: string[]): EntrySeverity {
    const login = author.toLowerCase();
    return botAuthors.some((bot) => bot.toLowerCase() === login) ? "info" : "warning";
}

export function renderEntryLine(index: number, author: string, text: string, resolved: boolean): string {
    return `[${index}] ${resolved ? `${RESOLVED_TAG} ` : ""}${author}: ${text}`;
}

/** Insert the resolved tag after the `[N] ` prefix, once */
export function addResolvedTag(line: string): string {
    const match = line.match(/^(\[\d+\] )(.*)$/s);
    if (!match) {
        return line.startsWith(`${RESOLVED_TAG} `) ? line : `${RESOLVED_TAG} ${line}`;
    }
    const [, prefix, rest] = match;
    return rest.startsWith(`${RESOLVED_TAG} `) ? line : `${prefix}${RESOLVED_TAG} ${rest}`;
}

/** Remove a leading resolved tag (after the `[N] ` prefix) */
export function stripResolvedTag(line: string): string {
    const match = line.match(/^(\[\d+\] )?\[RESOLVED\] (.*)$/s);
    if (!match) {
        return line;
    }
    return `${match[1] ?? ""}${match[2]}`;
}

/**
 * Text after `author: `: cleaned body plus reply summary, truncated unless showing full.
 */
export function formatCommentText(comment: MergedComment, options: FormatOptions): string {
    const text = `${cleanCommentBody(comment.body)}${summarizeReplies(comment.replies, options.snippetLength)}`;
    return options.showFull ? text : truncateText(text, options.maxLength);
}

/**
 * Format one comment for the list and record its detail at `index`.
 */
export function formatComment(
    comment: MergedComment,
    index: number,
    options: FormatOptions,
    details: Map<number, CommentDetail>
): DisplayEntry {
    const line = resolveCommentLine(comment);
    const resolved = isCommentResolved(comment);

    details.set(index, {
        index,
        commentId: comment.id,
        path: comment.path,
        author: comment.author,
        body: comment.body,
        url: comment.htmlUrl,
        createdAt: comment.createdAt,
        diffHunk: comment.diffHunk,
        positionSummary: describePositionFields(comment),
        resolvedLine: line,
        isResolved: resolved,
        replies: comment.replies,
    });

    return {
        index,
        commentId: comment.id,
        file: comment.path,
        line,
        severity: classifySeverity(comment.author, options.botAuthors),
        resolved,
        text: renderEntryLine(index, comment.author, formatCommentText(comment, options), resolved),
    };
}
