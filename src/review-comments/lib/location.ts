// Location resolution - best-effort current-file line for a review comment

import type { ReviewComment } from "@app/review-comments/types";

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * Derive a new-file line number from a diff hunk.
 *
 * The `+newStart` of the hunk header anchors the count. Body lines are
 * numbered from 1 (the header is 0); every line that is not a removal
 * advances the offset. When `originalPosition` is given, the walk stops at
 * that body line.
 *
 * @returns the line, or 0 when the hunk has no header
 */
export function lineFromDiffHunk(diffHunk: string, originalPosition: number | null = null): number {
    const lines = diffHunk.split("\n");
    const headerIndex = lines.findIndex((l) => HUNK_HEADER.test(l));
    if (headerIndex === -1) {
        return 0;
    }

    const header = lines[headerIndex].match(HUNK_HEADER);
    if (!header) {
        return 0;
    }
    const newStart = parseInt(header[3], 10);

    let lineOffset = 0;
    let found = false;
    const body = lines.slice(headerIndex + 1);

    for (let i = 0; i < body.length; i++) {
        if (!body[i].startsWith("-")) {
            lineOffset++;
        }
        if (originalPosition !== null && i + 1 === originalPosition) {
            found = true;
            break;
        }
    }

    if (found && lineOffset > 0) {
        return newStart + lineOffset - 1;
    }
    return newStart;
}

/**
 * Resolve the line a comment points at.
 * Order: `line`, diff hunk, `originalLine`, `startLine`, then 1.
 */
export function resolveCommentLine(comment: ReviewComment): number {
    if (comment.line !== null) {
        return comment.line;
    }

    if (comment.diffHunk) {
        const fromHunk = lineFromDiffHunk(comment.diffHunk, comment.originalPosition);
        if (fromHunk !== 0) {
            return fromHunk;
        }
    }

    if (comment.originalLine !== null) {
        return comment.originalLine;
    }

    if (comment.startLine !== null) {
        return comment.startLine;
    }

    return 1;
}

/**
 * One-line summary of the raw positional fields, for the detail view.
 */
export function describePositionFields(comment: ReviewComment): string {
    const show = (value: number | null) => (value === null ? "-" : String(value));
    return [
        `line=${show(comment.line)}`,
        `original_line=${show(comment.originalLine)}`,
        `start_line=${show(comment.startLine)}`,
        `position=${show(comment.position)}`,
        `original_position=${show(comment.originalPosition)}`,
        `side=${comment.side}`,
    ].join(" ");
}
