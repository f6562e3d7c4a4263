// Review comment output - terminal (chalk), JSON, and quickfix lines

import type { CommentDetail, DisplayEntry, ListOutputFormat, ReviewList } from "@app/review-comments/types";
import { buildPullRequestUrl } from "@app/utils/github/url-parser";
import chalk from "chalk";

// =============================================================================
// List
// =============================================================================

function colorEntryText(entry: DisplayEntry): string {
    if (entry.resolved) {
        return chalk.dim(entry.text);
    }
    return entry.severity === "info" ? chalk.blue(entry.text) : entry.text;
}

export function formatListTerminal(list: ReviewList): string {
    const lines: string[] = [
        chalk.bold(list.title),
        chalk.dim(`${buildPullRequestUrl({ ...list.repo, number: list.prNumber })} · ${list.status}`),
        "",
    ];

    if (list.entries.length === 0) {
        lines.push(chalk.dim("No review comments to show."));
        return lines.join("\n");
    }

    for (const entry of list.entries) {
        lines.push(chalk.cyan(`${entry.file}:${entry.line}`));
        lines.push(`  ${colorEntryText(entry)}`);
    }

    return lines.join("\n");
}

/**
 * One `file:line:col: type text` line per entry, the errorformat editors read
 * into a quickfix list.
 */
export function formatListQuickfix(list: ReviewList): string {
    return list.entries
        .map((entry) => `${entry.file}:${entry.line}:1: ${entry.severity === "info" ? "I" : "W"} ${entry.text}`)
        .join("\n");
}

export function formatListJSON(list: ReviewList): string {
    return JSON.stringify(
        {
            title: list.title,
            status: list.status,
            repo: `${list.repo.owner}/${list.repo.repo}`,
            prNumber: list.prNumber,
            total: list.total,
            hiddenResolved: list.hiddenResolved,
            entries: list.entries,
        },
        null,
        2
    );
}

export function formatList(list: ReviewList, format: ListOutputFormat): string {
    switch (format) {
        case "json":
            return formatListJSON(list);
        case "qf":
            return formatListQuickfix(list);
        case "terminal":
            return formatListTerminal(list);
    }
}

// =============================================================================
// Detail
// =============================================================================

/**
 * Colorize a diff hunk and point at the line the comment resolved to.
 */
export function formatDiffHunk(diffHunk: string, targetLine: number): string {
    if (!diffHunk) {
        return "";
    }

    const lines = diffHunk.split("\n");
    const headerMatch = lines[0]?.match(/@@ -\d+(?:,\d+)? \+(\d+)(?:,\d+)? @@/);
    let currentLine = headerMatch ? parseInt(headerMatch[1], 10) : 0;
    const canTrackLines = Boolean(headerMatch);

    return lines
        .map((line, idx) => {
            if (line.startsWith("@@")) {
                return chalk.cyan(line);
            }
            if (line.startsWith("-")) {
                return `   ${chalk.red(line)}`;
            }

            let isTarget = false;
            if (canTrackLines && idx > 0) {
                isTarget = currentLine === targetLine;
                currentLine++;
            }

            const marker = isTarget ? chalk.bold.white("-> ") : "   ";
            return marker + (line.startsWith("+") ? chalk.green(line) : chalk.dim(line));
        })
        .join("\n");
}

export function formatDetailTerminal(detail: CommentDetail): string {
    const status = detail.isResolved ? chalk.green("resolved") : chalk.yellow("unresolved");
    const lines: string[] = [
        chalk.bold(`[${detail.index}] ${detail.path}:${detail.resolvedLine}`),
        `${chalk.dim("Author:")}   @${detail.author}`,
        `${chalk.dim("Created:")}  ${detail.createdAt}`,
        `${chalk.dim("Status:")}   ${status}`,
    ];

    if (detail.url) {
        lines.push(`${chalk.dim("URL:")}      ${detail.url}`);
    }
    lines.push(`${chalk.dim("Position:")} ${detail.positionSummary}`);
    lines.push("", detail.body);

    if (detail.replies.length > 0) {
        lines.push("", chalk.bold(`Replies (${detail.replies.length}):`));
        for (const reply of detail.replies) {
            lines.push(`  ${chalk.cyan(`@${reply.author}`)} ${chalk.dim(reply.createdAt)}`);
            for (const bodyLine of reply.body.split("\n")) {
                lines.push(`    ${bodyLine}`);
            }
        }
    }

    const hunk = formatDiffHunk(detail.diffHunk, detail.resolvedLine);
    if (hunk) {
        lines.push("", chalk.bold("Diff:"), hunk);
    }

    return lines.join("\n");
}

export function formatDetailJSON(detail: CommentDetail): string {
    return JSON.stringify(detail, null, 2);
}
