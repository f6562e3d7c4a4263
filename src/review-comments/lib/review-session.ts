// List Controller - builds the displayed list and routes actions back to comments by index

import logger from "@app/logger";
import { type CommentFetcher, withResolution } from "@app/review-comments/lib/comment-fetcher";
import { LookupFailure, PreconditionFailure } from "@app/review-comments/lib/errors";
import { addResolvedTag, formatComment, stripResolvedTag } from "@app/review-comments/lib/formatter";
import type { RepoResolver } from "@app/review-comments/lib/repo";
import type {
    ReplyResult,
    ThreadActionContext,
    ThreadActions,
    ThreadStateResult,
} from "@app/review-comments/lib/thread-actions";
import type {
    CommentDetail,
    DisplayEntry,
    FormatOptions,
    MergedComment,
    ReviewList,
} from "@app/review-comments/types";
import { Mutex } from "@app/utils/async";
import type { RepoRef } from "@app/utils/github/url-parser";

export interface BuildListOptions {
    prNumber: number;
    repo: RepoRef;
    format: FormatOptions;
    showResolved: boolean;
}

export interface BuiltList {
    list: ReviewList;
    details: Map<number, CommentDetail>;
    /** Every indexed comment, hidden ones included */
    byIndex: Map<number, { comment: MergedComment; entry: DisplayEntry }>;
}

export function formatStatus(shown: number, hidden: number): string {
    return hidden > 0 ? `${shown} shown, ${hidden} resolved hidden` : `${shown} shown`;
}

export function formatTitle(prNumber: number, total: number): string {
    return `PR #${prNumber} review comments (${total})`;
}

/**
 * Index comments 1..N in fetch order, then drop resolved ones from view unless
 * `showResolved` is set. Hidden comments keep their index.
 */
export function buildReviewList(comments: MergedComment[], options: BuildListOptions): BuiltList {
    const details = new Map<number, CommentDetail>();
    const byIndex = new Map<number, { comment: MergedComment; entry: DisplayEntry }>();
    const entries: DisplayEntry[] = [];
    let hiddenResolved = 0;

    comments.forEach((comment, i) => {
        const index = i + 1;
        const entry = formatComment(comment, index, options.format, details);
        byIndex.set(index, { comment, entry });

        if (entry.resolved && !options.showResolved) {
            hiddenResolved++;
            return;
        }
        entries.push(entry);
    });

    return {
        list: {
            prNumber: options.prNumber,
            repo: options.repo,
            title: formatTitle(options.prNumber, comments.length),
            status: formatStatus(entries.length, hiddenResolved),
            entries,
            total: comments.length,
            hiddenResolved,
        },
        details,
        byIndex,
    };
}

/**
 * Read an entry index from user input or a display line: `3`, `[3]` or `[3] author: ...`.
 */
export function parseEntryIndex(text: string): number | null {
    const match = text.match(/^\s*(?:\[(\d+)\]|(\d+)(?=\s|$))/);
    const digits = match?.[1] ?? match?.[2];
    if (!digits) {
        return null;
    }
    const index = parseInt(digits, 10);
    return index > 0 ? index : null;
}

export interface ReviewSessionOptions {
    fetcher: CommentFetcher;
    actions: ThreadActions;
    repoResolver: Pick<RepoResolver, "resolve">;
    /** Finds the PR for the checked-out branch */
    locatePr: () => Promise<number>;
    format: FormatOptions;
    showResolved?: boolean;
    prNumber?: number;
}

export interface LoadOptions {
    prNumber?: number;
    forceRefresh?: boolean;
}

export class ReviewSession {
    private readonly mutex = new Mutex();
    private format: FormatOptions;
    private showResolvedFlag: boolean;
    private prNumber: number | null;
    private repo: RepoRef | null = null;
    private built: BuiltList | null = null;

    constructor(private readonly options: ReviewSessionOptions) {
        this.format = { ...options.format };
        this.showResolvedFlag = options.showResolved ?? false;
        this.prNumber = options.prNumber ?? null;
    }

    get showResolved(): boolean {
        return this.showResolvedFlag;
    }

    get showFull(): boolean {
        return this.format.showFull;
    }

    /**
     * Fetch (or reuse cached) comments and rebuild the list.
     */
    load(options: LoadOptions = {}): Promise<ReviewList> {
        return this.mutex.runExclusive(() => this.loadUnlocked(options));
    }

    current(): ReviewList {
        return this.requireBuilt().list;
    }

    detail(index: number): CommentDetail {
        const detail = this.requireBuilt().details.get(index);
        if (!detail) {
            throw this.missingIndex(index);
        }
        return detail;
    }

    reply(index: number, body: string): Promise<ReplyResult> {
        return this.mutex.runExclusive(async () => {
            const { comment } = this.requireIndexed(index);
            const result = await this.options.actions.reply(this.actionContext(comment), body);
            // The new reply is not in the cached thread data
            this.options.fetcher.cache.invalidate();
            logger.debug({ index, commentId: comment.id, strategy: result.strategy }, "Reply posted");
            return result;
        });
    }

    resolve(index: number): Promise<ThreadStateResult> {
        return this.setResolution(index, true);
    }

    unresolve(index: number): Promise<ThreadStateResult> {
        return this.setResolution(index, false);
    }

    toggleShowResolved(): Promise<ReviewList> {
        return this.mutex.runExclusive(async () => {
            this.showResolvedFlag = !this.showResolvedFlag;
            return this.loadUnlocked({});
        });
    }

    toggleShowFull(): Promise<ReviewList> {
        return this.mutex.runExclusive(async () => {
            this.format = { ...this.format, showFull: !this.format.showFull };
            return this.loadUnlocked({});
        });
    }

    private async loadUnlocked(options: LoadOptions): Promise<ReviewList> {
        const prNumber = options.prNumber ?? this.prNumber ?? (await this.options.locatePr());
        const repo = await this.options.repoResolver.resolve();
        const comments = await this.options.fetcher.fetch(prNumber, { forceRefresh: options.forceRefresh });

        this.prNumber = prNumber;
        this.repo = repo;
        this.built = buildReviewList(comments, {
            prNumber,
            repo,
            format: this.format,
            showResolved: this.showResolvedFlag,
        });
        return this.built.list;
    }

    private setResolution(index: number, resolved: boolean): Promise<ThreadStateResult> {
        return this.mutex.runExclusive(async () => {
            const indexed = this.requireIndexed(index);
            const context = this.actionContext(indexed.comment);
            const result = resolved
                ? await this.options.actions.resolve(context)
                : await this.options.actions.unresolve(context);

            this.applyResolution(index, result.isResolved);
            return result;
        });
    }

    /**
     * Reflect a thread state change in the list, the detail table and the cache
     * without re-indexing.
     */
    private applyResolution(index: number, isResolved: boolean): void {
        const built = this.requireBuilt();
        const indexed = this.requireIndexed(index);

        const entry: DisplayEntry = {
            ...indexed.entry,
            resolved: isResolved,
            text: isResolved ? addResolvedTag(indexed.entry.text) : stripResolvedTag(indexed.entry.text),
        };
        built.byIndex.set(index, { comment: withResolution(indexed.comment, isResolved), entry });
        built.list.entries = built.list.entries.map((e) => (e.index === index ? entry : e));

        const detail = built.details.get(index);
        if (detail) {
            built.details.set(index, { ...detail, isResolved });
        }

        this.options.fetcher.cache.markResolved(indexed.comment.id, isResolved);
    }

    private actionContext(comment: MergedComment): ThreadActionContext {
        if (this.prNumber === null || !this.repo) {
            throw new PreconditionFailure("No review comments loaded");
        }
        return { repo: this.repo, prNumber: this.prNumber, comment };
    }

    private requireBuilt(): BuiltList {
        if (!this.built) {
            throw new PreconditionFailure("No review comments loaded");
        }
        return this.built;
    }

    private requireIndexed(index: number): { comment: MergedComment; entry: DisplayEntry } {
        const indexed = this.requireBuilt().byIndex.get(index);
        if (!indexed) {
            throw this.missingIndex(index);
        }
        return indexed;
    }

    private missingIndex(index: number): LookupFailure {
        const total = this.built?.list.total ?? 0;
        return new LookupFailure(`No comment at index ${index} (list has ${total})`, {
            hint: ["review-comments list --all"],
        });
    }
}
