import logger from "@app/logger";
import { PreconditionFailure } from "@app/review-comments/lib/errors";
import type { CommonCommandOptions, FormatOptions } from "@app/review-comments/types";
import type { Storage } from "@app/utils/storage";
import { z } from "zod";

export const DEFAULT_BOT_AUTHORS = ["github-actions[bot]", "copilot-pull-request-reviewer[bot]"];

export const reviewCommentsConfigSchema = z.object({
    maxLength: z.number().int().positive().default(300),
    snippetLength: z.number().int().positive().default(60),
    showFull: z.boolean().default(false),
    showResolved: z.boolean().default(false),
    botAuthors: z.array(z.string()).default(DEFAULT_BOT_AUTHORS),
    /** Per-request API timeout; 0 disables it */
    requestTimeoutMs: z.number().int().nonnegative().default(30_000),
});

export type ReviewCommentsConfig = z.infer<typeof reviewCommentsConfigSchema>;

export const DEFAULT_CONFIG: ReviewCommentsConfig = reviewCommentsConfigSchema.parse({});

/**
 * Validate a raw config object. Anything invalid falls back to the defaults as a whole.
 */
export function parseConfig(raw: unknown): ReviewCommentsConfig {
    if (raw === null || raw === undefined) {
        return DEFAULT_CONFIG;
    }

    const parsed = reviewCommentsConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        logger.warn(
            { issue: issue ? `${issue.path.join(".")}: ${issue.message}` : undefined },
            "Ignoring invalid review-comments config"
        );
        return DEFAULT_CONFIG;
    }
    return parsed.data;
}

export async function loadConfig(storage: Pick<Storage, "getConfig">): Promise<ReviewCommentsConfig> {
    return parseConfig(await storage.getConfig());
}

/**
 * Layer command-line flags over the file config.
 */
export function applyCommandOptions(config: ReviewCommentsConfig, options: CommonCommandOptions): ReviewCommentsConfig {
    const merged = { ...config };

    if (options.all) {
        merged.showResolved = true;
    }
    if (options.full) {
        merged.showFull = true;
    }
    if (options.maxLength !== undefined) {
        const maxLength = parseInt(options.maxLength, 10);
        if (Number.isNaN(maxLength) || maxLength <= 0) {
            throw new PreconditionFailure(`Invalid --max-length "${options.maxLength}"; expected a positive number`);
        }
        merged.maxLength = maxLength;
    }

    return merged;
}

export function toFormatOptions(config: ReviewCommentsConfig): FormatOptions {
    return {
        maxLength: config.maxLength,
        snippetLength: config.snippetLength,
        showFull: config.showFull,
        botAuthors: config.botAuthors,
    };
}
