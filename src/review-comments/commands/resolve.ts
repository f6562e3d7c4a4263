// Resolve / unresolve commands - flip a review thread's resolution

import { addCommonOptions, createSession, requireEntryIndex, runCommand } from "@app/review-comments/commands/context";
import type { CommonCommandOptions } from "@app/review-comments/types";
import chalk from "chalk";
import { Command } from "commander";

export async function resolveCommand(
    indexInput: string,
    prInput: string | undefined,
    options: CommonCommandOptions,
    resolved: boolean
): Promise<void> {
    const index = requireEntryIndex(indexInput);
    const session = await createSession(options, prInput);
    await session.load();

    const result = resolved ? await session.resolve(index) : await session.unresolve(index);
    const message = `[${index}] ${result.message}`;
    console.log(result.changed ? chalk.green(message) : chalk.dim(message));
}

function createThreadStateCommand(name: "resolve" | "unresolve"): Command {
    const resolved = name === "resolve";
    const cmd = new Command(name)
        .description(`${resolved ? "Resolve" : "Unresolve"} the review thread a comment starts`)
        .argument("<index>", "Comment index from `list` (use --all to see resolved ones)")
        .argument("[pr]", "PR number, owner/repo#N or URL");

    addCommonOptions(cmd).action(async (index: string, pr: string | undefined, opts: CommonCommandOptions) => {
        await runCommand(resolved ? "Resolve" : "Unresolve", () => resolveCommand(index, pr, opts, resolved));
    });

    return cmd;
}

export function createResolveCommand(): Command {
    return createThreadStateCommand("resolve");
}

export function createUnresolveCommand(): Command {
    return createThreadStateCommand("unresolve");
}
