// Reply command - answer a review thread

import { addCommonOptions, createSession, requireEntryIndex, runCommand } from "@app/review-comments/commands/context";
import type { CommonCommandOptions } from "@app/review-comments/types";
import chalk from "chalk";
import { Command } from "commander";

export async function replyCommand(
    indexInput: string,
    message: string,
    prInput: string | undefined,
    options: CommonCommandOptions
): Promise<void> {
    const index = requireEntryIndex(indexInput);
    const session = await createSession(options, prInput);
    await session.load();

    const result = await session.reply(index, message);
    console.log(chalk.green(`Replied to [${index}]`));
    if (result.strategy !== result.attempts[0]) {
        console.log(chalk.dim(`  Posted via ${result.strategy} after: ${result.attempts.slice(0, -1).join(", ")}`));
    }
}

export function createReplyCommand(): Command {
    const cmd = new Command("reply")
        .description(
            `Reply to a review comment's thread

Examples:
  $ review-comments reply 3 "Fixed in the latest push"
  $ review-comments reply 3 "Done" 137`
        )
        .argument("<index>", "Comment index from `list`")
        .argument("<message>", "Reply text")
        .argument("[pr]", "PR number, owner/repo#N or URL");

    addCommonOptions(cmd).action(
        async (index: string, message: string, pr: string | undefined, opts: CommonCommandOptions) => {
            await runCommand("Reply", () => replyCommand(index, message, pr, opts));
        }
    );

    return cmd;
}
