// List command - one line per unresolved review comment on the PR

import { addCommonOptions, createSession, runCommand, TOOL_NAME } from "@app/review-comments/commands/context";
import { formatList } from "@app/review-comments/lib/output";
import type { ListCommandOptions } from "@app/review-comments/types";
import { suggestCommand } from "@app/utils/cli";
import chalk from "chalk";
import { Command, Option } from "commander";

export async function listCommand(prInput: string | undefined, options: ListCommandOptions): Promise<void> {
    const format = options.format ?? "terminal";
    const session = await createSession(options, prInput);

    if (format === "terminal") {
        console.error(chalk.dim("Fetching review comments..."));
    }

    const list = await session.load();
    const output = formatList(list, format);
    if (output) {
        console.log(output);
    }

    if (format === "terminal" && list.hiddenResolved > 0) {
        console.error(chalk.dim(`\nShow resolved: ${suggestCommand(TOOL_NAME, { add: ["--all"] })}`));
    }
}

export function createListCommand(): Command {
    const cmd = new Command("list")
        .description(
            `List inline review comments on a pull request

Examples:
  $ review-comments list                          # PR for the current branch
  $ review-comments list 137 --all                # Include resolved comments
  $ review-comments list --format qf > review.qf  # Quickfix file for an editor`
        )
        .argument("[pr]", "PR number, owner/repo#N or URL");

    addCommonOptions(cmd)
        .addOption(
            new Option("--format <format>", "Output format").choices(["terminal", "json", "qf"]).default("terminal")
        )
        .action(async (pr: string | undefined, opts: ListCommandOptions) => {
            await runCommand("List", () => listCommand(pr, opts));
        });

    return cmd;
}
