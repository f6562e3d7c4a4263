// Show command - full detail of one comment

import { addCommonOptions, createSession, requireEntryIndex, runCommand } from "@app/review-comments/commands/context";
import { formatDetailJSON, formatDetailTerminal } from "@app/review-comments/lib/output";
import type { ShowCommandOptions } from "@app/review-comments/types";
import { Command } from "commander";

export async function showCommand(
    indexInput: string,
    prInput: string | undefined,
    options: ShowCommandOptions
): Promise<void> {
    const index = requireEntryIndex(indexInput);
    const session = await createSession(options, prInput);
    await session.load();

    const detail = session.detail(index);
    console.log(options.json ? formatDetailJSON(detail) : formatDetailTerminal(detail));
}

export function createShowCommand(): Command {
    const cmd = new Command("show")
        .description("Show a review comment with its replies and diff hunk")
        .argument("<index>", "Comment index from `list`")
        .argument("[pr]", "PR number, owner/repo#N or URL");

    addCommonOptions(cmd)
        .option("-j, --json", "Output as JSON", false)
        .action(async (index: string, pr: string | undefined, opts: ShowCommandOptions) => {
            await runCommand("Show", () => showCommand(index, pr, opts));
        });

    return cmd;
}
