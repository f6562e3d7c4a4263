// Interactive mode - pick a comment, then act on it until the user quits

import logger from "@app/logger";
import { createSession, printError } from "@app/review-comments/commands/context";
import { formatDetailTerminal, formatListTerminal } from "@app/review-comments/lib/output";
import type { ReviewSession } from "@app/review-comments/lib/review-session";
import type { CommonCommandOptions, DisplayEntry, ReviewList } from "@app/review-comments/types";
import { ExitPromptError } from "@inquirer/core";
import { input, Separator, select } from "@inquirer/prompts";
import chalk from "chalk";

type MenuChoice =
    | { kind: "entry"; index: number }
    | { kind: "toggle-resolved" }
    | { kind: "toggle-full" }
    | { kind: "refresh" }
    | { kind: "quit" };

type EntryAction = "detail" | "reply" | "resolve" | "unresolve" | "back";

function entryChoice(entry: DisplayEntry): { value: MenuChoice; name: string; description: string } {
    return {
        value: { kind: "entry", index: entry.index },
        name: entry.text,
        description: `${entry.file}:${entry.line}`,
    };
}

async function chooseFromList(session: ReviewSession, list: ReviewList): Promise<MenuChoice> {
    return select<MenuChoice>({
        message: `${list.title} · ${list.status}`,
        pageSize: 15,
        choices: [
            ...list.entries.map(entryChoice),
            new Separator(),
            {
                value: { kind: "toggle-resolved" },
                name: session.showResolved ? "Hide resolved comments" : "Show resolved comments",
            },
            { value: { kind: "toggle-full" }, name: session.showFull ? "Truncate comment text" : "Show full text" },
            { value: { kind: "refresh" }, name: "Refresh from GitHub" },
            { value: { kind: "quit" }, name: "Quit" },
        ],
    });
}

async function actOnEntry(session: ReviewSession, index: number): Promise<ReviewList> {
    const detail = session.detail(index);
    const action = await select<EntryAction>({
        message: `[${index}] ${detail.path}:${detail.resolvedLine}`,
        choices: [
            { value: "detail", name: "Show detail" },
            { value: "reply", name: "Reply" },
            detail.isResolved
                ? { value: "unresolve", name: "Unresolve thread" }
                : { value: "resolve", name: "Resolve thread" },
            { value: "back", name: "Back" },
        ],
    });

    switch (action) {
        case "detail":
            console.log(`\n${formatDetailTerminal(detail)}\n`);
            return session.current();
        case "reply": {
            const message = await input({ message: "Reply:" });
            if (!message.trim()) {
                console.log(chalk.yellow("No reply text provided."));
                return session.current();
            }
            const result = await session.reply(index, message);
            console.log(chalk.green(`Replied to [${index}] via ${result.strategy}`));
            return session.load();
        }
        case "resolve":
        case "unresolve": {
            const result = action === "resolve" ? await session.resolve(index) : await session.unresolve(index);
            console.log(result.changed ? chalk.green(result.message) : chalk.dim(result.message));
            return session.current();
        }
        case "back":
            return session.current();
    }
}

export async function interactiveMode(options: CommonCommandOptions = {}): Promise<void> {
    console.log(chalk.bold.blue("Review Comments - Interactive Mode\n"));

    const session = await createSession(options);
    let list = await session.load();
    console.log(formatListTerminal(list));
    console.log();

    while (true) {
        try {
            const choice = await chooseFromList(session, list);

            if (choice.kind === "quit") {
                console.log(chalk.dim("Goodbye!"));
                break;
            }

            if (choice.kind === "toggle-resolved") {
                list = await session.toggleShowResolved();
            } else if (choice.kind === "toggle-full") {
                list = await session.toggleShowFull();
            } else if (choice.kind === "refresh") {
                list = await session.load({ forceRefresh: true });
            } else {
                list = await actOnEntry(session, choice.index);
            }
        } catch (error) {
            if (error instanceof ExitPromptError) {
                console.log(chalk.dim("\nOperation cancelled."));
                break;
            }
            logger.error({ error }, "Interactive action failed");
            printError(error);
        }
    }
}
