// review-comments - browse, reply to and resolve inline PR review comments

import logger from "@app/logger";
import { printError, TOOL_NAME } from "@app/review-comments/commands/context";
import { interactiveMode } from "@app/review-comments/commands/interactive";
import { createListCommand } from "@app/review-comments/commands/list";
import { createReplyCommand } from "@app/review-comments/commands/reply";
import { createResolveCommand, createUnresolveCommand } from "@app/review-comments/commands/resolve";
import { createShowCommand } from "@app/review-comments/commands/show";
import { Executor, enhanceHelp } from "@app/utils/cli";
import { checkAuth, createGitHubClient, getRateLimit } from "@app/utils/github/octokit";
import { ExitPromptError } from "@inquirer/core";
import chalk from "chalk";
import { Command } from "commander";

const program = new Command();

program
    .name(TOOL_NAME)
    .description("Inline review comments on the pull request for your branch")
    .version("1.0.0");

program.addCommand(createListCommand());
program.addCommand(createShowCommand());
program.addCommand(createReplyCommand());
program.addCommand(createResolveCommand());
program.addCommand(createUnresolveCommand());

program
    .command("status")
    .description("Show authentication and rate limit status")
    .action(async () => {
        console.log(chalk.bold("Review Comments Status\n"));

        console.log(chalk.underline("Authentication:"));
        const { octokit, token } = await createGitHubClient({ gh: new Executor({ prefix: "gh", timeout: 10_000 }) });
        const auth = await checkAuth(octokit);
        if (auth.authenticated) {
            console.log(chalk.green(`  ✔ Authenticated as @${auth.user}`));
            if (token) {
                console.log(chalk.dim(`  Token from: ${token.source}`));
            }
            if (auth.scopes && auth.scopes.length > 0) {
                console.log(chalk.dim(`  Scopes: ${auth.scopes.join(", ")}`));
            }
        } else {
            console.log(chalk.yellow("  ✘ Not authenticated"));
            console.log(chalk.dim("  Set GITHUB_TOKEN or run: gh auth login"));
        }

        console.log(chalk.underline("\nRate Limit:"));
        try {
            const rateLimit = await getRateLimit(octokit);
            console.log(`  Remaining: ${rateLimit.remaining}/${rateLimit.limit}`);
            console.log(`  Resets: ${rateLimit.reset.toLocaleTimeString()}`);
        } catch (error) {
            logger.debug({ error }, "Rate limit lookup failed");
            console.log(chalk.dim("  Could not fetch rate limit"));
        }
    });

enhanceHelp(program);

async function main(): Promise<void> {
    // No arguments: interactive mode
    if (process.argv.length <= 2) {
        try {
            await interactiveMode();
        } catch (error) {
            if (error instanceof ExitPromptError) {
                logger.info("User cancelled");
                process.exit(0);
            }
            throw error;
        }
        return;
    }

    await program.parseAsync();
}

main().catch((error: unknown) => {
    logger.error({ error }, "Command failed");
    printError(error);
    process.exit(1);
});
