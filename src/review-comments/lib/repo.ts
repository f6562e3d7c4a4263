import logger from "@app/logger";
import { LookupFailure } from "@app/review-comments/lib/errors";
import { type CommandRunner, execSettled } from "@app/utils/cli";
import type { GitClient } from "@app/utils/git";
import { detectRepoFromGit, parseRepo, type RepoRef } from "@app/utils/github/url-parser";

/**
 * Works out which repository the session talks to, once per process:
 * explicit `--repo`, then the origin remote, then `gh repo view`.
 */
export class RepoResolver {
    private resolved: RepoRef | null = null;

    constructor(
        private readonly deps: {
            git: Pick<GitClient, "getRemoteUrl">;
            gh: CommandRunner;
            explicit?: string;
        }
    ) {}

    async resolve(): Promise<RepoRef> {
        if (this.resolved) {
            return this.resolved;
        }

        if (this.deps.explicit) {
            const parsed = parseRepo(this.deps.explicit);
            if (!parsed) {
                throw new LookupFailure(`Invalid --repo value "${this.deps.explicit}"; expected owner/repo`);
            }
            this.resolved = parsed;
            return parsed;
        }

        const fromGit = await detectRepoFromGit(this.deps.git);
        if (fromGit) {
            logger.debug({ repo: fromGit }, "Repository detected from origin remote");
            this.resolved = fromGit;
            return fromGit;
        }

        const result = await execSettled(this.deps.gh, ["repo", "view", "--json", "nameWithOwner", "--jq", ".nameWithOwner"]);
        const fromGh = result.success ? parseRepo(result.stdout) : null;
        if (fromGh) {
            logger.debug({ repo: fromGh }, "Repository detected via gh repo view");
            this.resolved = fromGh;
            return fromGh;
        }
        logger.debug({ exitCode: result.exitCode, stderr: result.stderr }, "gh repo view found no repository");

        throw new LookupFailure("Could not determine the GitHub repository for this directory", {
            hint: ["Pass it explicitly: --repo owner/repo", "Or check the remote with: git remote get-url origin"],
        });
    }
}
