import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import logger from "@app/logger";

export class Storage {
    private toolName: string;
    private baseDir: string;
    private configPath: string;

    /**
     * Create a Storage instance for a tool
     * @param toolName - Name of the tool (e.g., "review-comments")
     * @param rootDir - Parent of the tool directory (defaults to the home directory)
     */
    constructor(toolName: string, rootDir: string = homedir()) {
        this.toolName = toolName;
        this.baseDir = join(rootDir, `.${toolName}`);
        this.configPath = join(this.baseDir, "config.json");
    }

    getToolName(): string {
        return this.toolName;
    }

    /**
     * @returns Absolute path to ~/.<toolName>
     */
    getBaseDir(): string {
        return this.baseDir;
    }

    /**
     * @returns Absolute path to ~/.<toolName>/config.json
     */
    getConfigPath(): string {
        return this.configPath;
    }

    /**
     * Read the raw config object. Callers validate its shape.
     * @returns The parsed JSON or null if missing or unreadable
     */
    async getConfig(): Promise<unknown> {
        try {
            if (!existsSync(this.configPath)) {
                return null;
            }
            const content = await readFile(this.configPath, "utf-8");
            return JSON.parse(content);
        } catch (error) {
            logger.error(`Failed to read config: ${error}`);
            return null;
        }
    }
}
