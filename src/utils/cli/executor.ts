import { spawn } from "node:child_process";
import type { Command } from "commander";
import pc from "picocolors";

/**
 * Enhance a Commander program with better help UX:
 * - Shows help after errors (e.g. too many arguments)
 * - Expands subcommand options in the parent's help output
 * - Recurses into nested subcommands
 *
 * Call once on the root program after all commands are registered.
 */
export function enhanceHelp(cmd: Command): void {
    cmd.showHelpAfterError(true);

    const subs = cmd.commands;
    if (subs.length > 0) {
        cmd.addHelpText("after", () => {
            const lines: string[] = [pc.dim("\nSubcommand Options:")];
            for (const sub of cmd.commands) {
                const opts = sub.options.filter((o) => o.long !== "--help");
                if (opts.length === 0) {
                    continue;
                }
                lines.push(`\n  ${pc.bold(sub.name())}:`);
                for (const opt of opts) {
                    lines.push(`    ${pc.dim(opt.flags.padEnd(30))} ${opt.description}`);
                }
            }
            return lines.join("\n");
        });
    }

    for (const sub of subs) {
        enhanceHelp(sub);
    }
}

/**
 * Build a modified version of the current CLI command by adding/removing flags.
 * Uses process.argv to reconstruct the original command.
 *
 * @param toolName - The tool prefix (e.g., "review-comments")
 * @param modifications - Flags to add or remove
 */
export function suggestCommand(
    toolName: string,
    modifications: {
        add?: string[];
        remove?: string[];
    } = {},
    argv: string[] = process.argv.slice(2)
): string {
    let args = [...argv];

    // Remove specified flags (and their values if they have one)
    if (modifications.remove?.length) {
        const removeSet = new Set(modifications.remove);
        const filtered: string[] = [];
        for (let i = 0; i < args.length; i++) {
            if (removeSet.has(args[i])) {
                if (i + 1 < args.length && !args[i + 1].startsWith("-")) {
                    i++;
                }
                continue;
            }
            filtered.push(args[i]);
        }
        args = filtered;
    }

    if (modifications.add?.length) {
        args.push(...modifications.add);
    }

    const quoted = args.map((a) => (a.includes(" ") ? `"${a}"` : a));
    return [toolName, ...quoted].join(" ");
}

export interface ExecResult {
    success: boolean;
    stdout: string;
    stderr: string;
    exitCode: number;
}

export interface ExecutorOptions {
    /** Base command prefix (e.g., "git" → all calls prepend "git") */
    prefix?: string;
    /** Working directory for all commands */
    cwd?: string;
    /** Default timeout in milliseconds for every call; 0 or unset waits indefinitely */
    timeout?: number;
    /** Enable verbose logging of commands (default: false) */
    verbose?: boolean;
    /** Enable debug logging of stdout/stderr (default: false) */
    debug?: boolean;
    /** Custom label for log output (default: prefix or "exec") */
    label?: string;
}

export interface ExecCallOptions {
    /** Override working directory for this call */
    cwd?: string;
    /** Timeout in milliseconds. Process is killed and promise rejects on expiry. */
    timeout?: number;
}

/** Anything that can run a prefixed command and capture its output. */
export interface CommandRunner {
    exec(args: string[], options?: ExecCallOptions): Promise<ExecResult>;
}

/**
 * Run a command, turning a rejection (timeout, kill) into a failed result with
 * the error message as stderr.
 */
export async function execSettled(
    runner: CommandRunner,
    args: string[],
    options?: ExecCallOptions
): Promise<ExecResult> {
    try {
        return await runner.exec(args, options);
    } catch (error) {
        return {
            success: false,
            stdout: "",
            stderr: error instanceof Error ? error.message : String(error),
            exitCode: -1,
        };
    }
}

export class Executor implements CommandRunner {
    private prefix: string | undefined;
    private cwd: string;
    private timeout: number;
    verbose: boolean;
    debug: boolean;
    private label: string;

    constructor(options: ExecutorOptions = {}) {
        this.prefix = options.prefix;
        this.cwd = options.cwd ?? process.cwd();
        this.timeout = options.timeout ?? 0;
        this.verbose = options.verbose ?? false;
        this.debug = options.debug ?? false;
        this.label = options.label ?? options.prefix ?? "exec";
    }

    /**
     * Execute a command and capture output.
     * If prefix is set, args are prepended with it.
     * e.g., new Executor({ prefix: "git" }).exec(["status"]) → runs "git status"
     */
    async exec(args: string[], options?: ExecCallOptions): Promise<ExecResult> {
        const cmd = this.prefix ? [this.prefix, ...args] : args;
        const cwd = options?.cwd ?? this.cwd;
        const timeoutMs = options?.timeout ?? this.timeout;

        if (this.verbose) {
            console.error(pc.gray(`  $ ${cmd.join(" ")}`));
        }

        const [file, ...rest] = cmd;
        const proc = spawn(file, rest, {
            cwd,
            stdio: ["ignore", "pipe", "pipe"],
        });

        const collectOutput = new Promise<[string, string, number]>((resolve) => {
            let stdout = "";
            let stderr = "";
            proc.stdout.setEncoding("utf-8");
            proc.stderr.setEncoding("utf-8");
            proc.stdout.on("data", (chunk: string) => {
                stdout += chunk;
            });
            proc.stderr.on("data", (chunk: string) => {
                stderr += chunk;
            });
            // Spawn failures (e.g. binary not on PATH) surface as a non-zero exit
            proc.on("error", (err) => {
                resolve([stdout, stderr || err.message, 127]);
            });
            proc.on("close", (code) => {
                resolve([stdout, stderr, code ?? 1]);
            });
        });

        let stdout: string;
        let stderr: string;
        let exitCode: number;

        if (timeoutMs > 0) {
            let timer: ReturnType<typeof setTimeout> | undefined;

            const timeoutResult = await Promise.race([
                collectOutput.then((r) => ({ type: "done" as const, value: r })),
                new Promise<{ type: "timeout" }>((resolve) => {
                    timer = setTimeout(() => resolve({ type: "timeout" }), timeoutMs);
                }),
            ]);
            clearTimeout(timer);

            if (timeoutResult.type === "timeout") {
                proc.kill();
                await collectOutput;
                throw new Error(`Command timed out after ${timeoutMs}ms: ${cmd.join(" ")}`);
            }

            [stdout, stderr, exitCode] = timeoutResult.value;
        } else {
            [stdout, stderr, exitCode] = await collectOutput;
        }

        const result: ExecResult = {
            success: exitCode === 0,
            stdout: stdout.trim(),
            stderr: stderr.trim(),
            exitCode,
        };

        if (this.debug) {
            if (result.stdout) {
                console.error(pc.dim(`  [${this.label}:out] ${result.stdout.substring(0, 200)}`));
            }
            if (result.stderr) {
                console.error(pc.dim(`  [${this.label}:err] ${result.stderr.substring(0, 200)}`));
            }
            if (!result.success) {
                console.error(pc.red(`  [${this.label}] exit ${exitCode}`));
            }
        }

        return result;
    }
}
