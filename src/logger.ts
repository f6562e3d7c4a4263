import { homedir } from "node:os";
import path from "node:path";
import minimist from "minimist";
import pino from "pino";

const args = minimist(process.argv.slice(2), {
    alias: {
        v: "verbose",
        vv: "trace",
    },
    default: {
        verbose: false,
        trace: false,
    },
    boolean: ["verbose", "trace"],
});

const getLogLevel = (): pino.LevelWithSilent => {
    if (process.env.LOG_TRACE === "1") return "trace";
    if (process.env.LOG_DEBUG === "1") return "debug";
    if (process.env.LOG_SILENT === "1") return "silent";
    if (args.vv || args.trace) {
        return "trace";
    } else if (args.verbose) {
        return "debug";
    }

    return "info";
};

export interface LoggerOptions {
    level: pino.LevelWithSilent;
    logToFile?: boolean;
    includeTimestamp?: boolean;
    prefixPid?: boolean;
}

/** Directory for daily log files: ~/.review-comments/logs */
export const LOG_DIR = path.join(homedir(), ".review-comments", "logs");

export const createLogger = (options: LoggerOptions): pino.Logger => {
    const { level, logToFile = false, includeTimestamp = true, prefixPid = false } = options;

    if (level === "silent") {
        return pino({ level });
    }

    // YYYY-MM-DD
    const getCurrentDate = () => new Date().toISOString().split("T")[0];

    const isTerminal = process.stdout.isTTY;
    const streams: pino.StreamEntry[] = [];

    if (logToFile && process.env.LOG_FILE !== "0") {
        streams.push({
            stream: pino.destination({
                dest: path.join(LOG_DIR, `${getCurrentDate()}.log`),
                mkdir: true,
                sync: true,
            }),
            level,
        });
    }

    // Console output only when attached to a terminal
    if (isTerminal) {
        streams.push({
            stream: pino.transport({
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: includeTimestamp ? "SYS:standard" : false,
                    ignore: prefixPid ? "hostname" : "pid,hostname",
                    destination: 2,
                },
            }),
            level,
        });
    }

    const baseConfig: pino.LoggerOptions = {
        level,
        timestamp: includeTimestamp ? pino.stdTimeFunctions.isoTime : false,
    };

    if (prefixPid) {
        baseConfig.base = {
            pid: process.pid,
        };
    }

    return pino(baseConfig, pino.multistream(streams));
};

const level: pino.LevelWithSilent = getLogLevel();

// Check if PID prefixing is requested via environment variable
const prefixPid = process.env.LOG_PID === "1" || process.env.DEBUG === "1";

const logger = createLogger({
    level,
    logToFile: true,
    includeTimestamp: true,
    prefixPid,
});

// Ensure all logs are flushed before the process exits
process.on("beforeExit", () => {
    logger.flush();
});

export default logger;
