export type { CommandRunner, ExecCallOptions, ExecResult, ExecutorOptions } from "./executor";
export { Executor, enhanceHelp, execSettled, suggestCommand } from "./executor";
