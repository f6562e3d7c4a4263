export type { GitClient, GitOptions } from "./core";
export { createGit } from "./core";
