export * as Changelog from "./changelog";
export * as Config from "./config";
export * as Dashboard from "./dashboard";
export * as Forge from "./forge";
export * as Git from "./git";
export * as Logger from "./logger";
export * as Markdown from "./markdown";
export * as ReleaseTools from "./release_tools";
export * as Stage from "./stage";
export * as Version from "./version";
export * as Workspace from "./workspace";

// Release orchestration
export * as Release from "./release";
