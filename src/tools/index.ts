export { ToolRunner, dotnetPublish } from "./runner.js";
export type { ToolRunOptions, ToolResult, DotnetPublishOptions } from "./runner.js";
