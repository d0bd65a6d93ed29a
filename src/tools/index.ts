export { ToolRegistry } from "./registry";
export { FunctionTool, AsyncFunctionTool, makeTool, type ToolOptions } from "./function-tool";
export { type ToolLike, type ToolFunction, type ToolOutput } from "./types";
