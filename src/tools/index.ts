export { ToolRegistry, type ToolDefinition } from "./registry.js";
export { createDefaultTools } from "./defaults.js";
