export { createMcpServer, MCP_SERVER_NAME } from "./mcp-server";
export { createToolHandlers, type ToolHandlers } from "./mcp-tools";
