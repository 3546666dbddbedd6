// Cache module
export * from "./cache";
// Leagues registry module
export * from "./leagues-registry";
// MCP module
export * from "./mcp";
// Predictions module
export * from "./predictions";
// Team statistics module
export * from "./team-stats";
