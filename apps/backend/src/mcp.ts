import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createPredictionsServiceFromEnv } from "./app";
import { APP_VERSION } from "./config/app-info";
import { loadEnv } from "./config/env";
import { createMcpServer } from "./modules";
import { configureLogging, logEvent } from "./utils";

// stdout carries the MCP protocol
configureLogging({ stderrOnly: true });

const env = loadEnv();
configureLogging({ level: env.LOG_LEVEL });

const server = createMcpServer(createPredictionsServiceFromEnv(env), APP_VERSION);
const transport = new StdioServerTransport();

await server.connect(transport);
logEvent("mcp_server_started", { version: APP_VERSION, transport: "stdio" });
