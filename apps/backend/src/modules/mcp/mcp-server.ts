import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { APP_NAME } from "../../config/app-info";
import type { PredictionsService } from "../predictions/services/predictions.service";
import {
	createToolHandlers,
	leagueTableInputShape,
	predictMatchInputShape,
} from "./mcp-tools";

export const MCP_SERVER_NAME = APP_NAME;

/**
 * MCP server exposing the prediction tools:
 * - predict_match: full match prediction with W/D/L, O/U, BTTS
 * - list_leagues: supported leagues
 * - get_league_table: team xG stats for a league
 */
export function createMcpServer(
	service: PredictionsService,
	version: string,
): McpServer {
	const server = new McpServer({ name: MCP_SERVER_NAME, version });
	const handlers = createToolHandlers(service);

	server.tool(
		"predict_match",
		"Predict a soccer match with an xG-based Poisson model. Returns win/draw/loss " +
			"probabilities, over/under 2.5 goals, both teams to score, expected goals " +
			"and the most likely scores.",
		predictMatchInputShape,
		(input) => handlers.predictMatch(input),
	);

	server.tool(
		"list_leagues",
		"List all supported soccer leagues with IDs and slugs.",
		() => handlers.listLeagues(),
	);

	server.tool(
		"get_league_table",
		"Get all teams in a league with their xG statistics, sorted by attacking strength.",
		leagueTableInputShape,
		(input) => handlers.getLeagueTable(input),
	);

	return server;
}
