/**
 * MCP tool handlers
 *
 * Plain async functions so they can be exercised without a transport.
 * Domain failures come back as `isError` results carrying the error code;
 * anything unexpected is rethrown for the SDK to report.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { logEvent } from "../../utils/metrics";
import { isPredictionError } from "../predictions/errors";
import {
	presentLeagueTable,
	presentLeagues,
	presentMatchPrediction,
} from "../predictions/presentation/prediction-presenter";
import type { PredictionsService } from "../predictions/services/predictions.service";

export const predictMatchInputShape = {
	home_team: z.string().trim().min(1).describe('Home team name (e.g. "Arsenal")'),
	away_team: z.string().trim().min(1).describe('Away team name (e.g. "Chelsea")'),
	league: z
		.string()
		.trim()
		.min(1)
		.default("EPL")
		.describe("League slug, name, or ID (default: EPL)"),
};

export const leagueTableInputShape = {
	league: z
		.string()
		.trim()
		.min(1)
		.default("EPL")
		.describe("League slug, name, or ID (default: EPL)"),
};

const PredictMatchInput = z.object(predictMatchInputShape);
const LeagueTableInput = z.object(leagueTableInputShape);

export type PredictMatchInput = z.infer<typeof PredictMatchInput>;
export type LeagueTableInput = z.infer<typeof LeagueTableInput>;

function jsonResult(data: unknown): CallToolResult {
	return {
		content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
	};
}

function errorResult(tool: string, error: unknown): CallToolResult {
	if (!isPredictionError(error)) {
		throw error;
	}

	logEvent("tool_failed", { tool, code: error.code, message: error.message }, "warn");
	return {
		content: [
			{
				type: "text",
				text: JSON.stringify({ error: error.code, message: error.message }),
			},
		],
		isError: true,
	};
}

export const createToolHandlers = (service: PredictionsService) => ({
	async predictMatch(input: PredictMatchInput): Promise<CallToolResult> {
		try {
			const result = await service.predictMatch({
				homeTeam: input.home_team,
				awayTeam: input.away_team,
				league: input.league,
			});
			return jsonResult(presentMatchPrediction(result));
		} catch (error) {
			return errorResult("predict_match", error);
		}
	},

	async listLeagues(): Promise<CallToolResult> {
		return jsonResult(presentLeagues(service.listLeagues()));
	},

	async getLeagueTable(input: LeagueTableInput): Promise<CallToolResult> {
		try {
			const result = await service.getLeagueTable(input.league);
			return jsonResult(presentLeagueTable(result));
		} catch (error) {
			return errorResult("get_league_table", error);
		}
	},
});

export type ToolHandlers = ReturnType<typeof createToolHandlers>;
