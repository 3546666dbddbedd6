/**
 * Predictions Routes
 *
 * Endpoints:
 * - GET /predictions?home=&away=&league=
 * - GET /leagues/:league/table
 */

import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";
import { logEvent } from "../../../utils/metrics";
import {
	presentLeagueTable,
	presentMatchPrediction,
} from "../presentation/prediction-presenter";
import type { PredictionsService } from "../services/predictions.service";
import { rejectInvalidRequest, respondWithError } from "./error-response";

// ============================================================================
// VALIDATION SCHEMAS
// ============================================================================

const teamName = z.string().trim().min(1, "Team name is required").max(100);

const predictionQuerySchema = z.object({
	home: teamName,
	away: teamName,
	league: z.string().trim().min(1).max(50).default("EPL"),
});

const leagueParamsSchema = z.object({
	league: z.string().trim().min(1).max(50),
});

// ============================================================================
// ROUTE CREATION
// ============================================================================

export const createPredictionsRoutes = (service: PredictionsService) => {
	const routes = new Hono();

	/**
	 * GET /predictions - Poisson prediction for a fixture
	 */
	routes.get(
		"/predictions",
		zValidator("query", predictionQuerySchema, rejectInvalidRequest),
		async (context) => {
			const { home, away, league } = context.req.valid("query");

			try {
				const result = await service.predictMatch({
					homeTeam: home,
					awayTeam: away,
					league,
				});

				// Stats refresh at most every few hours
				context.header("Cache-Control", "public, max-age=900");
				return context.json({
					status: "success",
					data: presentMatchPrediction(result),
				});
			} catch (error) {
				logEvent(
					"prediction_failed",
					{
						home,
						away,
						league,
						error: error instanceof Error ? error.message : String(error),
					},
					"warn",
				);
				return respondWithError(context, error);
			}
		},
	);

	/**
	 * GET /leagues/:league/table - Teams with xG stats and strength ratings
	 */
	routes.get(
		"/leagues/:league/table",
		zValidator("param", leagueParamsSchema, rejectInvalidRequest),
		async (context) => {
			const { league } = context.req.valid("param");

			try {
				const result = await service.getLeagueTable(league);
				context.header("Cache-Control", "public, max-age=900");
				return context.json({
					status: "success",
					data: presentLeagueTable(result),
				});
			} catch (error) {
				logEvent(
					"league_table_failed",
					{
						league,
						error: error instanceof Error ? error.message : String(error),
					},
					"warn",
				);
				return respondWithError(context, error);
			}
		},
	);

	return routes;
};
