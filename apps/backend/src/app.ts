/**
 * Application wiring
 *
 * Builds the predictions service from the environment and mounts the HTTP
 * routes on a Hono app. Both entry points (HTTP and MCP) start from here.
 */

import { Hono } from "hono";
import type { AppEnv } from "./config/env";
import {
	createCacheAdminRoutes,
	createCacheProvider,
	createLeaguesRegistryRoutes,
	createModelConfig,
	createPredictionsRoutes,
	createPredictionsService,
	createTeamStatsService,
	parseCachedLeagueTeams,
	type PredictionsService,
} from "./modules";
import { getUnderstatLeagueData } from "./pkg/util/understat-api";
import { getMetrics, logRequest } from "./utils";

/**
 * Create the predictions service for an environment
 */
export function createPredictionsServiceFromEnv(
	env: AppEnv,
): PredictionsService {
	const cache = createCacheProvider({
		driver: env.CACHE_DRIVER,
		directory: env.CACHE_DIR,
		validate: parseCachedLeagueTeams,
	});

	const provider = createTeamStatsService({
		cache,
		ttlSeconds: env.CACHE_TTL_SECONDS,
		fetchLeague: (sourceSlug, season) =>
			getUnderstatLeagueData(sourceSlug, season, {
				baseUrl: env.UNDERSTAT_BASE_URL,
				timeoutMs: env.UNDERSTAT_TIMEOUT_MS,
			}),
	});

	return createPredictionsService({
		provider,
		config: createModelConfig({
			homeAdvantage: env.HOME_ADVANTAGE,
			maxGoals: env.MAX_GOALS,
			topScoresCount: env.TOP_SCORES_COUNT,
		}),
	});
}

/**
 * Create the Hono app
 */
export function createApp({
	service,
	adminToken,
}: {
	service: PredictionsService;
	adminToken?: string;
}) {
	const app = new Hono();

	/**
	 * Middleware: request timing and logging
	 */
	app.use("*", async (context, next) => {
		const startTime = performance.now();
		await next();
		const duration = Number((performance.now() - startTime).toFixed(2));

		context.header("X-Response-Time", `${duration}ms`);
		logRequest(context.req.path, context.req.method, context.res.status, duration);
	});

	/**
	 * Health check endpoint
	 */
	app.get("/health", (context) => {
		return context.json({
			status: "ok",
			timestamp: new Date().toISOString(),
		});
	});

	/**
	 * Metrics endpoint (for monitoring)
	 */
	app.get("/metrics", (context) => {
		return context.json({
			status: "ok",
			metrics: getMetrics(),
		});
	});

	app.route("/leagues", createLeaguesRegistryRoutes());
	app.route("/", createPredictionsRoutes(service));
	app.route(
		"/admin/cache",
		createCacheAdminRoutes({
			adminToken,
			clearCache: () => service.clearCache(),
		}),
	);

	/**
	 * 404 handler
	 */
	app.notFound((context) => {
		return context.json(
			{
				status: "error",
				message: "Not found",
			},
			404,
		);
	});

	/**
	 * Error handler
	 */
	app.onError((error, context) => {
		console.error("❌ [Error]", error);
		return context.json(
			{
				status: "error",
				message: "Internal server error",
			},
			500,
		);
	});

	return app;
}
