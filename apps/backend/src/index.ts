import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp, createPredictionsServiceFromEnv } from "./app";
import { APP_VERSION } from "./config/app-info";
import { loadEnv } from "./config/env";
import { configureLogging, logEvent } from "./utils";

const env = loadEnv();
configureLogging({ level: env.LOG_LEVEL });

const app = createApp({
	service: createPredictionsServiceFromEnv(env),
	adminToken: env.ADMIN_TOKEN,
});

serve({ fetch: app.fetch, port: env.PORT }, (info) => {
	logEvent("server_started", {
		port: info.port,
		version: APP_VERSION,
		cacheDriver: env.CACHE_DRIVER,
	});
});
