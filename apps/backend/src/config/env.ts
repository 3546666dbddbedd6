/**
 * Environment configuration
 *
 * Values come from `process.env` (with `.env` support) and are validated once
 * at startup. Model constants live in the predictions config; this module
 * only maps environment overrides onto them.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { TTL } from "../modules/cache/types";
import { DEFAULT_MODEL_CONFIG } from "../modules/predictions/config/model-config";
import { DEFAULT_UNDERSTAT_BASE_URL } from "../pkg/util/understat-api";

const positiveNumber = z.coerce.number().positive();

const envSchema = z.object({
	PORT: z.coerce.number().int().min(1).max(65535).default(8787),
	UNDERSTAT_BASE_URL: z.string().url().default(DEFAULT_UNDERSTAT_BASE_URL),
	UNDERSTAT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
	CACHE_DRIVER: z.enum(["file", "memory"]).default("file"),
	CACHE_DIR: z.string().min(1).optional(),
	CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(TTL.TEAM_STATS),
	HOME_ADVANTAGE: positiveNumber.default(DEFAULT_MODEL_CONFIG.homeAdvantage),
	MAX_GOALS: z.coerce
		.number()
		.int()
		.min(1)
		.max(20)
		.default(DEFAULT_MODEL_CONFIG.maxGoals),
	TOP_SCORES_COUNT: z.coerce
		.number()
		.int()
		.min(1)
		.max(20)
		.default(DEFAULT_MODEL_CONFIG.topScoresCount),
	ADMIN_TOKEN: z.string().min(1).optional(),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type AppEnv = z.infer<typeof envSchema> & {
	CACHE_DIR: string;
};

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export function defaultCacheDir(): string {
	return join(homedir(), ".cache", "goalcast");
}

/**
 * Parse and validate the environment
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadEnv(
	source: Record<string, string | undefined> = process.env,
): AppEnv {
	// Empty strings mean "unset" so that `FOO=` in a .env file falls back to the default
	const cleaned = Object.fromEntries(
		Object.entries(source).filter(([, value]) => value !== ""),
	);

	const parsed = envSchema.safeParse(cleaned);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid environment: ${details}`);
	}

	return {
		...parsed.data,
		CACHE_DIR: parsed.data.CACHE_DIR ?? defaultCacheDir(),
	};
}
