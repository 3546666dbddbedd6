/**
 * Model Configuration
 *
 * Defaults for the xG Poisson model. Environment overrides are applied in
 * `config/env.ts`.
 */

import type { ModelConfig } from "../types";

/**
 * Baseline used when a league snapshot has no usable teams
 */
export const FALLBACK_LEAGUE_AVERAGE = 1.3;

export const DEFAULT_MODEL_CONFIG: ModelConfig = {
	/** Home sides score roughly 15% more than the same side away */
	homeAdvantage: 1.15,
	/** Goals 0..5 per side, a 6x6 grid */
	maxGoals: 5,
	topScoresCount: 3,
	minLambda: 0.05,
};

/**
 * Create a model config with partial overrides
 */
export function createModelConfig(
	overrides: Partial<ModelConfig> = {},
): ModelConfig {
	return {
		...DEFAULT_MODEL_CONFIG,
		...overrides,
	};
}
