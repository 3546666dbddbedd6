import type {
	FixtureExpectation,
	LeagueBaseline,
	StrengthRating,
} from "../types";
import { DEFAULT_MODEL_CONFIG } from "../config/model-config";

/**
 * Expected goals for both sides of a fixture
 *
 * lambdaHome = avg goals x home attack x away defense x home advantage
 * lambdaAway = avg goals x away attack x home defense
 *
 * Both values are floored at `minLambda` so an extreme rating never yields
 * a zero-goal distribution.
 */
export function estimateExpectedGoals({
	home,
	away,
	baseline,
	homeAdvantage = DEFAULT_MODEL_CONFIG.homeAdvantage,
	minLambda = DEFAULT_MODEL_CONFIG.minLambda,
}: {
	home: StrengthRating;
	away: StrengthRating;
	baseline: LeagueBaseline;
	homeAdvantage?: number;
	minLambda?: number;
}): FixtureExpectation {
	const lambdaHome =
		baseline.avgGoalsPerMatch * home.attack * away.defense * homeAdvantage;
	const lambdaAway =
		baseline.avgGoalsPerMatch * away.attack * home.defense;

	return {
		lambdaHome: floorLambda(lambdaHome, minLambda),
		lambdaAway: floorLambda(lambdaAway, minLambda),
	};
}

function floorLambda(value: number, minLambda: number): number {
	if (!Number.isFinite(value)) return minLambda;
	return Math.max(value, minLambda);
}
