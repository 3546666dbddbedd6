import { DEFAULT_MODEL_CONFIG } from "../config/model-config";
import type { ModelConfig, PredictionResult, TeamSeasonStats } from "../types";
import {
	calculateStrength,
	computeLeagueBaseline,
} from "../utils/strength-calculator";
import { estimateExpectedGoals } from "./expected-goals";
import { reduceScoreMatrix } from "./outcome-reducer";
import { buildScoreMatrix } from "./score-matrix";

/**
 * Full prediction for one fixture
 *
 * The baseline comes from every team in `leagueTeams`, so the same two
 * teams can rate differently against different league snapshots.
 *
 * @throws InsufficientDataError when either team has no matches played
 */
export function buildMatchPrediction({
	home,
	away,
	leagueTeams,
	config = DEFAULT_MODEL_CONFIG,
}: {
	home: TeamSeasonStats;
	away: TeamSeasonStats;
	leagueTeams: readonly TeamSeasonStats[];
	config?: ModelConfig;
}): PredictionResult {
	const baseline = computeLeagueBaseline(leagueTeams);
	const homeStrength = calculateStrength(home, baseline);
	const awayStrength = calculateStrength(away, baseline);

	const expectation = estimateExpectedGoals({
		home: homeStrength,
		away: awayStrength,
		baseline,
		homeAdvantage: config.homeAdvantage,
		minLambda: config.minLambda,
	});

	const scoreMatrix = buildScoreMatrix(
		expectation.lambdaHome,
		expectation.lambdaAway,
		config.maxGoals,
	);

	return {
		homeTeam: home.team,
		awayTeam: away.team,
		...reduceScoreMatrix(scoreMatrix, expectation, {
			topScoresCount: config.topScoresCount,
		}),
		scoreMatrix,
	};
}
