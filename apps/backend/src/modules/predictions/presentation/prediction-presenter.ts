/**
 * Prediction Presenter
 *
 * Shapes service results into the payloads HTTP and MCP callers receive.
 * Probabilities become one-decimal percent strings; nothing is renormalised,
 * so percentages can sum to slightly under 100% when the score matrix drops
 * high-scoring tails.
 */

import type {
	LeagueSummary,
	LeagueTablePayload,
	MatchPredictionPayload,
	PercentString,
} from "@goalcast/shared-types";
import type { League } from "../../leagues-registry";
import { formatSeasonLabel } from "../../team-stats";
import type {
	LeagueTableResult,
	MatchPredictionResult,
} from "../services/predictions.service";
import type { ScorelineProbability } from "../types";
import { roundTo } from "../utils/helpers";

export function toPercent(fraction: number): PercentString {
	return `${roundTo(fraction * 100, 1)}%`;
}

/**
 * "2-1 (12.3%)"
 */
export function formatScoreline(score: ScorelineProbability): string {
	return `${score.home}-${score.away} (${toPercent(score.probability)})`;
}

export function presentLeagues(leagues: readonly League[]): LeagueSummary[] {
	return leagues.map(({ id, name, slug }) => ({ id, name, slug }));
}

export function presentMatchPrediction({
	league,
	season,
	prediction,
}: MatchPredictionResult): MatchPredictionPayload {
	const goalLines: Record<string, PercentString> = {};
	for (const [line, probability] of Object.entries(prediction.probOverByLine)) {
		goalLines[`over_${line}`] = toPercent(probability);
	}

	return {
		match: `${prediction.homeTeam} vs ${prediction.awayTeam}`,
		league: league.name,
		season: formatSeasonLabel(season),
		expected_goals: {
			home: roundTo(prediction.expectedGoals.home, 3),
			away: roundTo(prediction.expectedGoals.away, 3),
		},
		probabilities: {
			home_win: toPercent(prediction.probHomeWin),
			draw: toPercent(prediction.probDraw),
			away_win: toPercent(prediction.probAwayWin),
		},
		"over_under_2.5": {
			over: toPercent(prediction.probOver25),
			under: toPercent(prediction.probUnder25),
		},
		goal_lines: goalLines,
		btts: {
			yes: toPercent(prediction.probBTTSYes),
			no: toPercent(prediction.probBTTSNo),
		},
		top_scores: prediction.topScores.map(formatScoreline),
		score_matrix: prediction.scoreMatrix.map((row) =>
			row.map((cell) => roundTo(cell, 6)),
		),
		covered_mass: toPercent(prediction.coveredMass),
	};
}

export function presentLeagueTable({
	league,
	season,
	baseline,
	rows,
}: LeagueTableResult): LeagueTablePayload {
	return {
		league: league.name,
		season: formatSeasonLabel(season),
		averages: {
			goals_per_match: roundTo(baseline.avgGoalsPerMatch, 4),
			xg_per_match: roundTo(baseline.avgXgPerMatch, 4),
		},
		teams: rows.map(({ stats, strength }, index) => ({
			rank: index + 1,
			team: stats.team,
			matches: stats.matchesPlayed,
			goals_for: stats.goalsScored,
			goals_against: stats.goalsConceded,
			xg_total: roundTo(stats.xg, 3),
			xga_total: roundTo(stats.xga, 3),
			xg_per_match: roundTo(stats.xg / stats.matchesPlayed, 3),
			xga_per_match: roundTo(stats.xga / stats.matchesPlayed, 3),
			attack: roundTo(strength.attack, 3),
			defense: roundTo(strength.defense, 3),
		})),
	};
}
