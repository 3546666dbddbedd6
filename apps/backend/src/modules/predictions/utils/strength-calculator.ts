/**
 * Strength Calculator
 *
 * Turns season xG aggregates into attack/defense ratings relative to the
 * league. Both ratings are normalised by the league's average xG per match,
 * so 1.0 is an average side.
 */

import { FALLBACK_LEAGUE_AVERAGE } from "../config/model-config";
import { InsufficientDataError } from "../errors";
import type { LeagueBaseline, StrengthRating, TeamSeasonStats } from "../types";
import { mean } from "./helpers";

/**
 * Per-match rates for a team
 *
 * @throws InsufficientDataError when the team has not played
 */
export function getPerMatchRates(stats: TeamSeasonStats): {
	goalsScored: number;
	goalsConceded: number;
	xg: number;
	xga: number;
} {
	if (!(stats.matchesPlayed > 0)) {
		throw new InsufficientDataError(stats.team);
	}

	const mp = stats.matchesPlayed;
	return {
		goalsScored: stats.goalsScored / mp,
		goalsConceded: stats.goalsConceded / mp,
		xg: stats.xg / mp,
		xga: stats.xga / mp,
	};
}

/**
 * League baseline from every team that has played
 *
 * Each value is the mean of the teams' own per-match rates. Falls back to
 * 1.3 when no team has played or the mean is not positive.
 */
export function computeLeagueBaseline(
	teams: readonly TeamSeasonStats[],
): LeagueBaseline {
	const rates = teams
		.filter((team) => team.matchesPlayed > 0)
		.map(getPerMatchRates);

	const avgGoals = mean(rates.map((rate) => rate.goalsScored));
	const avgXg = mean(rates.map((rate) => rate.xg));

	return {
		avgGoalsPerMatch: positiveOrFallback(avgGoals),
		avgXgPerMatch: positiveOrFallback(avgXg),
	};
}

/**
 * Attack and defense strength for one team
 *
 * @throws InsufficientDataError when the team has not played
 */
export function calculateStrength(
	stats: TeamSeasonStats,
	baseline: LeagueBaseline,
): StrengthRating {
	const rates = getPerMatchRates(stats);

	return {
		attack: rates.xg / baseline.avgXgPerMatch,
		defense: rates.xga / baseline.avgXgPerMatch,
	};
}

function positiveOrFallback(value: number | null): number {
	if (value === null || !Number.isFinite(value) || value <= 0) {
		return FALLBACK_LEAGUE_AVERAGE;
	}
	return value;
}
