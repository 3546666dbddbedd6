import type { UnderstatTeamRecord } from "../../pkg/util/understat-api";
import type { TeamSeasonStats } from "../predictions/types";
import { roundTo } from "../predictions/utils/helpers";

/**
 * Sum per-match Understat rows into season aggregates
 *
 * Teams without a title or without any played match are skipped. Totals are
 * rounded to 3 decimals.
 */
export function aggregateTeamStats(
	teams: readonly UnderstatTeamRecord[],
): TeamSeasonStats[] {
	const result: TeamSeasonStats[] = [];

	for (const team of teams) {
		const title = team.title.trim();
		if (!title || team.history.length === 0) continue;

		const totals = team.history.reduce(
			(acc, match) => {
				acc.xg += match.xG;
				acc.xga += match.xGA;
				acc.scored += match.scored;
				acc.conceded += match.missed;
				return acc;
			},
			{ xg: 0, xga: 0, scored: 0, conceded: 0 },
		);

		result.push({
			team: title,
			matchesPlayed: team.history.length,
			goalsScored: Math.round(totals.scored),
			goalsConceded: Math.round(totals.conceded),
			xg: roundTo(totals.xg, 3),
			xga: roundTo(totals.xga, 3),
		});
	}

	return result;
}
