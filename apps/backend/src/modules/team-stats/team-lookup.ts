import type { TeamSeasonStats } from "../predictions/types";
import { normalizeName } from "../predictions/utils/helpers";

/**
 * Find a team by name
 *
 * Case-insensitive exact match first, then a partial match in either
 * direction ("Manchester" finds "Manchester United", "Arsenal FC" finds
 * "Arsenal"). Returns the first partial hit in source order.
 */
export function findTeam(
	name: string,
	teams: readonly TeamSeasonStats[],
): TeamSeasonStats | null {
	const query = normalizeName(name);
	if (!query) return null;

	const exact = teams.find((team) => normalizeName(team.team) === query);
	if (exact) return exact;

	return (
		teams.find((team) => {
			const candidate = normalizeName(team.team);
			return candidate.includes(query) || query.includes(candidate);
		}) ?? null
	);
}
