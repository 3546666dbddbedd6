import type { League } from "../leagues-registry";
import type { TeamSeasonStats } from "../predictions/types";

/**
 * Source of per-team season aggregates for a league.
 * Implementations own fetching and caching; callers only see values.
 */
export interface TeamStatsProvider {
	/**
	 * @throws SourceUnavailableError
	 */
	getLeagueTeams(league: League): Promise<TeamSeasonStats[]>;

	/**
	 * @throws TeamNotFoundError | SourceUnavailableError
	 */
	getTeamStats(league: League, teamName: string): Promise<TeamSeasonStats>;

	/** Season the provider currently serves (start year) */
	getSeason(): number;

	/** Drop every cached league snapshot, returning the number removed */
	clearCache(): Promise<number>;
}
