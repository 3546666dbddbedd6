export { aggregateTeamStats } from "./aggregate";
export { formatSeasonLabel, getCurrentSeason } from "./season";
export { findTeam } from "./team-lookup";
export {
	createTeamStatsService,
	getLeagueCacheKey,
	type LeagueFetcher,
	parseCachedLeagueTeams,
	type TeamStatsServiceOptions,
} from "./team-stats.service";
export type { TeamStatsProvider } from "./types";
