import type { TeamStatsProvider } from "../../team-stats";
import { findTeam } from "../../team-stats";
import { SourceUnavailableError, TeamNotFoundError } from "../errors";
import type { TeamSeasonStats } from "../types";

export function createTeamStats(
	overrides: Partial<TeamSeasonStats> = {},
): TeamSeasonStats {
	return {
		team: "Test Team",
		matchesPlayed: 10,
		goalsScored: 14,
		goalsConceded: 14,
		xg: 13.5,
		xga: 13.5,
		...overrides,
	};
}

/**
 * Four sides with 10 matches each plus one that has not played.
 *
 * Per-match goals average 1.4 and per-match xG averages 1.35, so:
 * Alpha 1.333 att / 0.667 def, Bravo 1.111 / 0.889,
 * Charlie 0.889 / 1.111, Delta 0.667 / 1.333.
 */
export const SAMPLE_LEAGUE_TEAMS: TeamSeasonStats[] = [
	createTeamStats({
		team: "Alpha United",
		goalsScored: 20,
		goalsConceded: 10,
		xg: 18,
		xga: 9,
	}),
	createTeamStats({
		team: "Bravo City",
		goalsScored: 15,
		goalsConceded: 15,
		xg: 15,
		xga: 12,
	}),
	createTeamStats({
		team: "Charlie Rovers",
		goalsScored: 10,
		goalsConceded: 15,
		xg: 12,
		xga: 15,
	}),
	createTeamStats({
		team: "Delta Athletic",
		goalsScored: 11,
		goalsConceded: 16,
		xg: 9,
		xga: 18,
	}),
	createTeamStats({
		team: "Echo Town",
		matchesPlayed: 0,
		goalsScored: 0,
		goalsConceded: 0,
		xg: 0,
		xga: 0,
	}),
];

/**
 * In-process provider over a fixed league snapshot
 */
export function createStubTeamStatsProvider({
	teams = SAMPLE_LEAGUE_TEAMS,
	season = 2025,
	failWith,
}: {
	teams?: TeamSeasonStats[];
	season?: number;
	failWith?: SourceUnavailableError;
} = {}): TeamStatsProvider {
	const getLeagueTeams = async () => {
		if (failWith) throw failWith;
		return teams;
	};

	return {
		getLeagueTeams,
		async getTeamStats(league, teamName) {
			const team = findTeam(teamName, await getLeagueTeams());
			if (!team) throw new TeamNotFoundError(teamName, league.name);
			return team;
		},
		getSeason: () => season,
		clearCache: async () => 2,
	};
}
