/**
 * Predictions Service
 *
 * Orchestrates league resolution, team statistics and the Poisson model for
 * the three public operations. Holds no state of its own; every call works
 * on the snapshot the provider returns at that moment.
 */

import { logEvent, recordPrediction } from "../../../utils/metrics";
import {
	type League,
	listLeagues as listRegisteredLeagues,
	resolveLeague,
} from "../../leagues-registry";
import { findTeam, type TeamStatsProvider } from "../../team-stats";
import { DEFAULT_MODEL_CONFIG } from "../config/model-config";
import { TeamNotFoundError } from "../errors";
import { buildMatchPrediction } from "../simulations/match-prediction";
import type {
	LeagueBaseline,
	LeagueTableRow,
	ModelConfig,
	PredictionResult,
} from "../types";
import {
	calculateStrength,
	computeLeagueBaseline,
} from "../utils/strength-calculator";

export interface MatchPredictionResult {
	league: League;
	season: number;
	prediction: PredictionResult;
}

export interface LeagueTableResult {
	league: League;
	season: number;
	baseline: LeagueBaseline;
	rows: LeagueTableRow[];
}

export interface PredictionsService {
	/**
	 * @throws UnknownLeagueError | TeamNotFoundError | InsufficientDataError | SourceUnavailableError
	 */
	predictMatch(params: {
		homeTeam: string;
		awayTeam: string;
		league: string;
	}): Promise<MatchPredictionResult>;

	/**
	 * Teams with their ratings, strongest attack first. Teams that have not
	 * played yet have no rating and are left out.
	 *
	 * @throws UnknownLeagueError | SourceUnavailableError
	 */
	getLeagueTable(league: string): Promise<LeagueTableResult>;

	listLeagues(): League[];

	clearCache(): Promise<number>;
}

export const createPredictionsService = ({
	provider,
	config = DEFAULT_MODEL_CONFIG,
}: {
	provider: TeamStatsProvider;
	config?: ModelConfig;
}): PredictionsService => ({
	async predictMatch({ homeTeam, awayTeam, league }) {
		const resolved = resolveLeague(league);
		const season = provider.getSeason();

		// Both teams and the baseline come from the same snapshot
		const leagueTeams = await provider.getLeagueTeams(resolved);
		const home = findTeam(homeTeam, leagueTeams);
		if (!home) {
			throw new TeamNotFoundError(homeTeam, resolved.name);
		}
		const away = findTeam(awayTeam, leagueTeams);
		if (!away) {
			throw new TeamNotFoundError(awayTeam, resolved.name);
		}

		const prediction = buildMatchPrediction({
			home,
			away,
			leagueTeams,
			config,
		});

		recordPrediction();
		logEvent("prediction", {
			league: resolved.slug,
			home: prediction.homeTeam,
			away: prediction.awayTeam,
			lambdaHome: prediction.expectedGoals.home,
			lambdaAway: prediction.expectedGoals.away,
		});

		return { league: resolved, season, prediction };
	},

	async getLeagueTable(league) {
		const resolved = resolveLeague(league);
		const season = provider.getSeason();
		const teams = await provider.getLeagueTeams(resolved);
		const baseline = computeLeagueBaseline(teams);

		const rows = teams
			.filter((stats) => stats.matchesPlayed > 0)
			.map((stats) => ({
				stats,
				strength: calculateStrength(stats, baseline),
			}))
			.sort(
				(a, b) =>
					b.strength.attack - a.strength.attack ||
					a.stats.team.localeCompare(b.stats.team),
			);

		return { league: resolved, season, baseline, rows };
	},

	listLeagues() {
		return listRegisteredLeagues();
	},

	clearCache() {
		return provider.clearCache();
	},
});
