/**
 * Team Statistics Service
 *
 * Understat-backed TeamStatsProvider. League snapshots are cached per
 * (league, season) and refreshed once older than the TTL.
 */

import { z } from "zod";
import {
	getUnderstatLeagueData,
	type UnderstatTeamRecord,
} from "../../pkg/util/understat-api";
import { logEvent } from "../../utils/metrics";
import {
	type CacheProvider,
	type CacheValidator,
	createDeduplicator,
	isStale,
	TTL,
} from "../cache";
import type { League } from "../leagues-registry";
import { SourceUnavailableError, TeamNotFoundError } from "../predictions/errors";
import type { TeamSeasonStats } from "../predictions/types";
import { aggregateTeamStats } from "./aggregate";
import { getCurrentSeason } from "./season";
import { findTeam } from "./team-lookup";
import type { TeamStatsProvider } from "./types";

const teamSeasonStatsSchema = z.object({
	team: z.string().min(1),
	matchesPlayed: z.number().int().nonnegative(),
	goalsScored: z.number().int().nonnegative(),
	goalsConceded: z.number().int().nonnegative(),
	xg: z.number().nonnegative(),
	xga: z.number().nonnegative(),
});

/**
 * Validator for league snapshots read back from the cache
 */
export const parseCachedLeagueTeams: CacheValidator<TeamSeasonStats[]> = (
	value,
) => {
	const parsed = z.array(teamSeasonStatsSchema).safeParse(value);
	return parsed.success ? parsed.data : null;
};

export const getLeagueCacheKey = (leagueId: number, season: number): string =>
	`understat:${leagueId}:${season}`;

export type LeagueFetcher = (
	sourceSlug: string,
	season: number,
) => Promise<UnderstatTeamRecord[]>;

export interface TeamStatsServiceOptions {
	cache: CacheProvider<TeamSeasonStats[]>;
	/** Seconds a fetched snapshot stays fresh; stored with the cache entry */
	ttlSeconds?: number;
	fetchLeague?: LeagueFetcher;
	now?: () => Date;
}

export const createTeamStatsService = ({
	cache,
	ttlSeconds = TTL.TEAM_STATS,
	fetchLeague = (sourceSlug, season) =>
		getUnderstatLeagueData(sourceSlug, season),
	now = () => new Date(),
}: TeamStatsServiceOptions): TeamStatsProvider => {
	const dedupe = createDeduplicator<TeamSeasonStats[]>();

	const getSeason = () => getCurrentSeason(now());

	const loadLeague = async (
		league: League,
		season: number,
		cacheKey: string,
	): Promise<TeamSeasonStats[]> => {
		// 1. Check cache
		const cached = await cache.get(cacheKey);
		let staleData: TeamSeasonStats[] | null = null;

		if (cached.data) {
			if (!isStale(cached.meta, now().getTime())) {
				return cached.data;
			}
			staleData = cached.data;
			logEvent("team_stats_stale", { league: league.slug, season }, "debug");
		}

		// 2. Fetch from Understat
		try {
			const teams = aggregateTeamStats(
				await fetchLeague(league.sourceSlug, season),
			);
			if (teams.length === 0) {
				throw new SourceUnavailableError(
					"No team data available for this league/season.",
				);
			}

			const stored = await cache.set(cacheKey, teams, { ttl: ttlSeconds });
			if (!stored) {
				logEvent("team_stats_cache_skipped", { key: cacheKey }, "warn");
			}
			return teams;
		} catch (error) {
			if (staleData) {
				logEvent(
					"team_stats_stale_fallback",
					{
						league: league.slug,
						season,
						error: error instanceof Error ? error.message : String(error),
					},
					"warn",
				);
				return staleData;
			}
			throw error;
		}
	};

	const getLeagueTeams = async (league: League): Promise<TeamSeasonStats[]> => {
		const season = getSeason();
		const cacheKey = getLeagueCacheKey(league.id, season);
		return dedupe(cacheKey, () => loadLeague(league, season, cacheKey));
	};

	const getTeamStats = async (
		league: League,
		teamName: string,
	): Promise<TeamSeasonStats> => {
		const teams = await getLeagueTeams(league);
		const team = findTeam(teamName, teams);
		if (!team) {
			throw new TeamNotFoundError(teamName, league.name);
		}
		return team;
	};

	return {
		getLeagueTeams,
		getTeamStats,
		getSeason,
		clearCache: () => cache.clear(),
	};
};
