import { getMonth, getYear } from "date-fns";

/** August, zero-based */
const SEASON_START_MONTH = 7;

/**
 * Start year of the current European season (August to May), in UTC
 */
export const getCurrentSeason = (now: Date = new Date()): number => {
	// Local Date carrying the UTC calendar fields, so date-fns reads UTC values
	const utcToday = new Date(
		now.getUTCFullYear(),
		now.getUTCMonth(),
		now.getUTCDate(),
	);
	const year = getYear(utcToday);
	return getMonth(utcToday) >= SEASON_START_MONTH ? year : year - 1;
};

/**
 * "2025/2026" style label
 */
export const formatSeasonLabel = (season: number): string =>
	`${season}/${season + 1}`;
