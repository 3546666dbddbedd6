import type { LeagueTablePayload } from "@goalcast/shared-types";

const COLUMNS = [
	{ header: "#", width: 3 },
	{ header: "Team", width: 24 },
	{ header: "MP", width: 4 },
	{ header: "xG/M", width: 6 },
	{ header: "xGA/M", width: 6 },
	{ header: "ATT", width: 6 },
	{ header: "DEF", width: 6 },
] as const;

const pad = (value: string | number, width: number, alignLeft = false) =>
	alignLeft ? String(value).padEnd(width) : String(value).padStart(width);

/**
 * Plain-text league table, one team per line
 */
export const formatLeagueTable = (table: LeagueTablePayload): string => {
	const header = COLUMNS.map(({ header: title, width }, index) =>
		pad(title, width, index === 1),
	).join(" ");

	const rows = table.teams.map((row) =>
		[
			pad(row.rank, COLUMNS[0].width),
			pad(row.team, COLUMNS[1].width, true),
			pad(row.matches, COLUMNS[2].width),
			pad(row.xg_per_match.toFixed(2), COLUMNS[3].width),
			pad(row.xga_per_match.toFixed(2), COLUMNS[4].width),
			pad(row.attack.toFixed(2), COLUMNS[5].width),
			pad(row.defense.toFixed(2), COLUMNS[6].width),
		].join(" "),
	);

	return [
		`${table.league} ${table.season}`,
		`Averages: ${table.averages.goals_per_match} goals/match, ${table.averages.xg_per_match} xG/match`,
		"",
		header,
		...rows,
	].join("\n");
};
