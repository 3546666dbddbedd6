/**
 * Prediction API Types
 *
 * Payloads returned to callers of the HTTP API and the MCP tools.
 */

export type PercentString = `${number}%`;

export interface LeagueSummary {
	id: number;
	name: string;
	slug: string;
}

export interface MatchPredictionPayload {
	match: string;
	league: string;
	season: string;
	expected_goals: {
		home: number;
		away: number;
	};
	probabilities: {
		home_win: PercentString;
		draw: PercentString;
		away_win: PercentString;
	};
	"over_under_2.5": {
		over: PercentString;
		under: PercentString;
	};
	goal_lines: Record<string, PercentString>;
	btts: {
		yes: PercentString;
		no: PercentString;
	};
	top_scores: string[];
	score_matrix: number[][];
	covered_mass: PercentString;
}

export interface LeagueTableRowPayload {
	rank: number;
	team: string;
	matches: number;
	goals_for: number;
	goals_against: number;
	xg_total: number;
	xga_total: number;
	xg_per_match: number;
	xga_per_match: number;
	attack: number;
	defense: number;
}

export interface LeagueTablePayload {
	league: string;
	season: string;
	averages: {
		goals_per_match: number;
		xg_per_match: number;
	};
	teams: LeagueTableRowPayload[];
}
