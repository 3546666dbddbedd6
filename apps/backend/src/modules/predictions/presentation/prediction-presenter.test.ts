import { describe, expect, it } from "vitest";
import { listLeagues, resolveLeague } from "../../leagues-registry";
import { createStubTeamStatsProvider } from "../__fixtures__/team-stats";
import { createPredictionsService } from "../services/predictions.service";
import {
	formatScoreline,
	presentLeagues,
	presentLeagueTable,
	presentMatchPrediction,
	toPercent,
} from "./prediction-presenter";

describe("toPercent", () => {
	it("renders one decimal", () => {
		expect(toPercent(0.6523)).toBe("65.2%");
		expect(toPercent(0.12345)).toBe("12.3%");
	});

	it("drops a trailing zero", () => {
		expect(toPercent(0.55)).toBe("55%");
		expect(toPercent(0)).toBe("0%");
	});
});

describe("formatScoreline", () => {
	it("formats score and probability", () => {
		expect(formatScoreline({ home: 2, away: 1, probability: 0.1234 })).toBe(
			"2-1 (12.3%)",
		);
	});
});

describe("presentLeagues", () => {
	it("exposes id, name and slug only", () => {
		expect(presentLeagues(listLeagues())[0]).toEqual({
			id: 9,
			name: "Premier League",
			slug: "EPL",
		});
	});
});

describe("presentMatchPrediction", () => {
	it("shapes a prediction for callers", () => {
		const payload = presentMatchPrediction({
			league: resolveLeague("EPL"),
			season: 2025,
			prediction: {
				homeTeam: "Alpha United",
				awayTeam: "Delta Athletic",
				probHomeWin: 0.6523,
				probDraw: 0.2011,
				probAwayWin: 0.1234,
				probOver25: 0.55,
				probUnder25: 0.4,
				probBTTSYes: 0.3,
				probBTTSNo: 0.65,
				probOverByLine: { "0.5": 0.9, "2.5": 0.55 },
				expectedGoals: { home: 2.86222, away: 0.62222 },
				topScores: [{ home: 2, away: 0, probability: 0.1234 }],
				coveredMass: 0.95,
				scoreMatrix: [
					[0.1234567, 0.2],
					[0.3, 0.0000001],
				],
			},
		});

		expect(payload).toEqual({
			match: "Alpha United vs Delta Athletic",
			league: "Premier League",
			season: "2025/2026",
			expected_goals: { home: 2.862, away: 0.622 },
			probabilities: {
				home_win: "65.2%",
				draw: "20.1%",
				away_win: "12.3%",
			},
			"over_under_2.5": { over: "55%", under: "40%" },
			goal_lines: { "over_0.5": "90%", "over_2.5": "55%" },
			btts: { yes: "30%", no: "65%" },
			top_scores: ["2-0 (12.3%)"],
			score_matrix: [
				[0.123457, 0.2],
				[0.3, 0],
			],
			covered_mass: "95%",
		});
	});
});

describe("presentLeagueTable", () => {
	it("ranks teams and rounds ratings", async () => {
		const service = createPredictionsService({
			provider: createStubTeamStatsProvider(),
		});

		const payload = presentLeagueTable(await service.getLeagueTable("EPL"));

		expect(payload.league).toBe("Premier League");
		expect(payload.season).toBe("2025/2026");
		expect(payload.averages).toEqual({
			goals_per_match: 1.4,
			xg_per_match: 1.35,
		});
		expect(payload.teams).toHaveLength(4);
		expect(payload.teams[0]).toEqual({
			rank: 1,
			team: "Alpha United",
			matches: 10,
			goals_for: 20,
			goals_against: 10,
			xg_total: 18,
			xga_total: 9,
			xg_per_match: 1.8,
			xga_per_match: 0.9,
			attack: 1.333,
			defense: 0.667,
		});
		expect(payload.teams[3]).toMatchObject({
			rank: 4,
			team: "Delta Athletic",
			attack: 0.667,
			defense: 1.333,
		});
	});
});
