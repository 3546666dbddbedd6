import { describe, expect, it } from "vitest";
import {
	createTeamStats,
	SAMPLE_LEAGUE_TEAMS,
} from "../__fixtures__/team-stats";
import { FALLBACK_LEAGUE_AVERAGE } from "../config/model-config";
import { InsufficientDataError } from "../errors";
import {
	calculateStrength,
	computeLeagueBaseline,
	getPerMatchRates,
} from "./strength-calculator";

describe("getPerMatchRates", () => {
	it("divides totals by matches played", () => {
		const rates = getPerMatchRates(
			createTeamStats({
				matchesPlayed: 4,
				goalsScored: 6,
				goalsConceded: 2,
				xg: 5,
				xga: 3,
			}),
		);

		expect(rates).toEqual({
			goalsScored: 1.5,
			goalsConceded: 0.5,
			xg: 1.25,
			xga: 0.75,
		});
	});

	it("throws InsufficientDataError when no match has been played", () => {
		const stats = createTeamStats({ team: "Newcomers", matchesPlayed: 0 });

		expect(() => getPerMatchRates(stats)).toThrow(InsufficientDataError);
		expect(() => getPerMatchRates(stats)).toThrow(
			"Team 'Newcomers' has no matches played this season.",
		);
	});
});

describe("computeLeagueBaseline", () => {
	it("averages per-match rates over teams that have played", () => {
		const baseline = computeLeagueBaseline(SAMPLE_LEAGUE_TEAMS);

		expect(baseline.avgGoalsPerMatch).toBeCloseTo(1.4, 12);
		expect(baseline.avgXgPerMatch).toBeCloseTo(1.35, 12);
	});

	it("weights every team equally regardless of matches played", () => {
		const baseline = computeLeagueBaseline([
			createTeamStats({ matchesPlayed: 2, goalsScored: 4, xg: 4 }),
			createTeamStats({ matchesPlayed: 10, goalsScored: 10, xg: 10 }),
		]);

		expect(baseline.avgGoalsPerMatch).toBeCloseTo(1.5, 12);
		expect(baseline.avgXgPerMatch).toBeCloseTo(1.5, 12);
	});

	it("falls back when nobody has played", () => {
		const baseline = computeLeagueBaseline([
			createTeamStats({ matchesPlayed: 0 }),
		]);

		expect(baseline).toEqual({
			avgGoalsPerMatch: FALLBACK_LEAGUE_AVERAGE,
			avgXgPerMatch: FALLBACK_LEAGUE_AVERAGE,
		});
	});

	it("falls back when the average is zero", () => {
		const baseline = computeLeagueBaseline([
			createTeamStats({ goalsScored: 0, xg: 0 }),
		]);

		expect(baseline.avgGoalsPerMatch).toBe(1.3);
		expect(baseline.avgXgPerMatch).toBe(1.3);
	});
});

describe("calculateStrength", () => {
	it("rates xG and xGA against the league xG average", () => {
		const baseline = computeLeagueBaseline(SAMPLE_LEAGUE_TEAMS);

		const strength = calculateStrength(SAMPLE_LEAGUE_TEAMS[0], baseline);

		expect(strength.attack).toBeCloseTo(4 / 3, 9);
		expect(strength.defense).toBeCloseTo(2 / 3, 9);
	});

	it("rates an average side at 1.0", () => {
		const strength = calculateStrength(
			createTeamStats({ xg: 13.5, xga: 13.5 }),
			{ avgGoalsPerMatch: 1.4, avgXgPerMatch: 1.35 },
		);

		expect(strength.attack).toBeCloseTo(1, 12);
		expect(strength.defense).toBeCloseTo(1, 12);
	});
});
