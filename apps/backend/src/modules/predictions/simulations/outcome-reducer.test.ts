import { describe, expect, it } from "vitest";
import {
	probabilityOver,
	probabilityUnder,
	rankScorelines,
	reduceScoreMatrix,
	summarizeMatrix,
} from "./outcome-reducer";
import { buildScoreMatrix, matrixMass, poissonPmf } from "./score-matrix";

const LAMBDA_PAIRS: Array<[number, number]> = [
	[0.05, 0.05],
	[1.5, 1.0],
	[2.093, 1.386],
	[3.8, 0.4],
];

describe("summarizeMatrix", () => {
	it.each(LAMBDA_PAIRS)(
		"splits the covered mass between home, draw and away (%s vs %s)",
		(lambdaHome, lambdaAway) => {
			const matrix = buildScoreMatrix(lambdaHome, lambdaAway, 5);
			const summary = summarizeMatrix(matrix);
			const mass = matrixMass(matrix);

			expect(
				Math.abs(summary.homeWin + summary.draw + summary.awayWin - mass),
			).toBeLessThan(1e-9);
			expect(Math.abs(summary.bttsYes + summary.bttsNo - mass)).toBeLessThan(
				1e-9,
			);
			expect(Math.abs(summary.total - mass)).toBeLessThan(1e-9);
		},
	);

	it("counts both-teams-to-score only when neither side is on zero", () => {
		const matrix = [
			[0.1, 0.2],
			[0.3, 0.4],
		];

		const summary = summarizeMatrix(matrix);

		expect(summary.bttsYes).toBeCloseTo(0.4, 12);
		expect(summary.bttsNo).toBeCloseTo(0.6, 12);
		expect(summary.homeWin).toBeCloseTo(0.3, 12);
		expect(summary.draw).toBeCloseTo(0.5, 12);
		expect(summary.awayWin).toBeCloseTo(0.2, 12);
	});
});

describe("goal lines", () => {
	it.each(LAMBDA_PAIRS)(
		"over 2.5 and under 2.5 cover the same mass (%s vs %s)",
		(lambdaHome, lambdaAway) => {
			const matrix = buildScoreMatrix(lambdaHome, lambdaAway, 5);

			expect(
				Math.abs(
					probabilityOver(matrix, 2.5) +
						probabilityUnder(matrix, 2.5) -
						matrixMass(matrix),
				),
			).toBeLessThan(1e-9);
		},
	);

	it("puts a total of exactly 2 under the line", () => {
		const matrix = [
			[0, 0, 0.5],
			[0, 0, 0],
			[0, 0, 0.5],
		];

		expect(probabilityUnder(matrix, 2.5)).toBe(0.5);
		expect(probabilityOver(matrix, 2.5)).toBe(0.5);
	});
});

describe("rankScorelines", () => {
	it("ranks 1-0 first for 1.5 vs 1.0, tied with 1-1 on probability", () => {
		const matrix = buildScoreMatrix(1.5, 1.0, 5);
		const expected = poissonPmf(1, 1.5) * poissonPmf(1, 1.0);

		const [first, second, third] = rankScorelines(matrix, 3);

		expect(first).toMatchObject({ home: 1, away: 0 });
		expect(first.probability).toBeCloseTo(expected, 12);
		expect(first.probability).toBeCloseTo(1.5 * Math.exp(-1.5) * Math.exp(-1), 12);
		expect(second).toMatchObject({ home: 1, away: 1 });
		expect(third).toMatchObject({ home: 2, away: 0 });
	});

	it("returns at most the requested number of scorelines", () => {
		const matrix = buildScoreMatrix(1.2, 1.2, 2);

		expect(rankScorelines(matrix, 5)).toHaveLength(5);
		expect(rankScorelines(matrix, 20)).toHaveLength(9);
		expect(rankScorelines(matrix, 0)).toEqual([]);
	});
});

describe("reduceScoreMatrix", () => {
	it("reports the lambdas as expected goals", () => {
		const matrix = buildScoreMatrix(2.093, 1.386, 5);

		const outcome = reduceScoreMatrix(matrix, {
			lambdaHome: 2.093,
			lambdaAway: 1.386,
		});

		expect(outcome.expectedGoals).toEqual({ home: 2.093, away: 1.386 });
		expect(outcome.probHomeWin).toBeGreaterThan(outcome.probAwayWin);
		expect(outcome.topScores).toHaveLength(3);
		expect(outcome.probOverByLine["2.5"]).toBe(outcome.probOver25);
		expect(Object.keys(outcome.probOverByLine)).toEqual([
			"0.5",
			"1.5",
			"2.5",
			"3.5",
			"4.5",
			"5.5",
		]);
		expect(outcome.coveredMass).toBeCloseTo(matrixMass(matrix), 12);
	});

	it("honours topScoresCount", () => {
		const matrix = buildScoreMatrix(1.5, 1.0, 5);

		const outcome = reduceScoreMatrix(
			matrix,
			{ lambdaHome: 1.5, lambdaAway: 1.0 },
			{ topScoresCount: 5 },
		);

		expect(outcome.topScores).toHaveLength(5);
	});
});
