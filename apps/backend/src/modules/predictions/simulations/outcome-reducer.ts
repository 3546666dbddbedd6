import { DEFAULT_MODEL_CONFIG } from "../config/model-config";
import type {
	FixtureExpectation,
	MatchOutcome,
	ScoreMatrix,
	ScorelineProbability,
} from "../types";
import { DEFAULT_GOAL_LINES } from "../types";

/**
 * Partition sums over the score matrix
 *
 * Every pair of complementary markets (over/under, BTTS yes/no) splits the
 * same covered mass, as do home/draw/away.
 */
export function summarizeMatrix(matrix: ScoreMatrix) {
	let homeWin = 0;
	let draw = 0;
	let awayWin = 0;
	let bttsYes = 0;
	let bttsNo = 0;
	let total = 0;

	for (let h = 0; h < matrix.length; h += 1) {
		for (let a = 0; a < matrix[h].length; a += 1) {
			const p = matrix[h][a];
			total += p;

			if (h > a) homeWin += p;
			else if (h === a) draw += p;
			else awayWin += p;

			if (h > 0 && a > 0) bttsYes += p;
			else bttsNo += p;
		}
	}

	return { homeWin, draw, awayWin, bttsYes, bttsNo, total };
}

/**
 * Probability of more than `line` total goals
 */
export function probabilityOver(matrix: ScoreMatrix, line: number): number {
	let total = 0;
	for (let h = 0; h < matrix.length; h += 1) {
		for (let a = 0; a < matrix[h].length; a += 1) {
			if (h + a > line) total += matrix[h][a];
		}
	}
	return total;
}

/**
 * Probability of fewer than `line` total goals
 */
export function probabilityUnder(matrix: ScoreMatrix, line: number): number {
	let total = 0;
	for (let h = 0; h < matrix.length; h += 1) {
		for (let a = 0; a < matrix[h].length; a += 1) {
			if (h + a < line) total += matrix[h][a];
		}
	}
	return total;
}

/**
 * Most likely scorelines
 *
 * Sorted by probability descending; ties go to the lower total, then to the
 * lower home score, so the order never depends on iteration order.
 */
export function rankScorelines(
	matrix: ScoreMatrix,
	limit: number = DEFAULT_MODEL_CONFIG.topScoresCount,
): ScorelineProbability[] {
	const scores: ScorelineProbability[] = [];
	for (let h = 0; h < matrix.length; h += 1) {
		for (let a = 0; a < matrix[h].length; a += 1) {
			scores.push({ home: h, away: a, probability: matrix[h][a] });
		}
	}

	scores.sort(
		(x, y) =>
			y.probability - x.probability ||
			x.home + x.away - (y.home + y.away) ||
			x.home - y.home,
	);

	return scores.slice(0, Math.max(0, limit));
}

function overByLine(matrix: ScoreMatrix): Record<string, number> {
	const probOverByLine: Record<string, number> = {};
	for (const line of DEFAULT_GOAL_LINES) {
		probOverByLine[String(line)] = probabilityOver(matrix, line);
	}
	return probOverByLine;
}

/**
 * Reduce a score matrix to the reported outcome metrics
 *
 * Expected goals are the model's lambdas, not the matrix mean.
 */
export function reduceScoreMatrix(
	matrix: ScoreMatrix,
	expectation: FixtureExpectation,
	options: { topScoresCount?: number } = {},
): MatchOutcome {
	const summary = summarizeMatrix(matrix);

	return {
		probHomeWin: summary.homeWin,
		probDraw: summary.draw,
		probAwayWin: summary.awayWin,
		probOver25: probabilityOver(matrix, 2.5),
		probUnder25: probabilityUnder(matrix, 2.5),
		probBTTSYes: summary.bttsYes,
		probBTTSNo: summary.bttsNo,
		probOverByLine: overByLine(matrix),
		expectedGoals: {
			home: expectation.lambdaHome,
			away: expectation.lambdaAway,
		},
		topScores: rankScorelines(
			matrix,
			options.topScoresCount ?? DEFAULT_MODEL_CONFIG.topScoresCount,
		),
		coveredMass: summary.total,
	};
}
