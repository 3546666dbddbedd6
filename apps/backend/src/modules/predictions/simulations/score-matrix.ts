import type { ScoreMatrix } from "../types";
import { DEFAULT_MODEL_CONFIG } from "../config/model-config";

/**
 * Poisson probabilities P(0..maxGoals) for a rate
 *
 * Uses term(k) = term(k-1) * lambda / k starting from e^-lambda, so no
 * factorial is ever formed.
 */
export function poissonProbabilities(
	lambda: number,
	maxGoals: number,
): number[] {
	const probs: number[] = [];
	let term = Math.exp(-lambda);
	for (let k = 0; k <= maxGoals; k += 1) {
		if (k > 0) term = (term * lambda) / k;
		probs.push(term);
	}
	return probs;
}

/**
 * Single Poisson probability P(k; lambda)
 */
export function poissonPmf(k: number, lambda: number): number {
	return poissonProbabilities(lambda, k)[k] ?? 0;
}

/**
 * Joint score distribution under independent Poisson goal counts
 *
 * Mass for scorelines beyond `maxGoals` on either side is left out, not
 * folded into the last row or column.
 */
export function buildScoreMatrix(
	lambdaHome: number,
	lambdaAway: number,
	maxGoals: number = DEFAULT_MODEL_CONFIG.maxGoals,
): ScoreMatrix {
	const homeProbs = poissonProbabilities(lambdaHome, maxGoals);
	const awayProbs = poissonProbabilities(lambdaAway, maxGoals);

	return homeProbs.map((homeProb) =>
		awayProbs.map((awayProb) => homeProb * awayProb),
	);
}

/**
 * Total probability covered by the matrix
 */
export function matrixMass(matrix: ScoreMatrix): number {
	return matrix.reduce(
		(sum, row) => sum + row.reduce((acc, value) => acc + value, 0),
		0,
	);
}
