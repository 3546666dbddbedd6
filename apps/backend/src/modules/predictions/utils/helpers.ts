/**
 * General helper functions for predictions
 */

/**
 * Round to specified decimal places
 *
 * @param decimals - Number of decimal places (default: 2)
 */
export function roundTo(value: number, decimals: number = 2): number {
	const factor = 10 ** decimals;
	return Math.round(value * factor) / factor;
}

/**
 * Mean of a list, or null when the list is empty
 */
export function mean(values: readonly number[]): number | null {
	if (values.length === 0) return null;
	return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Normalise a name for case-insensitive lookups
 */
export function normalizeName(value: string): string {
	return value.trim().toLowerCase();
}
