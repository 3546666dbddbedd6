/**
 * Prediction errors
 *
 * Every failure that stops a request from producing a prediction. The `code`
 * is what HTTP and MCP callers see.
 */

export type PredictionErrorCode =
	| "UNKNOWN_LEAGUE"
	| "TEAM_NOT_FOUND"
	| "INSUFFICIENT_DATA"
	| "SOURCE_UNAVAILABLE";

export abstract class PredictionError extends Error {
	abstract readonly code: PredictionErrorCode;
}

export class UnknownLeagueError extends PredictionError {
	readonly code = "UNKNOWN_LEAGUE";
	readonly identifier: string;

	constructor(identifier: string, available: string[]) {
		super(
			`Unknown league '${identifier}'. Available: ${available.join(", ")}`,
		);
		this.name = "UnknownLeagueError";
		this.identifier = identifier;
	}
}

export class TeamNotFoundError extends PredictionError {
	readonly code = "TEAM_NOT_FOUND";
	readonly teamName: string;
	readonly league: string;

	constructor(teamName: string, league: string) {
		super(`Team '${teamName}' not found in ${league} data.`);
		this.name = "TeamNotFoundError";
		this.teamName = teamName;
		this.league = league;
	}
}

export class InsufficientDataError extends PredictionError {
	readonly code = "INSUFFICIENT_DATA";
	readonly teamName: string;

	constructor(teamName: string) {
		super(`Team '${teamName}' has no matches played this season.`);
		this.name = "InsufficientDataError";
		this.teamName = teamName;
	}
}

export class SourceUnavailableError extends PredictionError {
	readonly code = "SOURCE_UNAVAILABLE";

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "SourceUnavailableError";
	}
}

export function isPredictionError(error: unknown): error is PredictionError {
	return error instanceof PredictionError;
}
