import type { Context } from "hono";
import type { ZodError } from "zod";
import { isPredictionError, type PredictionErrorCode } from "../errors";

export type ErrorStatusCode = 400 | 404 | 422 | 500 | 502;

const STATUS_BY_CODE: Record<PredictionErrorCode, ErrorStatusCode> = {
	UNKNOWN_LEAGUE: 404,
	TEAM_NOT_FOUND: 404,
	INSUFFICIENT_DATA: 422,
	SOURCE_UNAVAILABLE: 502,
};

export interface ErrorBody {
	status: "error";
	code: PredictionErrorCode | "INVALID_REQUEST" | "INTERNAL_ERROR";
	message: string;
}

/**
 * HTTP status and body for an error raised while serving a request
 */
export function toErrorResponse(error: unknown): {
	statusCode: ErrorStatusCode;
	body: ErrorBody;
} {
	if (isPredictionError(error)) {
		return {
			statusCode: STATUS_BY_CODE[error.code],
			body: { status: "error", code: error.code, message: error.message },
		};
	}

	return {
		statusCode: 500,
		body: {
			status: "error",
			code: "INTERNAL_ERROR",
			message: "Internal server error",
		},
	};
}

export function respondWithError(context: Context, error: unknown) {
	const { statusCode, body } = toErrorResponse(error);
	return context.json(body, statusCode);
}

/**
 * Body for query or path input that failed validation, one `path: message`
 * pair per issue
 */
export function toValidationErrorBody(error: ZodError): ErrorBody {
	return {
		status: "error",
		code: "INVALID_REQUEST",
		message: error.issues
			.map((issue) =>
				issue.path.length > 0
					? `${issue.path.join(".")}: ${issue.message}`
					: issue.message,
			)
			.join("; "),
	};
}

/**
 * zValidator hook answering invalid input with the error body above
 */
export function rejectInvalidRequest(
	result: { success: true } | { success: false; error: ZodError },
	context: Context,
) {
	if (result.success) return;
	return context.json(toValidationErrorBody(result.error), 400);
}
