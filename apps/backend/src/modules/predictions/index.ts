// Config
export { createModelConfig, DEFAULT_MODEL_CONFIG } from "./config/model-config";

// Errors
export {
	InsufficientDataError,
	isPredictionError,
	PredictionError,
	type PredictionErrorCode,
	SourceUnavailableError,
	TeamNotFoundError,
	UnknownLeagueError,
} from "./errors";

// Presentation
export {
	presentLeagues,
	presentLeagueTable,
	presentMatchPrediction,
} from "./presentation/prediction-presenter";

// Routes
export { createPredictionsRoutes } from "./routes/predictions.routes";

// Service
export {
	createPredictionsService,
	type LeagueTableResult,
	type MatchPredictionResult,
	type PredictionsService,
} from "./services/predictions.service";

// Types
export type * from "./types";
