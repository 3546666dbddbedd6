/**
 * Type Definitions for Match Predictions
 *
 * Value types that flow through the prediction pipeline:
 * TeamSeasonStats -> LeagueBaseline -> StrengthRating -> FixtureExpectation
 * -> ScoreMatrix -> PredictionResult
 */

// ============================================================================
// GOAL LINES
// ============================================================================

export const DEFAULT_GOAL_LINES = [0.5, 1.5, 2.5, 3.5, 4.5, 5.5] as const;

// ============================================================================
// INPUT DATA
// ============================================================================

/**
 * Season aggregates for one team, as supplied by the statistics provider
 */
export interface TeamSeasonStats {
  /** Canonical team name in the source data */
  team: string;
  matchesPlayed: number;
  goalsScored: number;
  goalsConceded: number;
  /** Total expected goals for */
  xg: number;
  /** Total expected goals against */
  xga: number;
}

// ============================================================================
// DERIVED VALUES
// ============================================================================

/**
 * League-wide per-match averages used to normalise team ratings
 */
export interface LeagueBaseline {
  avgGoalsPerMatch: number;
  avgXgPerMatch: number;
}

/**
 * Attack/defense relative to the league (1.0 = league average).
 * Defense below 1.0 means the team concedes fewer xG than average.
 */
export interface StrengthRating {
  attack: number;
  defense: number;
}

export interface FixtureExpectation {
  lambdaHome: number;
  lambdaAway: number;
}

/**
 * Rows are home goals 0..K, columns away goals 0..K
 */
export type ScoreMatrix = number[][];

export interface ScorelineProbability {
  home: number;
  away: number;
  probability: number;
}

/**
 * Reduced outcome metrics. All probabilities are fractions of 1 and are
 * taken directly from the (truncated) score matrix without renormalising.
 */
export interface MatchOutcome {
  probHomeWin: number;
  probDraw: number;
  probAwayWin: number;
  probOver25: number;
  probUnder25: number;
  probBTTSYes: number;
  probBTTSNo: number;
  /** Over probability keyed by goal line ("0.5" .. "5.5") */
  probOverByLine: Record<string, number>;
  expectedGoals: {
    home: number;
    away: number;
  };
  topScores: ScorelineProbability[];
  /** Total probability mass inside the matrix (below 1 when goals exceed K) */
  coveredMass: number;
}

export interface PredictionResult extends MatchOutcome {
  homeTeam: string;
  awayTeam: string;
  scoreMatrix: ScoreMatrix;
}

export interface LeagueTableRow {
  stats: TeamSeasonStats;
  strength: StrengthRating;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface ModelConfig {
  /** Multiplier applied to the home side's expected goals */
  homeAdvantage: number;
  /** Max goals per team in the score matrix (grid is (K+1) x (K+1)) */
  maxGoals: number;
  /** Number of most likely scorelines to report */
  topScoresCount: number;
  /** Lower bound for both expected-goal values */
  minLambda: number;
}
