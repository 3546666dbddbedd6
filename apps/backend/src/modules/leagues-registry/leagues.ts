/**
 * League Registry Table
 *
 * Leagues with Understat coverage. `id` keeps the numbering callers already
 * use; `sourceSlug` is the Understat URL segment.
 */

export type League = Readonly<{
	id: number;
	name: string;
	/** User-facing slug */
	slug: string;
	/** Understat slug used in data URLs */
	sourceSlug: string;
}>;

export const LEAGUES: readonly League[] = Object.freeze(
	[
		{ id: 9, name: "Premier League", slug: "EPL", sourceSlug: "EPL" },
		{ id: 11, name: "Serie A", slug: "SerieA", sourceSlug: "Serie_A" },
		{ id: 12, name: "La Liga", slug: "LaLiga", sourceSlug: "La_liga" },
		{ id: 13, name: "Ligue 1", slug: "Ligue1", sourceSlug: "Ligue_1" },
		{ id: 20, name: "Bundesliga", slug: "Bundesliga", sourceSlug: "Bundesliga" },
	].map((league) => Object.freeze(league)),
);
