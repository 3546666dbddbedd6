import { UnknownLeagueError } from "../predictions/errors";
import { normalizeName } from "../predictions/utils/helpers";
import { type League, LEAGUES } from "./leagues";

/**
 * Lookup index built once from the static table.
 * Keys: id, name, slug and source slug, all lower-cased.
 */
const LEAGUE_INDEX: ReadonlyMap<string, League> = new Map(
	LEAGUES.flatMap((league) =>
		[String(league.id), league.name, league.slug, league.sourceSlug].map(
			(key) => [normalizeName(key), league] as const,
		),
	),
);

/**
 * All leagues, ordered by id
 */
export function listLeagues(): League[] {
	return [...LEAGUES].sort((a, b) => a.id - b.id);
}

/**
 * Resolve a league from its id, name or slug (case-insensitive)
 *
 * Falls back to a partial name match, so "premier" or "Spanish La Liga"
 * still resolve.
 *
 * @throws UnknownLeagueError listing the available leagues
 */
export function resolveLeague(identifier: string | number): League {
	const query = normalizeName(String(identifier));

	const exact = LEAGUE_INDEX.get(query);
	if (exact) return exact;

	if (query.length > 0) {
		const partial = listLeagues().find((league) => {
			const name = normalizeName(league.name);
			return name.includes(query) || query.includes(name);
		});
		if (partial) return partial;
	}

	throw new UnknownLeagueError(
		String(identifier),
		listLeagues().map((league) => `${league.slug} (${league.name})`),
	);
}
