import { z } from "zod";
import { SourceUnavailableError } from "../../modules/predictions/errors";
import { logSourceCall } from "../../utils/metrics";

export const DEFAULT_UNDERSTAT_BASE_URL = "https://understat.com/getLeagueData/";

const USER_AGENT =
	"Mozilla/5.0 (Windows NT 10.0; Win64; x64) " +
	"AppleWebKit/537.36 (KHTML, like Gecko) " +
	"Chrome/120.0.0.0 Safari/537.36";

/**
 * Numbers arrive as numbers from the JSON endpoint and as strings from
 * older payloads
 */
const numeric = z
	.union([z.number(), z.string().trim().min(1)])
	.pipe(z.coerce.number().finite().nonnegative());

const matchSchema = z.object({
	xG: numeric,
	xGA: numeric,
	scored: numeric.default(0),
	missed: numeric.default(0),
});

const teamSchema = z.object({
	title: z.string().default(""),
	history: z.array(matchSchema).default([]),
});

const leagueResponseSchema = z.object({
	teams: z.union([z.array(teamSchema), z.record(teamSchema)]),
});

export type UnderstatTeamRecord = z.infer<typeof teamSchema>;

/**
 * Validate a raw league payload and return its teams
 *
 * @throws SourceUnavailableError when the payload does not have the expected shape
 */
export const parseUnderstatLeagueData = (
	body: unknown,
): UnderstatTeamRecord[] => {
	const parsed = leagueResponseSchema.safeParse(body);
	if (!parsed.success) {
		throw new SourceUnavailableError("Could not parse Understat response.", {
			cause: parsed.error,
		});
	}

	const { teams } = parsed.data;
	return Array.isArray(teams) ? teams : Object.values(teams);
};

/**
 * Fetch the team data for a league season from Understat
 */
export const getUnderstatLeagueData = async (
	leagueSlug: string,
	season: number,
	options: {
		baseUrl?: string;
		timeoutMs?: number;
		fetchFn?: typeof fetch;
	} = {},
): Promise<UnderstatTeamRecord[]> => {
	const baseUrl = options.baseUrl ?? DEFAULT_UNDERSTAT_BASE_URL;
	const fetchFn = options.fetchFn ?? fetch;
	const url = new URL(
		`${encodeURIComponent(leagueSlug)}/${season}`,
		baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`,
	);

	const startTime = performance.now();
	const elapsed = () => Number((performance.now() - startTime).toFixed(2));

	let response: Response;
	try {
		response = await fetchFn(url.toString(), {
			method: "GET",
			headers: {
				"User-Agent": USER_AGENT,
				"X-Requested-With": "XMLHttpRequest",
				Accept: "application/json",
				"Accept-Encoding": "gzip, deflate",
			},
			signal: AbortSignal.timeout(options.timeoutMs ?? 15_000),
		});
	} catch (error) {
		const reason =
			error instanceof Error && error.name === "TimeoutError"
				? "Understat request timed out"
				: "Understat request failed";
		logSourceCall(url.pathname, false, elapsed(), reason);
		throw new SourceUnavailableError(`${reason}.`, { cause: error });
	}

	if (!response.ok) {
		logSourceCall(url.pathname, false, elapsed(), `HTTP ${response.status}`);
		throw new SourceUnavailableError(
			`Understat returned HTTP ${response.status}`,
		);
	}

	let body: unknown;
	try {
		body = await response.json();
	} catch (error) {
		logSourceCall(url.pathname, false, elapsed(), "invalid JSON");
		throw new SourceUnavailableError("Could not parse Understat response.", {
			cause: error,
		});
	}

	const teams = parseUnderstatLeagueData(body);
	logSourceCall(url.pathname, true, elapsed());
	return teams;
};
