import { describe, expect, it, vi } from "vitest";
import { SourceUnavailableError } from "../../modules/predictions/errors";
import {
	getUnderstatLeagueData,
	parseUnderstatLeagueData,
} from "./understat-api";

const LEAGUE_BODY = {
	teams: {
		"83": {
			id: "83",
			title: "Alpha United",
			history: [
				{ xG: 1.2, xGA: 0.4, scored: 2, missed: 0 },
				{ xG: "0.85", xGA: "1.1", scored: "1", missed: "1" },
			],
		},
		"87": {
			id: "87",
			title: "Bravo City",
			history: [],
		},
	},
	players: [],
};

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

describe("parseUnderstatLeagueData", () => {
	it("reads teams keyed by id and coerces numeric strings", () => {
		const teams = parseUnderstatLeagueData(LEAGUE_BODY);

		expect(teams).toEqual([
			{
				title: "Alpha United",
				history: [
					{ xG: 1.2, xGA: 0.4, scored: 2, missed: 0 },
					{ xG: 0.85, xGA: 1.1, scored: 1, missed: 1 },
				],
			},
			{ title: "Bravo City", history: [] },
		]);
	});

	it("accepts teams as an array and fills missing goal counts", () => {
		const teams = parseUnderstatLeagueData({
			teams: [{ title: "Charlie Rovers", history: [{ xG: 1, xGA: 2 }] }],
		});

		expect(teams[0].history[0]).toEqual({ xG: 1, xGA: 2, scored: 0, missed: 0 });
	});

	it("keeps only the fields the model reads", () => {
		const teams = parseUnderstatLeagueData({
			teams: {
				"90": {
					id: "90",
					title: "Echo Town",
					history: [
						{ h_a: "h", xG: "1.5", xGA: 0.5, scored: 1, missed: 0, pts: 3, date: "2025-08-16 14:00:00" },
					],
				},
			},
			players: [],
			dates: [],
		});

		expect(teams).toEqual([
			{ title: "Echo Town", history: [{ xG: 1.5, xGA: 0.5, scored: 1, missed: 0 }] },
		]);
	});

	it("rejects a payload without teams", () => {
		expect(() => parseUnderstatLeagueData({ players: [] })).toThrow(
			SourceUnavailableError,
		);
	});

	it("rejects non-numeric xG values", () => {
		expect(() =>
			parseUnderstatLeagueData({
				teams: [{ title: "Delta", history: [{ xG: "n/a", xGA: 1 }] }],
			}),
		).toThrow("Could not parse Understat response.");
	});
});

describe("getUnderstatLeagueData", () => {
	it("requests the league season from the base URL", async () => {
		const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(LEAGUE_BODY));

		const teams = await getUnderstatLeagueData("La_liga", 2025, {
			baseUrl: "https://stats.test/getLeagueData",
			fetchFn,
		});

		expect(teams).toHaveLength(2);
		expect(fetchFn).toHaveBeenCalledTimes(1);
		const [url, init] = fetchFn.mock.calls[0];
		expect(url).toBe("https://stats.test/getLeagueData/La_liga/2025");
		expect(init?.method).toBe("GET");
		expect(new Headers(init?.headers).get("X-Requested-With")).toBe(
			"XMLHttpRequest",
		);
	});

	it("fails on a non-2xx status", async () => {
		const fetchFn = vi
			.fn<typeof fetch>()
			.mockResolvedValue(new Response("busy", { status: 503 }));

		await expect(
			getUnderstatLeagueData("EPL", 2025, { fetchFn }),
		).rejects.toThrow("Understat returned HTTP 503");
	});

	it("fails on a body that is not JSON", async () => {
		const fetchFn = vi
			.fn<typeof fetch>()
			.mockResolvedValue(new Response("<html></html>", { status: 200 }));

		await expect(
			getUnderstatLeagueData("EPL", 2025, { fetchFn }),
		).rejects.toThrow("Could not parse Understat response.");
	});

	it("reports timeouts", async () => {
		const timeout = Object.assign(new Error("The operation was aborted due to timeout"), {
			name: "TimeoutError",
		});
		const fetchFn = vi.fn<typeof fetch>().mockRejectedValue(timeout);

		const error = await getUnderstatLeagueData("EPL", 2025, { fetchFn }).catch(
			(caught: unknown) => caught,
		);

		expect(error).toBeInstanceOf(SourceUnavailableError);
		expect(error).toMatchObject({ message: "Understat request timed out." });
	});

	it("reports network failures", async () => {
		const fetchFn = vi
			.fn<typeof fetch>()
			.mockRejectedValue(new TypeError("fetch failed"));

		await expect(
			getUnderstatLeagueData("EPL", 2025, { fetchFn }),
		).rejects.toThrow("Understat request failed.");
	});
});
