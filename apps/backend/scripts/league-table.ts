import "dotenv/config";
import { createPredictionsServiceFromEnv } from "../src/app";
import { loadEnv } from "../src/config/env";
import { presentLeagueTable } from "../src/modules";
import { formatLeagueTable } from "./lib/table-format";

/**
 * Print a league's xG table.
 *
 * Usage: npm run league:table -- [league] [--json]
 */

const args = process.argv.slice(2);
const league = args.find((arg) => !arg.startsWith("--")) ?? "EPL";
const asJson = args.includes("--json");

const env = loadEnv();
const service = createPredictionsServiceFromEnv(env);
const table = presentLeagueTable(await service.getLeagueTable(league));

if (asJson) {
	console.log(JSON.stringify(table, null, 2));
} else {
	console.log(formatLeagueTable(table));
}
