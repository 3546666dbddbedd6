import "dotenv/config";
import { loadEnv } from "../src/config/env";
import { createCacheProvider, parseCachedLeagueTeams } from "../src/modules";

/**
 * Drop every cached league snapshot for the configured cache driver.
 *
 * Usage: npm run cache:purge
 */

const env = loadEnv();

if (env.CACHE_DRIVER === "memory") {
	console.log("ℹ️ Memory cache lives inside the server process; nothing to purge.");
} else {
	const cache = createCacheProvider({
		driver: env.CACHE_DRIVER,
		directory: env.CACHE_DIR,
		validate: parseCachedLeagueTeams,
	});

	const removed = await cache.clear();
	console.log(`✅ Removed ${removed} cached league snapshot(s) from ${env.CACHE_DIR}`);
}
