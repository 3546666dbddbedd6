import { Hono } from "hono";
import { presentLeagues } from "../predictions/presentation/prediction-presenter";
import { listLeagues } from "./leagues-registry.service";

export const createLeaguesRegistryRoutes = () => {
	const registry = new Hono();

	/**
	 * GET /leagues - supported leagues, ordered by id
	 */
	registry.get("/", (context) => {
		context.header("Cache-Control", "public, max-age=86400");
		return context.json({
			status: "success",
			data: presentLeagues(listLeagues()),
		});
	});

	return registry;
};
