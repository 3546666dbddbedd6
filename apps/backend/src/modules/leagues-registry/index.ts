export { type League, LEAGUES } from "./leagues";
export { createLeaguesRegistryRoutes } from "./leagues-registry.routes";
export { listLeagues, resolveLeague } from "./leagues-registry.service";
