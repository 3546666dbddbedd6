import { Hono } from "hono";
import { logEvent } from "../../utils/metrics";

function requireAdminToken(
  headerValue: string | undefined,
  expected: string | undefined,
): boolean {
  if (!expected) return false;
  if (!headerValue) return false;
  return headerValue === expected;
}

/**
 * Admin cache routes (protected)
 *
 * POST /admin/cache/purge
 * - Drops every cached league snapshot so the next request refetches
 * - Disabled when no admin token is configured
 */
export function createCacheAdminRoutes({
  adminToken,
  clearCache,
}: {
  adminToken: string | undefined;
  clearCache: () => Promise<number>;
}) {
  const admin = new Hono();

  admin.post("/purge", async (c) => {
    const token = c.req.header("x-admin-token");
    if (!requireAdminToken(token, adminToken)) {
      return c.json(
        {
          status: "error",
          message: "Unauthorized",
        },
        401,
      );
    }

    const removed = await clearCache();
    logEvent("cache_purged", { removed });

    return c.json({
      status: "success",
      removed,
    });
  });

  return admin;
}
