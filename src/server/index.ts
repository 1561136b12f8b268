import { serverLogger } from "../logger.js";
import { buildServer } from "./app.js";

import type { ApiDependencies } from "./routes/index.js";
import type { FastifyInstance } from "fastify";

export { buildServer } from "./app.js";

/**
 * Build and start the operations server
 */
export async function startServer(
  deps: ApiDependencies,
  address: { host: string; port: number }
): Promise<FastifyInstance> {
  const app = await buildServer(deps);

  try {
    await app.listen({ port: address.port, host: address.host });
  } catch (error) {
    serverLogger.error({ error }, "Failed to start server");
    await app.close();
    throw error;
  }

  serverLogger.info(address, "Server started");
  return app;
}
