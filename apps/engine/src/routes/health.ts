/**
 * Health route.
 *
 * GET /health   liveness, event log size, engine custody address
 */

import type { FastifyInstance } from "fastify";
import type { System } from "../system.js";

export function healthRoutes(app: FastifyInstance, system: System): void {
  app.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      engine: system.engine.address,
      events: system.events.getEventCount(),
      timestamp: Date.now(),
    });
  });
}
