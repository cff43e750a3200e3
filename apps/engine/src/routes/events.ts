/**
 * Event log routes.
 *
 *   GET /events?from=<seq>&type=<event type>
 */

import type { FastifyInstance } from "fastify";
import { isEventType } from "../event-log/schemas.js";
import type { System } from "../system.js";
import { EventsQuery } from "./schemas.js";

export function eventRoutes(app: FastifyInstance, system: System): void {
  const { events } = system;

  app.get<{ Querystring: EventsQuery }>(
    "/events",
    { schema: { querystring: EventsQuery } },
    async (req, reply) => {
      const { from, type } = req.query;
      if (type !== undefined && !isEventType(type)) {
        return reply.status(422).send({ error: "invalid_event_type", detail: type });
      }
      const list = events.getEvents(from ?? 0).filter((e) => type === undefined || e.type === type);
      return reply.send({ events: list, count: list.length });
    },
  );
}
