/**
 * Engine server: HTTP surface over the emission system.
 *
 * Routes:
 *   POST /stake                  lock tokens into engine custody
 *   POST /unstake                release staked tokens
 *   POST /claim                  claim a reward (cooldown-gated, tiered)
 *   POST /burn-boost             burn for boost, issue a certificate
 *   GET  /account/:id            account view
 *   GET  /cooldown               current cooldown + active count
 *   GET  /halving                halving state + advisory rate
 *   POST /halving/check          apply a halving if due
 *   POST /shield/consume         consume an Epic shield
 *   GET  /certificates/:holder   certificates held
 *   GET  /certificate/:id        one certificate
 *   GET  /events                 event log query (from, type)
 *   POST /transfer               holder transfer
 *   POST /approve                set an allowance (the engine needs one to stake)
 *   GET  /balance/:id            token balance view
 *   GET  /health                 health check
 *
 * Error replies are `{ error, detail }`; see statusFor().
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyError, type FastifyServerOptions } from "fastify";
import { EmissionError } from "@emberstake/emission";
import { config } from "./config.js";
import { createSystem, type System } from "./system.js";
import { createHalvingScheduler } from "./scheduler.js";
import { stakingRoutes } from "./routes/staking.js";
import { halvingRoutes } from "./routes/halving.js";
import { certificateRoutes } from "./routes/certificates.js";
import { eventRoutes } from "./routes/events.js";
import { ledgerRoutes } from "./routes/ledger.js";
import { healthRoutes } from "./routes/health.js";

export interface EngineDeps {
  system?: System;
  logger?: FastifyServerOptions["logger"];
}

/** HTTP status for a domain error. */
export function statusFor(err: EmissionError): number {
  switch (err.kind) {
    case "validation":
      return 422;
    case "authorization":
      return 403;
    case "state":
      return err.code === "record_not_found" ? 404 : 409;
    case "already_configured":
      return 409;
  }
}

export async function buildApp(deps?: EngineDeps) {
  const app = Fastify({ logger: deps?.logger ?? { level: config.logLevel } });

  const system =
    deps?.system ??
    createSystem({
      owner: config.ownerAddress,
      addresses: {
        engine: config.engineAddress,
        ledger: config.ledgerAddress,
        certificates: config.certificatesAddress,
        halving: config.halvingAddress,
      },
      baseRatePerHour: config.baseRatePerHour,
      logger: app.log,
    });

  app.setErrorHandler<FastifyError>((err, req, reply) => {
    if (EmissionError.isEmissionError(err)) {
      req.log.debug({ code: err.code, details: err.details }, err.message);
      return reply.status(statusFor(err)).send({ error: err.code, detail: err.message });
    }
    if (err.validation) {
      return reply.status(400).send({ error: "invalid_request", detail: err.message });
    }
    req.log.error({ err }, "unhandled error");
    return reply.status(500).send({ error: "internal_error" });
  });

  stakingRoutes(app, system);
  halvingRoutes(app, system);
  certificateRoutes(app, system);
  eventRoutes(app, system);
  ledgerRoutes(app, system);

  healthRoutes(app, system);

  return { app, system };
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  const { app, system } = await buildApp();

  app.log.info(
    {
      port: config.port,
      owner: config.ownerAddress,
      engine: system.engine.address,
      baseRatePerHour: config.baseRatePerHour.toString(),
      halvingScheduler: config.halvingCheckIntervalMs > 0 ? config.halvingCheckIntervalMs : "disabled",
    },
    "engine config",
  );

  // Scheduler hook before listen (Fastify 5 forbids addHook after listen)
  if (config.halvingCheckIntervalMs > 0) {
    const scheduler = createHalvingScheduler(system, {
      checkIntervalMs: config.halvingCheckIntervalMs,
      onHalving: (status) => {
        app.log.info(
          { halvingCount: status.halvingCount, threshold: status.currentThreshold.toString() },
          "halving applied by scheduler",
        );
      },
      onError: (err) => {
        app.log.error({ err }, "scheduler error");
      },
    });

    app.addHook("onClose", async () => {
      scheduler.stop();
    });

    scheduler.start();
  }

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
