import fastify, { type FastifyInstance } from "fastify";

import type { SupervisorState } from "../lifecycle/lifecycleTypes.js";
import { getLogger } from "../log.js";

export const DEFAULT_HEALTH_BIND_ATTEMPTS = 5;
export const DEFAULT_HEALTH_BIND_DELAY_MS = 2000;

export type HealthServerOptions = {
  port: number;
  host?: string;
  attempts?: number;
  delayMs?: number;
  getState: () => SupervisorState;
  /** Aborting stops the bind retries; a probe bound after the abort is closed again. */
  signal?: AbortSignal;
};

export type HealthServer = {
  port: number;
  close: () => Promise<void>;
};

const logger = getLogger("health");

/**
 * Builds the probe app: GET /health answers 200 "OK" while running and 503 with the
 * current state otherwise; every other path is a plain 404.
 */
export function healthAppBuild(getState: () => SupervisorState): FastifyInstance {
  const app = fastify({ logger: false });

  app.get("/health", async (_request, reply) => {
    const state = getState();
    reply.type("text/plain; charset=utf-8");
    if (state === "running") {
      return reply.code(200).send("OK");
    }
    return reply.code(503).send(state);
  });

  app.setNotFoundHandler(async (_request, reply) => {
    return reply.code(404).type("text/plain; charset=utf-8").send("Not Found");
  });

  return app;
}

/**
 * Binds the probe, retrying while the port is taken.
 * Resolves null when every attempt fails so the caller can run without a probe.
 */
export async function healthServerStart(options: HealthServerOptions): Promise<HealthServer | null> {
  const attempts = options.attempts ?? DEFAULT_HEALTH_BIND_ATTEMPTS;
  const delayMs = options.delayMs ?? DEFAULT_HEALTH_BIND_DELAY_MS;
  const host = options.host ?? "0.0.0.0";

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    if (options.signal?.aborted) {
      logger.debug("skip: Health endpoint start cancelled");
      return null;
    }
    const app = healthAppBuild(options.getState);
    try {
      await app.listen({ port: options.port, host });
      if (options.signal?.aborted) {
        await app.close();
        logger.debug("skip: Health endpoint start cancelled after bind");
        return null;
      }
      const address = app.server.address();
      const port = address && typeof address === "object" ? address.port : options.port;
      logger.info(`start: Health endpoint listening host=${host} port=${port}`);
      return {
        port,
        close: async () => {
          await app.close();
          logger.debug(`stop: Health endpoint closed port=${port}`);
        }
      };
    } catch (error) {
      await app.close();
      if (!addressInUseIs(error)) {
        logger.error({ error }, "error: Health endpoint failed to start; continuing without it");
        return null;
      }
      logger.warn(`event: Health port in use port=${options.port} attempt=${attempt}/${attempts}`);
      if (attempt < attempts) {
        await delay(delayMs, options.signal);
      }
    }
  }

  if (options.signal?.aborted) {
    return null;
  }
  logger.error(`error: Health endpoint unavailable after ${attempts} attempts; continuing without it`);
  return null;
}

function addressInUseIs(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "EADDRINUSE";
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}
