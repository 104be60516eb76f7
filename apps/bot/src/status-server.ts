import type { Server } from "node:net";
import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { describeError } from "@maplink/core";
import type { BotStats, Logger } from "@maplink/types";

export interface StatsProvider {
  stats(): BotStats;
}

export const createStatusApp = (bot: StatsProvider): Hono => {
  const app = new Hono();

  app.get("/health", (c) => {
    return c.json({ status: "ok", now: new Date().toISOString(), stats: bot.stats() });
  });

  return app;
};

/** A failed listen (e.g. the port is taken) is logged; the bot keeps running. */
export const startStatusServer = (app: Hono, port: number, logger: Logger): ReturnType<typeof serve> => {
  const server = serve({ fetch: app.fetch, port }, (info) => {
    logger.info(`status_listening http://localhost:${info.port}`);
  });
  const listener: Server = server;
  listener.on("error", (error: Error) => {
    logger.error("status_server_error", { port, error: describeError(error) });
  });
  return server;
};
