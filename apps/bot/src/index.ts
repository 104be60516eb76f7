#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { consoleLogger, parseResourceUrl } from "@maplink/core";
import type { ResourceReference } from "@maplink/types";
import { ConfigError, loadConfig, loadPreviewConfig, loadTemplates } from "./config.js";
import { createBot, createComposer, createMetadataLookup } from "./services.js";
import { createStatusApp, startStatusServer } from "./status-server.js";

const program = new Command();
program.name("maplink").description("Replies to osu! beatmap links posted on a subreddit");

program
  .command("run")
  .description("Watch the subreddit's comments and submissions and reply to beatmap links")
  .option("--once", "Poll both streams once and exit", false)
  .option("--dry-run", "Compose replies and log them instead of posting", false)
  .action(async (options: { once: boolean; dryRun: boolean }) => {
    const config = loadConfig();
    const templates = loadTemplates(config.TEMPLATES_PATH);
    const { bot, loop } = createBot(config, templates, {
      logger: consoleLogger,
      dryRun: options.dryRun,
    });

    if (options.once) {
      const outcomes = await loop.runOnce();
      console.log(JSON.stringify(outcomes, null, 2));
      return;
    }

    const controller = new AbortController();
    const stop = () => {
      consoleLogger.info("shutdown_requested");
      controller.abort();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    const server = config.STATUS_PORT
      ? startStatusServer(createStatusApp(bot), config.STATUS_PORT, consoleLogger)
      : null;

    try {
      await loop.run(controller.signal);
    } finally {
      server?.close();
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
    }
  });

program
  .command("preview")
  .description("Print the reply the bot would post for the given beatmap links")
  .argument("<links...>", "osu! beatmap or beatmap set URLs")
  .action(async (links: string[]) => {
    const config = loadPreviewConfig();
    const templates = loadTemplates(config.TEMPLATES_PATH);

    const references: ResourceReference[] = [];
    for (const link of links) {
      const ref = parseResourceUrl(link);
      if (ref) {
        references.push(ref);
      } else {
        consoleLogger.warn("unrecognised_link", { link });
      }
    }

    if (references.length === 0) {
      console.log("No beatmap links recognised.");
      process.exitCode = 1;
      return;
    }

    const metadata = createMetadataLookup(config, consoleLogger);
    const composer = createComposer(config, templates, metadata, consoleLogger);
    const reply = await composer.compose(references);
    console.log(reply.text);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.log(error.message);
  } else {
    console.error("cli_error", error);
  }
  process.exitCode = 1;
});
