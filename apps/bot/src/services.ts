import {
  CachedMetadataLookup,
  OsuApiClient,
  RedditClient,
} from "@maplink/clients";
import {
  BeatmapFormatter,
  CommentComposer,
  ReplyBot,
  RunLoop,
  type Sleeper,
} from "@maplink/core";
import type { Logger, MetadataLookup, StreamSource } from "@maplink/types";
import type { BotConfig, PreviewConfig, ReplyTemplates } from "./config.js";

export interface BotServices {
  readonly bot: ReplyBot;
  readonly loop: RunLoop;
}

export interface ServiceOverrides {
  readonly logger: Logger;
  readonly dryRun?: boolean;
  readonly source?: StreamSource;
  readonly metadata?: MetadataLookup;
  readonly sleep?: Sleeper;
}

export function createMetadataLookup(config: PreviewConfig, logger: Logger): MetadataLookup {
  const client = new OsuApiClient({
    apiKey: config.OSU_API_KEY,
    maxRetryAttempts: config.HTTP_MAX_RETRY_ATTEMPTS,
    retryBaseDelayMs: config.HTTP_RETRY_BASE_DELAY_MS,
    logger,
  });
  return new CachedMetadataLookup(client, config.OSU_CACHE);
}

export function createComposer(
  config: PreviewConfig,
  templates: ReplyTemplates,
  metadata: MetadataLookup,
  logger: Logger,
): CommentComposer {
  const formatter = new BeatmapFormatter(metadata, templates);
  return new CommentComposer(formatter, {
    header: templates.header,
    footer: templates.footer,
    sep: templates.sep,
    maxLength: config.MAX_REPLY_LENGTH,
    logger,
  });
}

export function createBot(
  config: BotConfig,
  templates: ReplyTemplates,
  overrides: ServiceOverrides,
): BotServices {
  const { logger } = overrides;
  const source =
    overrides.source ??
    new RedditClient({
      clientId: config.REDDIT_CLIENT_ID,
      clientSecret: config.REDDIT_CLIENT_SECRET,
      username: config.REDDIT_USERNAME,
      password: config.REDDIT_PASSWORD,
      userAgent: config.REDDIT_USER_AGENT,
      subreddit: config.REDDIT_SUBREDDIT,
      maxRetryAttempts: config.HTTP_MAX_RETRY_ATTEMPTS,
      retryBaseDelayMs: config.HTTP_RETRY_BASE_DELAY_MS,
      logger,
    });
  const metadata = overrides.metadata ?? createMetadataLookup(config, logger);

  const bot = new ReplyBot({
    source,
    composer: createComposer(config, templates, metadata, logger),
    botName: config.REDDIT_USERNAME,
    limits: { comment: config.MAX_COMMENTS, submission: config.MAX_SUBMISSIONS },
    dryRun: overrides.dryRun,
    logger,
  });

  const loop = new RunLoop(bot, {
    pollIntervalMs: config.POLL_INTERVAL_MS,
    errorBackoffMs: config.ERROR_BACKOFF_MS,
    logger,
    sleep: overrides.sleep,
  });

  return { bot, loop };
}
