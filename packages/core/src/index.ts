export {
  BeatmapFormatter,
  secondsToString,
  type BeatmapTemplates,
  type BlockFormatter,
  type TemplateExtra,
} from "./beatmap-formatter.js";
export {
  CommentComposer,
  DEFAULT_MAX_REPLY_LENGTH,
  LINE_BREAK,
  type ComposedReply,
  type ComposerOptions,
} from "./composer.js";
export {
  BEATMAP_HOST,
  extractReferences,
  parseResourceUrl,
  referencesFromItem,
  uniqueReferences,
} from "./extract.js";
export { consoleLogger, describeError, silentLogger } from "./logger.js";
export { escapeMarkdown } from "./markdown.js";
export { RecencySet } from "./recency-set.js";
export {
  ReplyBot,
  SEEN_COMMENT_MARGIN,
  SEEN_SUBMISSION_MARGIN,
  type ReplyBotOptions,
  type ReplyComposer,
} from "./reply-bot.js";
export { isSameAccount, ReplyChecker } from "./reply-checker.js";
export {
  DEFAULT_ERROR_BACKOFF_MS,
  DEFAULT_POLL_INTERVAL_MS,
  RunLoop,
  sleepUnlessAborted,
  type Pollable,
  type RunLoopOptions,
  type Sleeper,
} from "./run-loop.js";
export { renderTemplate, TemplateError, type TemplateValue, type TemplateValues } from "./template.js";
