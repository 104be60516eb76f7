import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z, type ZodError } from "zod";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const intVar = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) => Number(value))
    .pipe(z.number().int().positive());

const osuEnvSchema = z.object({
  OSU_API_KEY: z.string().min(1),
  OSU_CACHE: intVar("200"),
  MAX_REPLY_LENGTH: intVar("10000"),
  TEMPLATES_PATH: z.string().min(1).default("templates.json"),
  HTTP_MAX_RETRY_ATTEMPTS: z
    .string()
    .default("3")
    .transform((value) => Number(value))
    .pipe(z.number().int().min(1).max(10)),
  HTTP_RETRY_BASE_DELAY_MS: intVar("1000"),
});

const envSchema = osuEnvSchema.extend({
  REDDIT_CLIENT_ID: z.string().min(1),
  REDDIT_CLIENT_SECRET: z.string().min(1),
  REDDIT_USERNAME: z.string().min(1),
  REDDIT_PASSWORD: z.string().min(1),
  REDDIT_SUBREDDIT: z
    .string()
    .min(1)
    .transform((value) => value.replace(/^\/?r\//i, "").trim()),
  REDDIT_USER_AGENT: z.string().min(1).default("maplink-bot/0.1.0"),
  MAX_COMMENTS: intVar("100"),
  MAX_SUBMISSIONS: intVar("50"),
  POLL_INTERVAL_MS: intVar("3000"),
  ERROR_BACKOFF_MS: intVar("15000"),
  STATUS_PORT: z
    .string()
    .optional()
    .transform((value) => (value ? Number(value) : undefined))
    .pipe(z.number().int().positive().max(65535).optional()),
});

const templateExtraSchema = z.object({
  field: z.string().min(1),
  values: z.record(z.string(), z.string()),
});

const templatesSchema = z.object({
  header: z.string(),
  footer: z.string(),
  map: z.string(),
  mapset: z.string(),
  sep: z.string().optional(),
  invalidMap: z.string().optional(),
  invalidMapset: z.string().optional(),
  extras: z.record(z.string(), templateExtraSchema).optional(),
});

export type PreviewConfig = z.infer<typeof osuEnvSchema>;
export type BotConfig = z.infer<typeof envSchema>;
export type ReplyTemplates = z.infer<typeof templatesSchema>;

const describeIssues = (error: ZodError): string =>
  error.issues.map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`).join("\n");

const parseEnv = <T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.output<T> => {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Missing or invalid configuration:\n${describeIssues(result.error)}`);
  }
  return result.data;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): BotConfig =>
  parseEnv(envSchema, env);

/** The subset `preview` needs: no Reddit credentials. */
export const loadPreviewConfig = (env: NodeJS.ProcessEnv = process.env): PreviewConfig =>
  parseEnv(osuEnvSchema, env);

export const loadTemplates = (path: string, cwd: string = process.cwd()): ReplyTemplates => {
  const fullPath = resolve(cwd, path);
  let raw: string;
  try {
    raw = readFileSync(fullPath, "utf8");
  } catch {
    throw new ConfigError(
      `No templates file found at ${fullPath}.\nCopy templates.example.json to templates.json and modify to your needs.`,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Templates file ${fullPath} is not valid JSON: ${String(error)}`);
  }

  const result = templatesSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(`Invalid templates in ${fullPath}:\n${describeIssues(result.error)}`);
  }
  return result.data;
};
