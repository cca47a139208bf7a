import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const NOTEPM_HOST = "notepm.jp";

const positiveInt = z.coerce.number().int().positive();

const ConfigSchema = z.object({
  team: z.string().min(1, "NOTEPM_TEAM is required"),
  apiToken: z.string().min(1, "NOTEPM_API_TOKEN is required"),
  // Search results only; detail retrieval is never truncated
  maxBodyLength: positiveInt.default(200),
  requestTimeoutMs: positiveInt.default(30_000),
  searchDescription: z.string().optional(),
  pageDetailDescription: z.string().optional(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
});

export type Config = Readonly<z.infer<typeof ConfigSchema> & { apiBase: string }>;

type Env = Record<string, string | undefined>;

export function buildApiBase(team: string): string {
  return `https://${team}.${NOTEPM_HOST}/api/v1/pages`;
}

export function loadConfig(env: Env = process.env): Config {
  const result = ConfigSchema.safeParse({
    team: env.NOTEPM_TEAM ?? "",
    apiToken: env.NOTEPM_API_TOKEN ?? "",
    maxBodyLength: env.NOTEPM_MAX_BODY_LENGTH || undefined,
    requestTimeoutMs: env.NOTEPM_REQUEST_TIMEOUT_MS || undefined,
    searchDescription: env.NOTEPM_SEARCH_DESCRIPTION || undefined,
    pageDetailDescription: env.NOTEPM_PAGE_DETAIL_DESCRIPTION || undefined,
    logLevel: env.LOG_LEVEL || undefined,
  });

  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }

  return Object.freeze({ ...result.data, apiBase: buildApiBase(result.data.team) });
}
