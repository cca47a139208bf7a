import { SpanStatusCode } from "@opentelemetry/api";
import {
  InvalidResponseError,
  UpstreamRequestError,
  UpstreamTimeoutError,
} from "../errors.js";
import { noopLogger, type Logger } from "../logger.js";
import { getTracer } from "../tracing.js";
import { truncateBodies } from "./truncate.js";
import type { DetailParams, JsonValue, SearchParams } from "./types.js";

export interface NotePMClientConfig {
  apiBase: string;
  apiToken: string;
  maxBodyLength: number;
  requestTimeoutMs: number;
  logger?: Logger;
}

// Fixed so the outgoing query string is deterministic
const SEARCH_QUERY_KEYS = [
  "q",
  "only_title",
  "include_archived",
  "note_code",
  "tag_name",
  "created",
  "page",
  "per_page",
] as const satisfies ReadonlyArray<keyof SearchParams>;

export function buildSearchQuery(params: SearchParams): URLSearchParams {
  const query = new URLSearchParams();
  for (const key of SEARCH_QUERY_KEYS) {
    const value = params[key];
    if (value === undefined || value === null) continue;
    query.set(key, String(value));
  }
  return query;
}

export class NotePMClient {
  private readonly apiBase: string;
  private readonly authHeader: string;
  private readonly maxBodyLength: number;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;

  constructor(config: NotePMClientConfig) {
    // Remove trailing slash
    this.apiBase = config.apiBase.replace(/\/$/, "");
    this.authHeader = `Bearer ${config.apiToken}`;
    this.maxBodyLength = config.maxBodyLength;
    this.requestTimeoutMs = config.requestTimeoutMs;
    this.logger = config.logger ?? noopLogger;
  }

  /**
   * Search pages. Page bodies longer than the configured limit are shortened;
   * use {@link getPageDetail} for the full text.
   */
  async search(params: SearchParams): Promise<JsonValue> {
    const url = `${this.apiBase}?${buildSearchQuery(params).toString()}`;
    const { data } = await this.fetch("notepm.search", url);
    return truncateBodies(data, this.maxBodyLength);
  }

  /**
   * Get a single page by its page code. Returns the upstream JSON text as-is,
   * so the body and every number come back exactly as NotePM sent them.
   */
  async getPageDetail(params: DetailParams): Promise<string> {
    const url = `${this.apiBase}/${encodeURIComponent(params.page_code)}`;
    const { text } = await this.fetch("notepm.page_detail", url);
    return text;
  }

  private async fetch(spanName: string, url: string): Promise<{ text: string; data: JsonValue }> {
    return getTracer().startActiveSpan(spanName, async (span) => {
      span.setAttribute("http.url", url);
      try {
        const text = await this.request(url);
        return { text, data: parseJson(text) };
      } catch (error) {
        span.recordException(error instanceof Error ? error : String(error));
        span.setStatus({ code: SpanStatusCode.ERROR });
        throw error;
      } finally {
        span.end();
      }
    });
  }

  private async request(url: string): Promise<string> {
    this.logger.debug("notepm request", { url });

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Authorization: this.authHeader,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new UpstreamTimeoutError(url, this.requestTimeoutMs, error);
      }
      throw error;
    }

    // Body is always drained, success or not
    const text = await response.text();
    this.logger.debug("notepm response", { url, status: response.status, bytes: text.length });

    if (!response.ok) {
      throw new UpstreamRequestError(response.status, text);
    }
    return text;
  }
}

function isTimeoutError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "name" in error && error.name === "TimeoutError";
}

function parseJson(text: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new InvalidResponseError(detail, error);
  }
}
