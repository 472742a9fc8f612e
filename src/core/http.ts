import { Agent, Dispatcher } from "undici";
import { HttpStatusError } from "./errors";

export type FetchFn = typeof fetch;

type FetchInit = RequestInit & { dispatcher?: Dispatcher };

const RETRIABLE_STATUSES = new Set([429, 500, 502, 503, 504]);
const MAX_BACKOFF_MS = 10_000;

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetriableStatus(status: number): boolean {
  return RETRIABLE_STATUSES.has(status);
}

export interface HttpClientOptions {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  maxAttempts: number;
  retryBaseDelayMs: number;
  fetchFn?: FetchFn;
  sleepFn?: (ms: number) => Promise<void>;
}

export interface RequestOptions {
  timeoutMs: number;
  accept?: string;
}

/**
 * GET-only client. Each attempt runs under its own wall-clock timeout that
 * also covers `consume`, so a stalled body counts as a timeout.
 * Transient statuses and transport errors are retried with exponential
 * backoff; every other status is handed to `consume` as-is.
 */
export class HttpClient {
  private readonly options: HttpClientOptions;
  private readonly fetchFn: FetchFn;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(options: HttpClientOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? fetch;
    this.sleepFn = options.sleepFn ?? sleep;
  }

  get userAgent(): string {
    return this.options.userAgent;
  }

  async request<T>(url: string, request: RequestOptions, consume: (response: Response) => Promise<T>): Promise<T> {
    const maxAttempts = Math.max(1, this.options.maxAttempts);

    for (let attempt = 1; ; attempt += 1) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
      const init: FetchInit = {
        method: "GET",
        headers: {
          "user-agent": this.options.userAgent,
          accept: request.accept ?? "*/*",
        },
        dispatcher: getFetchDispatcher(this.options.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      };

      try {
        let response: Response;
        try {
          response = await this.fetchFn(url, init);
        } catch (error) {
          if (attempt >= maxAttempts) {
            throw error;
          }
          await this.backoff(attempt);
          continue;
        }

        if (isRetriableStatus(response.status) && attempt < maxAttempts) {
          await response.body?.cancel().catch(() => undefined);
          await this.backoff(attempt);
          continue;
        }

        return await consume(response);
      } finally {
        clearTimeout(timeout);
      }
    }
  }

  /** Body as text; throws `HttpStatusError` unless the status is 200. */
  async getText(url: string, request: RequestOptions): Promise<string> {
    return this.request(url, request, async (response) => {
      if (response.status !== 200) {
        await response.body?.cancel().catch(() => undefined);
        throw new HttpStatusError(url, response.status);
      }
      return response.text();
    });
  }

  private backoff(attempt: number): Promise<void> {
    return this.sleepFn(Math.min(this.options.retryBaseDelayMs * 2 ** (attempt - 1), MAX_BACKOFF_MS));
  }
}
