import type { HttpClientConfig, RetryPolicyConfig } from "../../../config/configManager.js";
import { ConsoleLogger, type Logger } from "../../../telemetry/logger.js";
import { NoopMetrics, type MetricsRecorder } from "../../../telemetry/metrics.js";

export type RequestMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface RequestOptions extends Omit<RequestInit, "method" | "signal"> {
  readonly timeoutMs?: number;
  readonly searchParams?: Record<string, string | number | boolean | undefined>;
  readonly expectedStatuses?: readonly number[];
}

interface InternalRequestOptions extends RequestOptions {
  readonly method: RequestMethod;
}

export class HttpRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly body?: string,
  ) {
    super(message);
    this.name = "HttpRequestError";
  }
}

const DEFAULT_EXPECTED_STATUSES: readonly number[] = [200];

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

function buildUrl(baseUrl: string, path: string, params?: RequestOptions["searchParams"]): string {
  const url = new URL(path, baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (value === undefined) {
        return;
      }
      url.searchParams.set(key, String(value));
    });
  }
  return url.toString();
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

function computeDelay(attempt: number, retry: RetryPolicyConfig): number {
  const exponentialDelay = retry.initialDelayMs * Math.pow(retry.backoffMultiplier, attempt - 1);
  const boundedDelay = Math.min(exponentialDelay, retry.maxDelayMs);
  const jitter = boundedDelay * 0.2 * Math.random();
  return Math.round(boundedDelay + jitter);
}

function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === "AbortError" || error.name === "TimeoutError" || /network|fetch failed/i.test(error.message);
}

export interface RetryingHttpClientOptions {
  /** Used as the metric prefix and in log lines, e.g. `telegram`. */
  readonly name: string;
  readonly http: HttpClientConfig;
  readonly logger?: Logger;
  readonly metrics?: MetricsRecorder;
}

/**
 * Thin fetch wrapper shared by outbound integrations: per-request timeout,
 * client-side rate limit, and retries with exponential backoff on 429/5xx and
 * transport errors. Bodies are returned unvalidated; callers parse them.
 */
export class RetryingHttpClient {
  private readonly logger: Logger;
  private readonly metrics: MetricsRecorder;
  private readonly minIntervalMs: number;
  private readonly retry: RetryPolicyConfig;
  private rateLimiter = Promise.resolve();
  private nextAvailableTimestamp = 0;

  constructor(private readonly options: RetryingHttpClientOptions) {
    this.logger = options.logger ?? new ConsoleLogger("http");
    this.metrics = options.metrics ?? new NoopMetrics();
    this.retry = options.http.retry;
    this.minIntervalMs = options.http.rateLimitPerSecond > 0
      ? Math.floor(1000 / options.http.rateLimitPerSecond)
      : 0;
  }

  async get(path: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.send(path, { ...options, method: "GET" });
    return response.json();
  }

  async post(path: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.send(path, { ...options, method: "POST" });
    return response.json();
  }

  async getText(path: string, options: RequestOptions = {}): Promise<string> {
    const response = await this.send(path, { ...options, method: "GET" });
    return response.text();
  }

  private async send(path: string, options: InternalRequestOptions): Promise<Response> {
    const { timeoutMs: timeoutOverride, searchParams, expectedStatuses: statusesOverride, ...init } = options;
    const requestUrl = buildUrl(this.options.http.baseUrl, path, searchParams);
    const expectedStatuses = statusesOverride ?? DEFAULT_EXPECTED_STATUSES;
    const prefix = this.options.name;
    const metricPath = path.replace(/^bot[^/]+\//, "bot***/");

    await this.applyRateLimit();

    const startedAt = Date.now();
    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt += 1) {
      const controller = new AbortController();
      const timeoutMs = timeoutOverride ?? this.options.http.timeoutMs;
      const timeout = setTimeout(() => controller.abort(), timeoutMs);

      let response: Response;
      try {
        response = await fetch(requestUrl, {
          ...init,
          method: options.method,
          signal: controller.signal,
        });
      } catch (error) {
        const metadata = {
          attempt,
          path: metricPath,
          error: error instanceof Error ? error.message : String(error),
        };
        if (!isTransientError(error) || attempt >= this.retry.maxAttempts) {
          this.logger.error(`${prefix} request failed`, metadata);
          this.metrics.increment(`${prefix}_http_failure`, { path: metricPath });
          throw error;
        }
        this.logger.warn(`${prefix} request error, retrying`, metadata);
        await sleep(computeDelay(attempt, this.retry));
        continue;
      } finally {
        clearTimeout(timeout);
      }

      if (expectedStatuses.includes(response.status)) {
        this.metrics.observe(`${prefix}_http_latency_ms`, Date.now() - startedAt, { path: metricPath });
        return response;
      }

      const body = await response.text();
      const metadata = { attempt, path: metricPath, status: response.status, body };
      const tags = { path: metricPath, status: String(response.status) };
      if (!shouldRetry(response.status)) {
        this.logger.error(`${prefix} request rejected`, metadata);
        this.metrics.increment(`${prefix}_http_error`, tags);
        throw new HttpRequestError(`Unexpected status ${response.status}`, response.status, body);
      }
      if (attempt >= this.retry.maxAttempts) {
        this.logger.error(`${prefix} request exhausted retries`, metadata);
        this.metrics.increment(`${prefix}_http_retry_exhausted`, tags);
        throw new HttpRequestError(
          `Failed after ${attempt} attempts with status ${response.status}`,
          response.status,
          body,
        );
      }
      this.logger.warn(`${prefix} request retry`, metadata);
      this.metrics.increment(`${prefix}_http_retry`, tags);
      await sleep(computeDelay(attempt, this.retry));
    }

    throw new Error("Retry loop exited unexpectedly");
  }

  private applyRateLimit(): Promise<void> {
    if (this.minIntervalMs <= 0) {
      return Promise.resolve();
    }
    const limiter = this.rateLimiter.then(async () => {
      const now = Date.now();
      const waitTime = Math.max(0, this.nextAvailableTimestamp - now);
      if (waitTime > 0) {
        await sleep(waitTime);
      }
      this.nextAvailableTimestamp = Date.now() + this.minIntervalMs;
    });
    this.rateLimiter = limiter.catch((error: unknown) => {
      this.logger.error("Rate limiter failure", { error });
    });
    return limiter;
  }
}
