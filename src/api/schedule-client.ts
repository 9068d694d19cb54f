/**
 * Upstream Schedule Client
 * Fetches raw channel listings and the JSON documents used to enrich them
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import axiosRetry from 'axios-retry';
import type { Channel, RawListing } from '../types/guide';
import { FetchError, FetchErrorKind, errorMessage } from '../utils/errors';
import { Result, err, ok } from '../utils/result';

export interface FetchedDocument {
  url: string;
  body: string;
  status: number;
  fetchedAt: number; // epoch ms
}

export interface RetryPolicy {
  /** Total attempts including the first request */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  retryable: readonly FetchErrorKind[];
}

export interface DocumentClientOptions {
  userAgent: string;
  referer?: string;
  timeoutMs: number;
  /** Added to the timeout on every retry, up to timeoutMaxMs */
  timeoutIncrementMs: number;
  timeoutMaxMs: number;
  retry: RetryPolicy;
  /** Replaces the HTTP transport, used by tests */
  adapter?: AxiosRequestConfig['adapter'];
  now?: () => number;
}

export interface ScheduleClientOptions extends DocumentClientOptions {
  urlTemplate: string;
}

export const DEFAULT_RETRYABLE: readonly FetchErrorKind[] = ['timeout', 'network'];

/**
 * Map an axios failure to the fetch error taxonomy
 */
export function classifyFetchError(error: unknown): FetchErrorKind {
  if (axios.isCancel(error)) {
    return 'canceled';
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ERR_CANCELED') {
      return 'canceled';
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'timeout';
    }
    if (error.response) {
      return 'unexpected-status';
    }
  }
  return 'network';
}

export function backoffDelay(retryCount: number, policy: RetryPolicy): number {
  const delay = policy.baseDelayMs * 2 ** Math.max(0, retryCount - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Fill `{name}` placeholders with URL-encoded values; unknown placeholders are left alone
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    name in values ? encodeURIComponent(String(values[name])) : placeholder
  );
}

export function listingUrl(template: string, lookupKey: string): string {
  return fillTemplate(template, { key: lookupKey });
}

/**
 * JSON-over-HTTP client with growing timeouts and retries.
 * Failures come back as FetchError values tagged with the owning channel.
 */
export class HttpDocumentClient {
  protected readonly axiosInstance: AxiosInstance;
  protected readonly now: () => number;

  constructor(options: DocumentClientOptions) {
    this.now = options.now ?? Date.now;

    const headers: Record<string, string> = {
      'User-Agent': options.userAgent,
      Accept: 'application/json, text/plain, */*',
      'Cache-Control': 'no-cache',
    };
    if (options.referer) {
      headers.Referer = options.referer;
    }

    this.axiosInstance = axios.create({
      timeout: options.timeoutMs,
      headers,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      adapter: options.adapter,
    });

    const { retry } = options;
    axiosRetry(this.axiosInstance, {
      retries: Math.max(0, retry.maxAttempts - 1),
      shouldResetTimeout: true,
      retryDelay: (retryCount) => backoffDelay(retryCount, retry),
      retryCondition: (error) => {
        if (error.config?.signal?.aborted) {
          return false;
        }
        return retry.retryable.includes(classifyFetchError(error));
      },
      onRetry: (retryCount, error, requestConfig) => {
        const current = requestConfig.timeout ?? options.timeoutMs;
        requestConfig.timeout = Math.min(current + options.timeoutIncrementMs, options.timeoutMaxMs);
        console.log(
          `Retry attempt ${retryCount} for ${requestConfig.url} (${classifyFetchError(error)}, timeout ${requestConfig.timeout}ms)`
        );
      },
    });
  }

  /**
   * GET one document. Expected failures come back as a FetchError value; nothing here throws.
   */
  async fetchDocument(url: string, ownerId: string, signal?: AbortSignal): Promise<Result<FetchedDocument, FetchError>> {
    if (signal?.aborted) {
      return err(new FetchError(ownerId, 'canceled', `Fetch for ${ownerId} canceled before start`, { url }));
    }

    try {
      const response = await this.axiosInstance.get<unknown>(url, { signal });
      const body = typeof response.data === 'string' ? response.data : '';

      if (body.trim().length === 0) {
        return err(
          new FetchError(ownerId, 'empty-response', `Empty response for ${ownerId}`, {
            url,
            status: response.status,
          })
        );
      }

      return ok({ url, body, status: response.status, fetchedAt: this.now() });
    } catch (error) {
      const kind = classifyFetchError(error);
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      console.warn(`Failed to fetch ${url} for ${ownerId} (${kind}): ${errorMessage(error)}`);
      return err(
        new FetchError(ownerId, kind, `Failed to fetch ${url} for ${ownerId}: ${errorMessage(error)}`, {
          url,
          status,
        })
      );
    }
  }
}

export class ScheduleClient extends HttpDocumentClient {
  private readonly urlTemplate: string;

  constructor(options: ScheduleClientOptions) {
    super(options);
    this.urlTemplate = options.urlTemplate;
  }

  /**
   * Fetch the listing for one channel
   */
  async fetchListing(channel: Channel, signal?: AbortSignal): Promise<Result<RawListing, FetchError>> {
    if (!channel.lookupKey) {
      return err(new FetchError(channel.id, 'no-lookup-key', `Channel ${channel.id} has no upstream lookup key`));
    }

    const fetched = await this.fetchDocument(listingUrl(this.urlTemplate, channel.lookupKey), channel.id, signal);
    if (!fetched.ok) {
      return fetched;
    }

    const { body, status, fetchedAt } = fetched.value;
    return ok({ channelId: channel.id, body, status, fetchedAt });
  }
}
