import { setTimeout as delay } from 'node:timers/promises';
import { isRecord, parseCollectionFolder, readId } from '../lib/records.js';
import type { CollectionFolder } from '../types/index.js';
import { log } from './log.js';

const DISCOGS_API_BASE = 'https://api.discogs.com';
const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_RATE_LIMIT_RETRIES = 3;
const DEFAULT_RETRY_AFTER_SECONDS = 60;

export interface DiscogsClientConfig {
  /** Personal access token */
  token: string;
  /** Discogs rejects requests without an identifying user agent */
  userAgent: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<unknown>;
}

/** A Discogs request that never produced a usable response: network failure, timeout or HTTP error. */
export class DiscogsTransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DiscogsTransportError';
  }
}

export class DiscogsHttpError extends DiscogsTransportError {
  constructor(
    url: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(`Discogs API error ${status}: ${body}`, url);
    this.name = 'DiscogsHttpError';
  }
}

export function isDiscogsTransportError(error: unknown): error is DiscogsTransportError {
  return error instanceof DiscogsTransportError;
}

type QueryParams = Record<string, string | number>;

// Settles only by rejecting, once the request's timer has fired.
function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('Request aborted')), { once: true });
  });
}

export class DiscogsClient {
  private readonly token: string;
  private readonly userAgent: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(config: DiscogsClientConfig) {
    this.token = config.token;
    this.userAgent = config.userAgent;
    this.baseUrl = config.baseUrl ?? DISCOGS_API_BASE;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = config.sleep ?? delay;
  }

  async request(endpoint: string, params?: QueryParams, attempt = 0): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const { response, body } = await this.send(url.toString());

    if (response.status === 429 && attempt < MAX_RATE_LIMIT_RETRIES) {
      const retryAfter =
        Number.parseInt(response.headers.get('Retry-After') ?? '', 10) || DEFAULT_RETRY_AFTER_SECONDS;
      log.warn('Discogs rate limited, waiting before retry', { retryAfter, attempt: attempt + 1 });
      await this.sleep(retryAfter * 1000);
      return this.request(endpoint, params, attempt + 1);
    }

    if (!response.ok) {
      throw new DiscogsHttpError(url.toString(), response.status, body);
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      throw new DiscogsTransportError(`Response from ${url.toString()} is not valid JSON`, url.toString(), {
        cause: error
      });
    }
  }

  /** Fetches and reads the whole body under one timeout; a body that breaks or stalls is a transport failure. */
  private async send(url: string): Promise<{ response: Response; body: string }> {
    const controller = new AbortController();
    const aborted = whenAborted(controller.signal);
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await Promise.race([
        this.fetchImpl(url, {
          headers: {
            Authorization: `Discogs token=${this.token}`,
            'User-Agent': this.userAgent,
            Accept: 'application/vnd.discogs.v2.discogs+json'
          },
          signal: controller.signal
        }),
        aborted
      ]);
      const body = await Promise.race([response.text(), aborted]);
      return { response, body };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new DiscogsTransportError(`Request to ${url} timed out after ${this.timeoutMs}ms`, url, {
          cause: error
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new DiscogsTransportError(`Request to ${url} failed: ${reason}`, url, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async getFolder(username: string, folderId: number): Promise<CollectionFolder> {
    const response = await this.request(
      `/users/${encodeURIComponent(username)}/collection/folders/${folderId}`
    );
    return parseCollectionFolder(response);
  }

  /**
   * Walks every page of a collection folder, yielding the raw listing entries in order.
   */
  async *collectionItems(username: string, folderId: number, perPage = 100): AsyncGenerator<unknown> {
    const endpoint = `/users/${encodeURIComponent(username)}/collection/folders/${folderId}/releases`;
    let page = 1;
    let pages = 1;

    do {
      const response = await this.request(endpoint, { page, per_page: perPage });
      const releases = isRecord(response) ? response.releases : undefined;
      if (!isRecord(response) || !Array.isArray(releases)) {
        throw new Error(`Discogs collection page ${page} for ${username} has an unexpected shape.`);
      }
      const pagination = response.pagination;
      pages = (isRecord(pagination) ? readId(pagination.pages) : undefined) ?? page;

      for (const release of releases) {
        yield release;
      }
      page++;
    } while (page <= pages);
  }

  async getRelease(releaseId: number): Promise<unknown> {
    return this.request(`/releases/${releaseId}`);
  }
}
