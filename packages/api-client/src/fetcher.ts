/**
 * Resource fetcher for the comics API — signed GETs, envelope validation,
 * story pagination.
 *
 * Every failure propagates to the caller as a CommunicationError or a
 * NotFoundError; nothing is retried and no partial result is returned.
 * Fetch and clock are injectable for testability.
 *
 * @module @storypage/api-client/fetcher
 */

import {
  CharacterResultSchema,
  DataWrapperSchema,
  StoryRefSchema,
  StoryResultSchema,
  toCharacter,
  toStory,
  type Character,
  type DataWrapper,
  type Story,
} from '@storypage/data-model';
import type { z } from 'zod';
import type { ApiClientConfig } from './config';
import { CommunicationError, NotFoundError } from './errors';
import { createSigner, type Clock, type QueryParams, type Signer } from './signer';

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

/** Injectable fetch signature (defaults to global fetch). */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface ResourceFetcherOptions {
  fetchFn?: FetchFn;
  now?: Clock;
}

/** Largest page the stories endpoint serves. */
export const PAGE_SIZE = 100;

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseResult<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  endpoint: string,
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new CommunicationError(endpoint, `Unexpected result shape from ${endpoint}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/* ------------------------------------------------------------------ */
/*  Fetcher                                                           */
/* ------------------------------------------------------------------ */

export class ResourceFetcher {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly sign: Signer;
  private readonly fetchFn: FetchFn;

  constructor(config: ApiClientConfig, options: ResourceFetcherOptions = {}) {
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs;
    this.sign = createSigner(config.credentials, options.now);
    this.fetchFn = options.fetchFn ?? ((url, init) => globalThis.fetch(url, init));
  }

  /** Id of the character whose name matches exactly. */
  async resolveCharacterId(name: string): Promise<number> {
    const endpoint = `${this.baseUrl}/characters`;
    const envelope = await this.get(endpoint, { name });
    if (envelope.data.count < 1) {
      throw new NotFoundError('character', name);
    }
    return parseResult(CharacterResultSchema, envelope.data.results[0], endpoint).id;
  }

  /** Follow a character `resourceURI` embedded in story data. */
  async fetchCharacterByUrl(url: string): Promise<Character> {
    const envelope = await this.get(url);
    if (envelope.data.count < 1) {
      throw new NotFoundError('character', url);
    }
    return toCharacter(parseResult(CharacterResultSchema, envelope.data.results[0], url));
  }

  /**
   * Every story id of a character, in page order then in-page order.
   * The first page's `total` fixes how many further pages are requested.
   */
  async listStoryIdsForCharacter(characterId: number): Promise<number[]> {
    const endpoint = `${this.baseUrl}/characters/${characterId}/stories`;

    const first = await this.getStoryPage(endpoint, 0);
    const total = first.data.total;
    if (total < 1) {
      throw new NotFoundError('stories', characterId);
    }

    const totalPages = Math.ceil(total / PAGE_SIZE);
    const ids = this.storyIds(first, endpoint);
    for (let pageIndex = 1; pageIndex < totalPages; pageIndex++) {
      const page = await this.getStoryPage(endpoint, pageIndex * PAGE_SIZE);
      ids.push(...this.storyIds(page, endpoint));
    }
    return ids;
  }

  /** `attributionHTML` comes from the envelope, not the story result. */
  async fetchStory(storyId: number): Promise<Story> {
    const endpoint = `${this.baseUrl}/stories/${storyId}`;
    const envelope = await this.get(endpoint);
    if (envelope.data.count < 1) {
      throw new NotFoundError('story', storyId);
    }
    const raw = parseResult(StoryResultSchema, envelope.data.results[0], endpoint);
    return toStory(raw, envelope.attributionHTML);
  }

  /* ---------------------------------------------------------------- */

  private getStoryPage(endpoint: string, offset: number): Promise<DataWrapper> {
    return this.get(endpoint, { limit: String(PAGE_SIZE), offset: String(offset) });
  }

  private storyIds(page: DataWrapper, endpoint: string): number[] {
    return page.data.results.map((result) => parseResult(StoryRefSchema, result, endpoint).id);
  }

  private buildUrl(endpoint: string, params: QueryParams): URL {
    let url: URL;
    try {
      url = new URL(endpoint);
    } catch (error: unknown) {
      throw new CommunicationError(endpoint, `Invalid resource URL: ${endpoint}`, { cause: error });
    }
    for (const [key, value] of Object.entries(this.sign(params))) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private async get(target: string, params: QueryParams = {}): Promise<DataWrapper> {
    const url = this.buildUrl(target, params);
    const endpoint = `${url.origin}${url.pathname}`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    let body: unknown;
    try {
      const response = await this.fetchFn(url.toString(), { signal: controller.signal });
      if (!response.ok) {
        throw new CommunicationError(endpoint, `HTTP ${response.status} from ${endpoint}`, {
          status: response.status,
        });
      }
      body = await response.json();
    } catch (error: unknown) {
      if (error instanceof CommunicationError) {
        throw error;
      }
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : describeFailure(error);
      throw new CommunicationError(endpoint, `Request to ${endpoint} failed: ${reason}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }

    const parsed = DataWrapperSchema.safeParse(body);
    if (!parsed.success) {
      throw new CommunicationError(endpoint, `Unexpected response shape from ${endpoint}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
