/**
 * ESI client over native fetch.
 *
 * - Retries 502, 503 and 504 up to `maxRetries` times, waiting
 *   `retryDelayMs * attempt²` between attempts.
 * - Paged endpoints are walked sequentially using the `X-Pages` header.
 * - Constructed once per process and injected; holds no per-request state.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { EsiError } from '../errors.js';
import type { ILogProvider } from './ILogProvider.js';
import type { IEsiClient } from './IEsiClient.js';
import type {
  EsiCharacter,
  EsiContract,
  EsiCorporation,
  EsiName,
  EsiStation,
  EsiStructure,
} from '../types/esi.js';

const DEFAULT_BASE_URL = 'https://esi.evetech.net/latest';
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 1000;
const DEFAULT_USER_AGENT = 'courier-freight';

export interface EsiClientOptions {
  baseUrl?: string;
  datasource?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  userAgent?: string;
  log?: ILogProvider;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  token?: string;
  query?: Record<string, string | number>;
  body?: unknown;
}

interface EsiResponse<T> {
  data: T;
  pages: number;
}

export class EsiClient implements IEsiClient {
  private readonly baseUrl: string;
  private readonly datasource: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly userAgent: string;
  private readonly log: ILogProvider | undefined;

  constructor(opts?: EsiClientOptions) {
    this.baseUrl = opts?.baseUrl ?? DEFAULT_BASE_URL;
    this.datasource = opts?.datasource ?? 'tranquility';
    this.maxRetries = opts?.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = opts?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.userAgent = opts?.userAgent ?? DEFAULT_USER_AGENT;
    this.log = opts?.log;
  }

  async getCorporationContracts(corporationId: number, token: string): Promise<EsiContract[]> {
    return this.fetchAllPages<EsiContract>(`/corporations/${corporationId}/contracts/`, token);
  }

  async getStation(stationId: number): Promise<EsiStation> {
    const { data } = await this.request<EsiStation>(`/universe/stations/${stationId}/`);
    return data;
  }

  async getStructure(structureId: number, token: string): Promise<EsiStructure> {
    const { data } = await this.request<EsiStructure>(`/universe/structures/${structureId}/`, {
      token,
    });
    return data;
  }

  async resolveNames(ids: number[]): Promise<EsiName[]> {
    if (ids.length === 0) return [];

    const { data } = await this.request<EsiName[]>('/universe/names/', {
      method: 'POST',
      body: [...new Set(ids)],
    });
    return data;
  }

  async getCharacter(characterId: number): Promise<EsiCharacter> {
    const { data } = await this.request<EsiCharacter>(`/characters/${characterId}/`);
    return data;
  }

  async getCorporation(corporationId: number): Promise<EsiCorporation> {
    const { data } = await this.request<EsiCorporation>(`/corporations/${corporationId}/`);
    return data;
  }

  // ── Private ──

  private async fetchAllPages<T>(path: string, token: string): Promise<T[]> {
    const first = await this.request<T[]>(path, { token, query: { page: 1 } });
    const items = [...first.data];

    for (let page = 2; page <= first.pages; page++) {
      const next = await this.request<T[]>(path, { token, query: { page } });
      items.push(...next.data);
    }

    return items;
  }

  private async request<T>(path: string, opts: RequestOptions = {}): Promise<EsiResponse<T>> {
    const url = this.buildUrl(path, opts.query);
    const pageInfo = opts.query?.page !== undefined ? ` - page ${opts.query.page}` : '';

    for (let attempt = 0; ; attempt++) {
      if (attempt > 0) {
        this.log?.warn(`Fetching from ESI: ${path}${pageInfo} - retry ${attempt} / ${this.maxRetries}`);
      } else {
        this.log?.debug(`Fetching from ESI: ${path}${pageInfo}`);
      }

      const res = await fetch(url, {
        method: opts.method ?? 'GET',
        headers: this.buildHeaders(opts),
        ...(opts.body !== undefined && { body: JSON.stringify(opts.body) }),
      });

      if (res.ok) {
        const pagesHeader = res.headers.get('x-pages');
        const pages = pagesHeader ? Number.parseInt(pagesHeader, 10) : 1;
        return {
          data: (await res.json()) as T,
          pages: Number.isNaN(pages) ? 1 : pages,
        };
      }

      const error = new EsiError(res.status, path, await readErrorDetail(res));
      if (!error.isTransient || attempt >= this.maxRetries) {
        throw error;
      }

      const delayMs = this.retryDelayMs * (attempt + 1) ** 2;
      this.log?.warn(`${error.message} - waiting ${delayMs} ms until next retry`);
      await sleep(delayMs);
    }
  }

  private buildUrl(path: string, query?: Record<string, string | number>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    url.searchParams.set('datasource', this.datasource);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private buildHeaders(opts: RequestOptions): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.userAgent,
    };
    if (opts.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (opts.token) {
      headers['Authorization'] = `Bearer ${opts.token}`;
    }
    return headers;
  }
}

async function readErrorDetail(res: Response): Promise<string> {
  const body: unknown = await res.json().catch(() => ({}));
  if (typeof body === 'object' && body !== null && 'error' in body) {
    return String(body.error);
  }
  return res.statusText || 'Unknown error';
}
