/**
 * ENTSO-E day-ahead price source.
 *
 * Fetches A44 (day-ahead) price documents for a bidding area, parses the
 * XML into EUR/kWh points and caches the result per request window. Requests
 * for the same window share one in-flight promise. HTTP calls run through
 * the service retry loop inside a circuit breaker.
 */

import fetch from 'node-fetch';
import { XMLParser } from 'fast-xml-parser';
import moment from 'moment-timezone';
import defaultAreaMap from '../../data/entsoe-area-map.json';
import { PricePoint, PriceSource } from '../types';
import { Logger } from '../util/logger';
import { TTLCache } from '../util/cache';
import { CircuitBreakerOptions } from '../util/circuit-breaker';
import { AppError, ConfigInvalidError, ErrorCategory, isError } from '../util/error-handler';
import { isRecord } from '../util/validation';
import { DEFAULT_RETRY_OPTIONS, RetryOptions, ServiceBase, Sleep } from './base/service-base';

export type AreaMap = Record<string, string[]>;

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type HttpFetch = (url: string, init?: { headers?: Record<string, string> }) => Promise<HttpResponse>;

export interface EntsoePriceSourceOptions {
  /** Bidding area as ISO code (SE3, NO1, FI, ...) or a raw EIC code */
  area: string;
  securityToken?: string;
  areaMap?: AreaMap;
  ttlMs?: number;
  baseUrl?: string;
  fetchImpl?: HttpFetch;
  retry?: RetryOptions;
  circuitBreaker?: Partial<CircuitBreakerOptions>;
  sleep?: Sleep;
  now?: () => number;
}

interface RawPoint {
  timestamp: string;
  price: number;
}

const DEFAULT_TTL_MS = 6 * 60 * 60 * 1000;
const DEFAULT_BASE_URL = 'https://web-api.tp.entsoe.eu/api';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: 'value',
  parseAttributeValue: true,
  parseTagValue: true,
  trimValues: true,
  allowBooleanAttributes: true
});

/**
 * Determine the ENTSO-E security token: explicit option first, then the
 * ENTSOE_TOKEN environment variable.
 */
export function getEntsoeToken(override?: string): string | undefined {
  if (typeof override === 'string' && override.trim().length > 0) {
    return override.trim();
  }
  const raw = process.env.ENTSOE_TOKEN;
  if (typeof raw === 'string' && raw.trim().length > 0) {
    return raw.trim();
  }
  return undefined;
}

function isLikelyEic(areaInput: string): boolean {
  return /^10[XYZ][A-Z0-9-]{6,}$/.test(areaInput.trim().toUpperCase());
}

function normaliseAreaMap(map: Record<string, unknown>): AreaMap {
  const result: AreaMap = {};
  for (const [iso, value] of Object.entries(map)) {
    if (!Array.isArray(value)) {
      continue;
    }
    const cleaned = value
      .map((item) => (typeof item === 'string' ? item.trim() : ''))
      .filter((item) => item.length > 0);
    if (cleaned.length > 0) {
      result[iso.trim().toUpperCase()] = cleaned;
    }
  }
  return result;
}

/**
 * Resolve an ISO bidding-area code or an EIC code to an EIC code.
 * The area map may list several EIC codes per ISO code; the first one wins.
 */
export function resolveAreaToEic(areaInput: string, areaMap?: AreaMap): string {
  const candidate = areaInput.trim();
  if (!candidate) {
    throw new ConfigInvalidError('No ENTSO-E price area specified', ['area: must be an ISO code or an EIC code']);
  }

  if (isLikelyEic(candidate)) {
    return candidate.toUpperCase();
  }

  const iso = candidate.toUpperCase();
  const map = normaliseAreaMap(areaMap ?? defaultAreaMap);
  const eics = map[iso];
  if (!eics || eics.length === 0) {
    throw new ConfigInvalidError(`No ENTSO-E EIC mapping found for area ${iso}`, [`area: unknown code ${iso}`]);
  }
  return eics[0];
}

function toEntsoeTimestamp(input: Date): string {
  const m = moment.utc(input);
  if (!m.isValid()) {
    throw new AppError(`Invalid timestamp provided: ${String(input)}`, ErrorCategory.VALIDATION);
  }
  return m.format('YYYYMMDDHHmm');
}

function parseResolutionToMinutes(resolution: unknown): number {
  if (typeof resolution !== 'string' || !resolution.startsWith('PT')) {
    return 60;
  }
  const match = resolution.match(/^PT(?:(\d+)H)?(?:(\d+)M)?$/);
  if (!match) {
    return 60;
  }
  const [, hours, minutes] = match;
  const totalMinutes = (hours ? Number(hours) * 60 : 0) + (minutes ? Number(minutes) : 0);
  return totalMinutes > 0 ? totalMinutes : 60;
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function child(node: unknown, ...names: string[]): unknown {
  if (!isRecord(node)) {
    return undefined;
  }
  for (const name of names) {
    if (node[name] !== undefined) {
      return node[name];
    }
  }
  return undefined;
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }
  const nested = child(value, 'value');
  return typeof nested === 'string' || typeof nested === 'number' ? String(nested) : undefined;
}

function buildEntsoeReasonMessage(reasonSource: unknown): string {
  return toArray(reasonSource)
    .map((reason) => [textOf(child(reason, 'code')), textOf(child(reason, 'text'))]
      .filter((part): part is string => typeof part === 'string' && part.trim().length > 0)
      .join(' - '))
    .filter((message) => message.length > 0)
    .join('; ');
}

function parseEntsoeXml(xml: string): RawPoint[] {
  const doc: unknown = parser.parse(xml);

  const acknowledgement = child(doc, 'Acknowledgement_MarketDocument');
  if (acknowledgement !== undefined) {
    const message = buildEntsoeReasonMessage(child(acknowledgement, 'Reason', 'reason'));
    throw new AppError(`ENTSO-E returned an error: ${message || 'Unknown acknowledgement reason'}`, ErrorCategory.API);
  }

  const marketDocument = child(doc, 'Publication_MarketDocument', 'GL_MarketDocument');
  if (marketDocument === undefined) {
    throw new AppError(`Unexpected ENTSO-E response. Body: ${xml.slice(0, 200)}`, ErrorCategory.API);
  }

  const reason = child(marketDocument, 'Reason', 'reason');
  if (reason !== undefined) {
    throw new AppError(`ENTSO-E returned an error: ${buildEntsoeReasonMessage(reason) || 'Unknown reason'}`, ErrorCategory.API);
  }

  const seriesList = toArray(child(marketDocument, 'TimeSeries'));
  if (seriesList.length === 0) {
    throw new AppError('ENTSO-E response did not include any TimeSeries data.', ErrorCategory.API);
  }

  const points: RawPoint[] = [];
  for (const series of seriesList) {
    for (const period of toArray(child(series, 'Period', 'period'))) {
      const interval = child(period, 'timeInterval') ?? child(series, 'timeInterval');
      const start = textOf(child(interval, 'start', 'Start'));
      if (!start) {
        continue;
      }
      const resolutionMinutes = parseResolutionToMinutes(textOf(child(period, 'resolution') ?? child(series, 'resolution')));
      for (const point of toArray(child(period, 'Point', 'point'))) {
        const position = Number(textOf(child(point, 'position', 'Position')));
        const price = Number(textOf(child(point, 'price.amount', 'priceAmount')));
        if (!Number.isFinite(position) || position < 1 || !Number.isFinite(price)) {
          continue;
        }
        const timestamp = moment.utc(start).add((position - 1) * resolutionMinutes, 'minutes');
        if (!timestamp.isValid()) {
          continue;
        }
        points.push({ timestamp: timestamp.toISOString(), price });
      }
    }
  }

  if (points.length === 0) {
    throw new AppError('ENTSO-E response parsing produced zero data points.', ErrorCategory.API);
  }

  points.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  return points;
}

function isNoDataError(error: unknown): boolean {
  return isError(error) && /No matching data found|Delivered interval is not valid/i.test(error.message);
}

export class EntsoePriceSource extends ServiceBase implements PriceSource {
  private readonly eic: string;
  private readonly securityToken: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: HttpFetch;
  private readonly retry: RetryOptions;
  private readonly cache: TTLCache<string, PricePoint[]>;
  private readonly inFlight = new Map<string, Promise<PricePoint[]>>();
  private readonly now: () => number;

  constructor(logger: Logger, options: EntsoePriceSourceOptions) {
    super(logger, options.circuitBreaker, options.sleep);
    const token = getEntsoeToken(options.securityToken);
    if (!token) {
      throw new ConfigInvalidError(
        'ENTSO-E token not found. Set ENTSOE_TOKEN or pass securityToken.',
        ['securityToken: missing']
      );
    }
    this.securityToken = token;
    this.eic = resolveAreaToEic(options.area, options.areaMap);
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.retry = options.retry ?? DEFAULT_RETRY_OPTIONS;
    this.now = options.now ?? Date.now;
    this.cache = new TTLCache({ ttlMs: options.ttlMs ?? DEFAULT_TTL_MS, maxEntries: 20, now: this.now });
  }

  public getEic(): string {
    return this.eic;
  }

  public async fetchPrices(horizonStart: Date, horizonEnd: Date): Promise<PricePoint[]> {
    const startIso = horizonStart.toISOString();
    const endIso = horizonEnd.toISOString();
    const cacheKey = `${this.eic}|${startIso}|${endIso}`;

    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached.map((point) => ({ ...point }));
    }

    const pending = this.inFlight.get(cacheKey);
    if (pending) {
      return pending;
    }

    const request = this.retrieveWithFallback(horizonStart, horizonEnd)
      .then((points) => {
        this.cache.set(cacheKey, points);
        return points;
      })
      .finally(() => {
        this.inFlight.delete(cacheKey);
      });

    this.inFlight.set(cacheKey, request);
    return request;
  }

  public clearCache(): void {
    this.cache.clear();
  }

  private async retrieveWithFallback(start: Date, end: Date): Promise<PricePoint[]> {
    try {
      return await this.retrieve(start, end);
    } catch (error) {
      if (!isNoDataError(error)) {
        throw error;
      }
      // Day-ahead prices for tomorrow appear in the early afternoon; take what exists
      const collected = await this.retrieveDailyChunks(start, end);
      if (collected.length === 0) {
        this.logger.price(`[ENTSO-E] No price data available for ${this.eic} between ${start.toISOString()} and ${end.toISOString()}`);
      }
      return collected;
    }
  }

  private async retrieveDailyChunks(start: Date, end: Date): Promise<PricePoint[]> {
    const collected = new Map<string, PricePoint>();
    let cursor = moment.utc(start);
    const finish = moment.utc(end);

    while (cursor.isBefore(finish)) {
      const next = moment.min(cursor.clone().add(24, 'hours'), finish);
      try {
        const chunk = await this.retrieve(cursor.toDate(), next.toDate());
        for (const point of chunk) {
          collected.set(point.time, point);
        }
      } catch (error) {
        if (isNoDataError(error)) {
          break;
        }
        throw error;
      }
      cursor = next;
    }

    return [...collected.values()].sort((a, b) => a.time.localeCompare(b.time));
  }

  private async retrieve(start: Date, end: Date): Promise<PricePoint[]> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('securityToken', this.securityToken);
    url.searchParams.set('documentType', 'A44');
    url.searchParams.set('contract_MarketAgreement.Type', 'A01');
    url.searchParams.set('processType', 'A01');
    url.searchParams.set('in_Domain', this.eic);
    url.searchParams.set('out_Domain', this.eic);
    url.searchParams.set('periodStart', toEntsoeTimestamp(start));
    url.searchParams.set('periodEnd', toEntsoeTimestamp(end));

    const safeParams = new URLSearchParams(url.searchParams.toString());
    safeParams.set('securityToken', '***');
    this.logger.price(`[ENTSO-E] Requesting prices for ${this.eic} (${safeParams.toString()})`);

    const xml = await this.executeWithRetry(() => this.executeRequest(url.toString()), this.retry);
    return parseEntsoeXml(xml).map((point) => ({
      time: point.timestamp,
      price: point.price / 1000
    }));
  }

  private async executeRequest(url: string): Promise<string> {
    const response = await this.fetchImpl(url, {
      headers: {
        'User-Agent': 'smart-heating-scheduler',
        Accept: 'application/xml;q=1, text/xml;q=0.8, */*;q=0.5'
      }
    });
    const bodyText = await response.text();

    // 4xx bodies carry an acknowledgement document explaining the refusal
    if (!response.ok && response.status >= 500) {
      throw new AppError(`ENTSO-E request failed (${response.status} ${response.statusText})`, ErrorCategory.NETWORK);
    }
    if (!bodyText || bodyText.trim().length === 0) {
      throw new AppError(`ENTSO-E returned an empty body (${response.status})`, ErrorCategory.API);
    }
    return bodyText;
  }
}

export const __testables = {
  parseEntsoeXml,
  parseResolutionToMinutes
};
