import { z } from 'zod';
import { Config } from '../config/env';
import { ListingCache } from '../storage/listingCache';
import { CATEGORIES, Category, ExchangeRates, Listing, MarketFetch, MarketSnapshot } from '../types';
import { MarketDataError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

type Endpoint = { overviewType: 'currencyoverview' | 'itemoverview'; itemType: string };

export const CATEGORY_ENDPOINTS: Record<Category, Endpoint> = {
  Currency: { overviewType: 'currencyoverview', itemType: 'Currency' },
  Tattoo: { overviewType: 'itemoverview', itemType: 'Tattoo' },
  Scarab: { overviewType: 'itemoverview', itemType: 'Scarab' },
  Essence: { overviewType: 'itemoverview', itemType: 'Essence' },
  Gem: { overviewType: 'itemoverview', itemType: 'SkillGem' },
};

export const DIVINE_ORB = 'Divine Orb';

const lineSchema = z
  .object({
    name: z.string().nullish(),
    currencyTypeName: z.string().nullish(),
    chaosValue: z.number().nullish(),
    chaosEquivalent: z.number().nullish(),
    count: z.number().nullish(),
    gemLevel: z.number().nullish(),
    gemQuality: z.number().nullish(),
    corrupted: z.boolean().nullish(),
  })
  .passthrough();

const overviewSchema = z.object({ lines: z.array(lineSchema) });

export type RawLine = z.infer<typeof lineSchema>;

export const normalizeLine = (line: RawLine): Listing | null => {
  const name = line.name ?? line.currencyTypeName;
  const chaosValue = line.chaosValue ?? line.chaosEquivalent;
  if (!name || chaosValue == null || !Number.isFinite(chaosValue) || chaosValue < 0) return null;
  if (line.count != null && line.count < 0) return null;

  const listing: Listing = { name, chaosValue };
  if (line.count != null) listing.count = line.count;
  if (line.gemLevel != null) listing.gemLevel = line.gemLevel;
  if (line.gemQuality != null) listing.gemQuality = line.gemQuality;
  if (line.corrupted != null) listing.corrupted = line.corrupted;
  return listing;
};

export class MarketDataGateway {
  private readonly blacklist: ReadonlySet<string>;

  constructor(
    private config: Config,
    private cache: ListingCache,
    private logger: Logger,
    private fetchFn: FetchLike = fetch,
  ) {
    this.blacklist = new Set(config.api.itemBlacklist);
  }

  /** Listings for one category; `[]` when the source is unreachable or returns junk. */
  async fetch(category: Category, league: string): Promise<Listing[]> {
    const { overviewType, itemType } = CATEGORY_ENDPOINTS[category];

    const cached = this.cache.read(league, itemType);
    if (cached) {
      const parsed = z.array(lineSchema).safeParse(cached);
      if (parsed.success) {
        const listings = this.clean(parsed.data, category);
        this.logger.debug('Data acquisition (cache hit)', { category, records: listings.length });
        return listings;
      }
      this.logger.warn('Cached lines failed validation, refetching', { category });
    }

    const url = new URL(overviewType, this.config.api.baseUrl);
    url.searchParams.set('league', league);
    url.searchParams.set('type', itemType);

    let lines: RawLine[];
    try {
      lines = await this.request(url.toString());
    } catch (error) {
      this.logger.error('API request failed', {
        url: error instanceof MarketDataError ? error.url : url.toString(),
        error: errorMessage(error),
      });
      return [];
    }

    if (lines.length === 0) {
      this.logger.warn('No data returned', { category, league });
      return [];
    }

    try {
      this.cache.write(league, itemType, lines);
    } catch (error) {
      this.logger.warn('Failed to write listing cache', { category, error: errorMessage(error) });
    }

    const listings = this.clean(lines, category);
    this.logger.debug('Data acquisition (API call)', { category, records: listings.length });
    return listings;
  }

  /** Fetches every category and refreshes the Divine Orb rate when Currency carries it. */
  async fetchAll(league: string, rates: ExchangeRates): Promise<MarketFetch> {
    this.logger.info('Starting data acquisition', { league });

    const snapshot: Partial<Record<Category, readonly Listing[]>> = {};
    let total = 0;
    for (const category of CATEGORIES) {
      const rows = await this.fetch(category, league);
      snapshot[category] = rows;
      total += rows.length;
    }

    this.logger.info('Data acquisition complete', { league, records: total });

    return { snapshot: Object.freeze(snapshot), rates: this.refreshRates(snapshot, rates) };
  }

  private refreshRates(snapshot: MarketSnapshot, rates: ExchangeRates): ExchangeRates {
    const divine = snapshot.Currency?.find((listing) => listing.name === DIVINE_ORB);
    if (!divine || divine.chaosValue <= 0) {
      this.logger.warn('Could not update Divine Orb price, keeping previous rate', {
        divineToChaos: rates.divineToChaos,
      });
      return rates;
    }
    this.logger.info('Live rates updated', { divineToChaos: Math.round(divine.chaosValue) });
    return { divineToChaos: divine.chaosValue };
  }

  private async request(url: string): Promise<RawLine[]> {
    let res: Response;
    try {
      res = await this.fetchFn(url, { signal: AbortSignal.timeout(this.config.api.requestTimeoutMs) });
    } catch (error) {
      throw new MarketDataError(`network error: ${errorMessage(error)}`, url, { cause: error });
    }
    if (!res.ok) throw new MarketDataError(`status ${res.status}`, url);

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new MarketDataError('malformed JSON body', url, { cause: error });
    }

    const parsed = overviewSchema.safeParse(body);
    if (!parsed.success) {
      throw new MarketDataError(`unexpected response shape: ${parsed.error.issues[0]?.message}`, url);
    }
    this.logger.debug('API request successful', { url, status: res.status });
    return parsed.data.lines;
  }

  private clean(lines: readonly RawLine[], category: Category): Listing[] {
    const minimum = this.config.api.minimumListings;
    // A reported but null count never meets the minimum; an absent one is not filtered.
    const liquid = lines.filter((line) => line.count === undefined || (line.count !== null && line.count >= minimum));
    if (liquid.length < lines.length) {
      this.logger.debug('Filtered low-liquidity items', { category, count: lines.length - liquid.length });
    }

    const listings = liquid.map(normalizeLine).filter((listing): listing is Listing => listing !== null);
    const allowed = listings.filter((listing) => !this.blacklist.has(listing.name));
    if (allowed.length < listings.length) {
      this.logger.debug('Filtered blacklisted items', { category, count: listings.length - allowed.length });
    }
    return allowed;
  }
}
