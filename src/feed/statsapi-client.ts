import { request, type Dispatcher } from 'undici';
import { config } from '../config.js';
import { FeedError } from '../errors.js';
import type { GameState, StandingRecord } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { decodeSchedule, decodeStandings } from './decoder.js';

export interface StatsApiClientOptions {
  baseUrl: string;
  timeoutMs: number;
  season: number;
  dispatcher?: Dispatcher;
}

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'game-digest/1.0',
  Accept: 'application/json',
};

/** The three MLB StatsAPI reads the digest needs. */
export interface GameFeed {
  fetchSchedule(teamId: number, date: string): Promise<GameState[]>;
  fetchLiveFeed(gamePk: number): Promise<unknown>;
  fetchStandings(): Promise<StandingRecord[]>;
}

export class StatsApiClient implements GameFeed {
  private readonly log = logger.child({ module: 'statsapi' });

  constructor(
    private readonly options: StatsApiClientOptions = {
      baseUrl: config.STATSAPI_BASE_URL,
      timeoutMs: config.HTTP_TIMEOUT_MS,
      season: config.SEASON,
    },
  ) {}

  async fetchSchedule(teamId: number, date: string): Promise<GameState[]> {
    const payload = await this.getJson('/api/v1/schedule', {
      sportId: '1',
      teamId: String(teamId),
      date,
    });
    return decodeSchedule(payload, teamId);
  }

  /** Raw payload: pollers decode only the status, the digest decodes everything. */
  fetchLiveFeed(gamePk: number): Promise<unknown> {
    return this.getJson(`/api/v1.1/game/${gamePk}/feed/live`);
  }

  async fetchStandings(): Promise<StandingRecord[]> {
    const payload = await this.getJson('/api/v1/standings', {
      leagueId: '103,104',
      season: String(this.options.season),
      standingsTypes: 'regularSeason',
      hydrate: 'team(division,league),division,league',
    });
    return decodeStandings(payload);
  }

  private async getJson(path: string, query: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(path, this.options.baseUrl);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    const startMs = Date.now();
    const { statusCode, body } = await request(url, {
      method: 'GET',
      headers: DEFAULT_HEADERS,
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
      dispatcher: this.options.dispatcher,
    });

    if (statusCode >= 400) {
      await body.dump();
      throw new FeedError(url.toString(), statusCode);
    }

    const payload: unknown = await body.json();
    this.log.debug({ path, statusCode, durationMs: Date.now() - startMs }, 'Feed fetched');
    return payload;
  }
}
