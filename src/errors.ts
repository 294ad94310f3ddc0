import type { ZodError } from 'zod';

/** Non-2xx response from an upstream feed. */
export class FeedError extends Error {
  constructor(
    readonly url: string,
    readonly statusCode: number,
  ) {
    super(`Feed request failed with HTTP ${statusCode}: ${url}`);
    this.name = 'FeedError';
  }
}

/** Payload did not match the shape the decoder expects. */
export class FeedDecodeError extends Error {
  constructor(
    readonly feed: string,
    readonly issues: ZodError['issues'],
  ) {
    const first = issues[0];
    const where = first ? ` at ${first.path.join('.') || '<root>'}: ${first.message}` : '';
    super(`Invalid ${feed} payload${where}`);
    this.name = 'FeedDecodeError';
  }
}

export class StandingsUnavailableError extends Error {
  constructor(message = 'No usable standings records') {
    super(message);
    this.name = 'StandingsUnavailableError';
  }
}

export class TeamNotInStandingsError extends Error {
  constructor(readonly team: number | string) {
    super(`Team ${team} not found in standings`);
    this.name = 'TeamNotInStandingsError';
  }
}

export class TeamNotInGameError extends Error {
  constructor(
    readonly teamId: number,
    readonly gamePk: number,
  ) {
    super(`Team ${teamId} did not play in game ${gamePk}`);
    this.name = 'TeamNotInGameError';
  }
}
