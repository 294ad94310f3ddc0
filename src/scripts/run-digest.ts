/**
 * One-off digest run without Redis.
 * Usage: npx tsx src/scripts/run-digest.ts [--team 112] [--date 2024-06-15] [--wait]
 *   --team  team id, repeatable (default: TEAM_IDS)
 *   --date  official date (default: today in BASEBALL_TZ)
 *   --wait  watch unfinished games until Final instead of skipping them
 */
import { parseArgs } from 'node:util';
import { config } from '../config.js';
import { decodeFeedStatus, decodeLiveFeed } from '../feed/decoder.js';
import { StatsApiClient } from '../feed/statsapi-client.js';
import { MemoryFireRegistry } from '../notifications/fire-registry.js';
import { createNotifier } from '../notifications/notifier.js';
import { digestOptionsFromConfig, runDigest } from '../pipeline/digest.js';
import { createDigestStore } from '../storage/index.js';
import type { DigestRecord } from '../types/index.js';
import { isIsoDate, todayDateString } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { GameWatcher } from '../watcher/game-watcher.js';

const { values } = parseArgs({
  options: {
    team: { type: 'string', multiple: true },
    date: { type: 'string' },
    wait: { type: 'boolean', default: false },
  },
});

const date = values.date ?? todayDateString(config.BASEBALL_TZ);
if (!isIsoDate(date)) {
  console.error(`Invalid --date: ${date} (expected YYYY-MM-DD)`);
  process.exit(1);
}

const teamIds = values.team?.length ? values.team.map(Number) : config.TEAM_IDS;
if (teamIds.some((id) => !Number.isInteger(id) || id <= 0)) {
  console.error(`Invalid --team: ${values.team?.join(', ')}`);
  process.exit(1);
}

const store = await createDigestStore(config);
const notifier = createNotifier(config);
const feed = new StatsApiClient();
const options = digestOptionsFromConfig(config);
const digests: DigestRecord[] = [];

const watcher = new GameWatcher({
  feed,
  registry: new MemoryFireRegistry(),
  notifier,
  onFinal: async (liveFeed, target) => {
    digests.push(await runDigest(liveFeed, target.teamId, { feed, store, notifier, options }));
  },
});

let exitCode = 0;
try {
  for (const teamId of teamIds) {
    if (values.wait) {
      await watcher.watchTeamDay(teamId, date);
      continue;
    }

    const games = await feed.fetchSchedule(teamId, date);
    if (!games.length) console.log(`Team ${teamId}: no games on ${date}`);

    for (const game of games) {
      const payload = await feed.fetchLiveFeed(game.gamePk);
      const { status, detailedState } = decodeFeedStatus(payload);
      if (status !== 'FINAL') {
        console.log(`Team ${teamId}: game ${game.gamePk} is "${detailedState}", skipping (use --wait)`);
        continue;
      }
      digests.push(await runDigest(decodeLiveFeed(payload), teamId, { feed, store, notifier, options }));
    }
  }

  for (const digest of digests) {
    console.log(`\n${digest.renderedText}\n`);
  }
  console.log(`Done: ${digests.length} digest(s) written`);
} catch (err) {
  logger.error({ err }, 'Digest run failed');
  exitCode = 1;
} finally {
  await store.close();
}

process.exit(exitCode);
