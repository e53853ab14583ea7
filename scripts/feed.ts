#!/usr/bin/env tsx
/**
 * Weighted feed
 *
 * Runs the selector over a list of options and prints the chosen sequence
 * with per-option counts and final debts.
 *
 * Usage: npm run feed -- --options a,b,c --size 12 --seed 42 --weights 2,1,1
 */
import { parseFeedArgs, runFeed, formatFeedReport } from './feed-lib.js';

async function main() {
  const settings = parseFeedArgs(process.argv.slice(2));
  console.log(
    `Feeding ${settings.size} decision(s) over ${settings.options.length} option(s)` +
    (settings.seed === undefined ? '' : ` (seed ${settings.seed})`),
  );

  const result = runFeed(settings);
  for (const line of formatFeedReport(result)) console.log(line);
}

main().catch(err => {
  console.error('Feed failed:', err);
  process.exit(1);
});
