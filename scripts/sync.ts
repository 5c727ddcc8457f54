/**
 * sync.ts
 *
 * Pulls trades for one token or wallet from every configured provider, merges them
 * and appends the new ones to the JSONL store under DATA_DIR.
 *
 * Usage:
 *   tsx scripts/sync.ts --token <mint> [--hours 24]
 *   tsx scripts/sync.ts --wallet <addr> --from <unix> --to <unix>
 *   tsx scripts/sync.ts --token <mint> --candles 5m   # print candles for the window after syncing
 *
 * Requires: at least one of BIRDEYE_API_KEY, SOLSCAN_API_KEY, HELIUS_API_KEY in .env
 */

import type { Subject } from '../src/core';
import { isEngineError } from '../src/core';
import { createEngine } from '../src/engine';
import { config, validateConfig } from '../src/utils';

interface CliArgs {
  subject: Subject;
  from?: number;
  to?: number;
  hours: number;
  candles?: string;
}

// ── Arg parsing ───────────────────────────────────────────────────────────────

function parseSeconds(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (!value || !Number.isInteger(n) || n < 0) throw new Error(`${flag} must be unix seconds, got: ${value}`);
  return n;
}

function parseArgs(argv: string[]): CliArgs {
  let subject: Subject | undefined;
  let from: number | undefined;
  let to: number | undefined;
  let hours = 24;
  let candles: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    if (arg === '--help' || arg === '-h') {
      console.log([
        'Usage: tsx scripts/sync.ts (--token <mint> | --wallet <addr>) [options]',
        '  --from N        Window start, unix seconds',
        '  --to N          Window end, unix seconds (default: now)',
        '  --hours N       Window length when --from is omitted (default: 24)',
        '  --candles I     After syncing a token, print its candles at interval I',
      ].join('\n'));
      process.exit(0);
    }
    if (arg === '--token' || arg === '--wallet') {
      if (subject) throw new Error('Pass exactly one of --token or --wallet');
      if (!next) throw new Error(`${arg} needs an address`);
      subject = { kind: arg === '--token' ? 'token' : 'wallet', address: next };
      i++;
      continue;
    }
    if (arg === '--from') { from = parseSeconds(arg, next); i++; continue; }
    if (arg === '--to') { to = parseSeconds(arg, next); i++; continue; }
    if (arg === '--hours') { hours = parseFloat(next ?? ''); i++; continue; }
    if (arg === '--candles') { candles = next; i++; continue; }
    throw new Error(`Unknown argument: ${arg}`);
  }

  if (!subject) throw new Error('--token or --wallet is required');
  if (!Number.isFinite(hours) || hours <= 0) throw new Error('--hours must be a positive number');
  if (candles && subject.kind !== 'token') throw new Error('--candles only applies to --token');
  return { subject, from, to, hours, candles };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  validateConfig(config);
  const engine = createEngine(config);
  if (engine.providers.length === 0) {
    console.error('No providers configured; set a provider key in .env');
    process.exit(1);
  }

  const to = args.to ?? Math.floor(Date.now() / 1000);
  const from = args.from ?? Math.max(0, to - Math.round(args.hours * 3600));
  const result = await engine.sync(args.subject, { from, to });

  console.log(`\nSynced ${args.subject.kind} ${args.subject.address}`);
  console.log(`  window:   ${new Date(from * 1000).toISOString()} → ${new Date(to * 1000).toISOString()}`);
  console.log(`  fetched:  ${result.fetched}`);
  console.log(`  merged:   ${result.merged}`);
  console.log(`  ingested: ${result.ingested}`);
  for (const w of result.warnings) {
    if (w.kind === 'ProviderFailed') console.log(`  ! ${w.provider} failed (${w.reason}): ${w.message}`);
    if (w.kind === 'DataConflict') console.log(`  ! conflict on ${w.field} for ${w.provenanceId}, kept ${w.kept.source}`);
  }

  if (args.candles) {
    const series = await engine.getCandles(args.subject.address, args.candles, { from, to });
    console.log(`\n${series.candles.length} ${args.candles} candles`);
    for (const c of series.candles) {
      const flag = c.flatFilled ? ' (flat)' : '';
      console.log(`  ${new Date(c.bucketStart * 1000).toISOString()}  o=${c.open} h=${c.high} l=${c.low} c=${c.close} v=${c.volume}${flag}`);
    }
  }
}

main().catch(err => {
  if (isEngineError(err)) {
    console.error(`${err.kind}: ${err.message}`);
  } else {
    console.error('Fatal:', err);
  }
  process.exit(1);
});
