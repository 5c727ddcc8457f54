import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { makeTrade } from '../core';
import type { CanonicalTrade, DataConflict } from '../core';
import { createLogger } from '../utils';
import { MemoryTradeStore } from './trade-store';
import type { TradePreference } from './trade-store';

const log = createLogger('trade-store');

const providerSchema = z.enum(['birdeye', 'solscan', 'helius']);

const tradeLineSchema = z.object({
  chain: z.string(),
  tokenAddress: z.string().min(1),
  walletAddress: z.string(),
  side: z.enum(['buy', 'sell']),
  baseAmount: z.number().positive(),
  quoteAmount: z.number().nullable(),
  unitPrice: z.number().nullable(),
  timestamp: z.number().int().positive(),
  source: providerSchema,
  provenanceId: z.string().min(1),
});

const sourceValue = z.object({ source: providerSchema, value: z.number().nullable() });

const conflictLineSchema = z.object({
  kind: z.literal('DataConflict'),
  provenanceId: z.string(),
  tokenAddress: z.string(),
  field: z.enum(['unitPrice', 'baseAmount', 'quoteAmount']),
  timestamp: z.number(),
  kept: sourceValue,
  discarded: z.array(sourceValue),
});

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function readJsonl<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const out: T[] = [];
  let malformed = 0;
  const content = fs.readFileSync(filePath, 'utf-8');
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      malformed++;
      continue;
    }
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      out.push(parsed.data);
    } else {
      malformed++;
    }
  }
  if (malformed > 0) {
    log.warn('Skipped malformed JSONL lines', { file: filePath, malformed });
  }
  return out;
}

/**
 * Append-only JSONL persistence: `trades/<token>.jsonl` plus `conflicts.jsonl`
 * under the data directory. The in-memory index is rebuilt from disk on open; a
 * superseding record is appended as a new line and wins again on replay.
 */
export class JsonlTradeStore extends MemoryTradeStore {
  private readonly tradesDir: string;
  private readonly conflictsPath: string;

  constructor(
    private readonly dataDir: string,
    preference?: TradePreference,
  ) {
    super(preference);
    this.tradesDir = path.join(dataDir, 'trades');
    this.conflictsPath = path.join(dataDir, 'conflicts.jsonl');
    this.restore();
  }

  private restore() {
    if (fs.existsSync(this.tradesDir)) {
      const files = fs.readdirSync(this.tradesDir).filter(f => f.endsWith('.jsonl')).sort();
      for (const file of files) {
        const lines = readJsonl(path.join(this.tradesDir, file), tradeLineSchema);
        this.index(lines.map(l => makeTrade(l)));
      }
    }
    if (fs.existsSync(this.conflictsPath)) {
      this.indexConflicts(readJsonl(this.conflictsPath, conflictLineSchema));
    }
    log.info('Trade store opened', { dir: this.dataDir, trades: this.size, conflicts: this.conflicts.size });
  }

  async append(trades: readonly CanonicalTrade[]): Promise<CanonicalTrade[]> {
    const added = this.index(trades);
    if (added.length === 0) return added;

    ensureDir(this.tradesDir);
    const byToken = new Map<string, CanonicalTrade[]>();
    for (const trade of added) {
      const list = byToken.get(trade.tokenAddress);
      if (list) {
        list.push(trade);
      } else {
        byToken.set(trade.tokenAddress, [trade]);
      }
    }
    for (const [token, list] of byToken) {
      const lines = list.map(t => JSON.stringify(t)).join('\n') + '\n';
      fs.appendFileSync(path.join(this.tradesDir, `${token}.jsonl`), lines);
    }
    log.debug('Trades persisted', { added: added.length, tokens: byToken.size });
    return added;
  }

  async appendConflicts(conflicts: readonly DataConflict[]): Promise<void> {
    const added = this.indexConflicts(conflicts);
    if (added.length === 0) return;
    ensureDir(this.dataDir);
    fs.appendFileSync(this.conflictsPath, added.map(c => JSON.stringify(c)).join('\n') + '\n');
  }
}
