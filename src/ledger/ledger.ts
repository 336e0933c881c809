/**
 * Ledger — Append-Only Fill Record
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * The ledger is the source of truth for fill history. The position store is a
 * cache that can be rebuilt (approximately) by replaying it.
 *
 * RULES:
 * 1. Entries are validated on append and never mutated afterwards
 * 2. Append order is the ledger order; timestamps may be skewed
 * 3. A file-backed append is fsynced before append() resolves
 * 4. Queries are pure functions over the entries
 *
 * GREP-FRIENDLY LOGS:
 * - [LEDGER] load / append events
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { LedgerEntry, Side } from '../types';
import { decodeLedger, encodeLedgerEntry } from '../state/codec';
import { ValidationError } from '../state/errors';
import { LedgerEntrySchema, describeIssues } from '../state/schemas';
import { appendLineDurable, readTextIfExists } from '../storage/fileIo';
import { parseTimestamp } from '../utils/time';
import logger from '../utils/logger';

export interface LedgerEntryInput {
    timestamp?: string;
    code: string;
    strategy_id: string;
    side: Side;
    qty: number;
    price: number;
    meta?: Record<string, unknown>;
}

export interface LedgerLoadReport {
    /** File was absent; the ledger starts empty */
    missing: boolean;
    /** Lines that failed to parse or validate */
    skipped: number;
}

/**
 * Latest BUY for `code` by timestamp; among equal timestamps the later append wins.
 * Entries with unparseable timestamps rank below every parseable one.
 */
export function findLatestBuy(entries: Iterable<LedgerEntry>, code: string): LedgerEntry | null {
    let best: LedgerEntry | null = null;
    let bestMs = Number.NEGATIVE_INFINITY;

    for (const entry of entries) {
        if (entry.code !== code || entry.side !== 'BUY') {
            continue;
        }
        const ms = parseTimestamp(entry.timestamp) ?? Number.NEGATIVE_INFINITY;
        if (best === null || ms >= bestMs) {
            best = entry;
            bestMs = ms;
        }
    }

    return best;
}

export class Ledger {
    private readonly entries: LedgerEntry[];
    private readonly filePath: string | null;

    /**
     * @param filePath - JSONL file appends go to; null keeps the ledger in memory
     */
    constructor(filePath: string | null = null, entries: readonly LedgerEntry[] = []) {
        this.filePath = filePath;
        this.entries = [...entries];
    }

    /**
     * Load a JSONL ledger. A missing file or bad lines degrade to what could be read.
     */
    static async open(filePath: string): Promise<{ ledger: Ledger; report: LedgerLoadReport }> {
        const text = await readTextIfExists(filePath);
        if (text === null) {
            logger.warn(`[LEDGER] no ledger at ${filePath}, starting empty`);
            return { ledger: new Ledger(filePath), report: { missing: true, skipped: 0 } };
        }

        const { rows, skipped } = decodeLedger(text);
        if (skipped > 0) {
            logger.warn(`[LEDGER] skipped ${skipped} unreadable line(s) in ${filePath}`);
        }
        logger.info(`[LEDGER] loaded ${rows.length} entries from ${filePath}`);
        return { ledger: new Ledger(filePath, rows), report: { missing: false, skipped } };
    }

    get size(): number {
        return this.entries.length;
    }

    /**
     * @throws ValidationError when qty, price, code, side, strategy_id or timestamp is malformed
     */
    async append(input: LedgerEntryInput): Promise<LedgerEntry> {
        const result = LedgerEntrySchema.safeParse({
            ...input,
            timestamp: input.timestamp ?? new Date().toISOString(),
            meta: input.meta ?? {},
        });
        if (!result.success) {
            const issues = describeIssues(result.error);
            throw new ValidationError(`invalid ledger entry: ${issues.join('; ')}`, issues);
        }

        const entry: LedgerEntry = result.data;
        if (this.filePath) {
            await appendLineDurable(this.filePath, encodeLedgerEntry(entry));
        }
        this.entries.push(entry);

        logger.info(
            `[LEDGER] append ${entry.side} ${entry.code} qty=${entry.qty} price=${entry.price} sid=${entry.strategy_id}`
        );
        return entry;
    }

    findLatestBuy(code: string): LedgerEntry | null {
        return findLatestBuy(this.entries, code);
    }

    /**
     * Append-ordered, unfiltered. Each call starts over from the first entry.
     */
    *iterate(): Generator<LedgerEntry> {
        for (let i = 0; i < this.entries.length; i++) {
            yield this.entries[i];
        }
    }

    toArray(): LedgerEntry[] {
        return [...this.entries];
    }
}
