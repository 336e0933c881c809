/**
 * Intent Log — strategy order intents, decoupled from execution.
 *
 * The log is append-only. Consumer progress lives in a separate cursor
 * ({offset, last_intent_id, last_ts}); advance() is the only way to move it.
 *
 * Consumption is at-most-once per record: advance once per record acted upon.
 * A crash between acting and advancing replays the record on the next run, so
 * the downstream action has to be idempotent.
 */

import { IntentCursor, IntentRecord, Side } from '../types';
import { decodeCursor, decodeIntents, encodeCursor, encodeIntent, initialCursor } from '../state/codec';
import { ValidationError } from '../state/errors';
import { IntentRecordSchema, describeIssues } from '../state/schemas';
import { appendLineDurable, atomicWriteFile, readTextIfExists } from '../storage/fileIo';
import { generateIntentId } from '../utils/id';
import logger from '../utils/logger';

export interface IntentInput {
    intent_id?: string;
    ts?: string;
    strategy_id: string;
    code: string;
    side: Side;
    qty_hint: number;
    rationale: string;
}

/**
 * Drop repeated intent_ids, keeping the first occurrence.
 */
export function dedupeIntents(records: Iterable<IntentRecord>): IntentRecord[] {
    const seen = new Set<string>();
    const out: IntentRecord[] = [];
    for (const record of records) {
        if (seen.has(record.intent_id)) {
            continue;
        }
        seen.add(record.intent_id);
        out.push(record);
    }
    return out;
}

export class IntentLog {
    private readonly records: IntentRecord[];
    private readonly filePath: string | null;

    constructor(filePath: string | null = null, records: readonly IntentRecord[] = []) {
        this.filePath = filePath;
        this.records = [...records];
    }

    static async open(filePath: string): Promise<IntentLog> {
        const text = await readTextIfExists(filePath);
        if (text === null) {
            return new IntentLog(filePath);
        }
        const { rows, skipped } = decodeIntents(text);
        if (skipped > 0) {
            logger.warn(`[INTENT] skipped ${skipped} invalid intent line(s) in ${filePath}`);
        }
        return new IntentLog(filePath, rows);
    }

    get size(): number {
        return this.records.length;
    }

    /**
     * @throws ValidationError on a missing or malformed field
     */
    async append(input: IntentInput): Promise<IntentRecord> {
        const result = IntentRecordSchema.safeParse({
            ...input,
            intent_id: input.intent_id ?? generateIntentId(),
            ts: input.ts ?? new Date().toISOString(),
        });
        if (!result.success) {
            const issues = describeIssues(result.error);
            throw new ValidationError(`invalid intent: ${issues.join('; ')}`, issues);
        }

        const record: IntentRecord = result.data;
        if (this.filePath) {
            await appendLineDurable(this.filePath, encodeIntent(record));
        }
        this.records.push(record);
        logger.info(`[INTENT] append ${record.intent_id} ${record.side} ${record.code} sid=${record.strategy_id}`);
        return record;
    }

    /**
     * Index of the first record after the cursor. `last_intent_id` wins over
     * `offset` when it is still in the log.
     */
    private startIndex(cursor: IntentCursor): number {
        if (cursor.last_intent_id !== null) {
            for (let i = this.records.length - 1; i >= 0; i--) {
                if (this.records[i].intent_id === cursor.last_intent_id) {
                    return i + 1;
                }
            }
        }
        return Math.min(cursor.offset, this.records.length);
    }

    /**
     * Records strictly after the cursor, append order, repeated intent_ids skipped.
     * Each call starts over from the cursor.
     */
    *readSince(cursor: IntentCursor): Generator<IntentRecord> {
        const start = this.startIndex(cursor);
        const seen = new Set<string>();
        for (let i = 0; i < start; i++) {
            seen.add(this.records[i].intent_id);
        }
        for (let i = start; i < this.records.length; i++) {
            const record = this.records[i];
            if (seen.has(record.intent_id)) {
                continue;
            }
            seen.add(record.intent_id);
            yield record;
        }
    }

    /**
     * Move the cursor past `lastProcessed`.
     *
     * @throws ValidationError when the record is not after the cursor
     */
    advance(cursor: IntentCursor, lastProcessed: IntentRecord): IntentCursor {
        const start = this.startIndex(cursor);
        for (let i = start; i < this.records.length; i++) {
            if (this.records[i].intent_id === lastProcessed.intent_id) {
                return {
                    offset: i + 1,
                    last_intent_id: lastProcessed.intent_id,
                    last_ts: lastProcessed.ts,
                };
            }
        }
        throw new ValidationError(`intent ${lastProcessed.intent_id} is not after the cursor`, [
            `cursor.offset=${cursor.offset}`,
        ]);
    }

    toArray(): IntentRecord[] {
        return [...this.records];
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CURSOR FILE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Missing file → offset 0. A corrupt file throws rather than replaying the whole log.
 */
export async function loadCursor(filePath: string): Promise<IntentCursor> {
    const text = await readTextIfExists(filePath);
    if (text === null) {
        return initialCursor();
    }
    return decodeCursor(text, filePath);
}

export async function saveCursor(filePath: string, cursor: IntentCursor): Promise<void> {
    await atomicWriteFile(filePath, encodeCursor(cursor));
}
