/**
 * Codec for the persisted state formats.
 *
 * Encoders write fields in a fixed order and sort map keys, so the same state
 * always produces the same bytes. Snapshot change detection depends on that.
 *
 * Decoders:
 * - ledger / intents: bad lines are skipped and counted, an empty ledger is a safe default
 * - positions / cursor: any violation throws StateCorruptionError
 */

import { z } from 'zod';
import {
    DiagnosticDump,
    IntentCursor,
    IntentRecord,
    LedgerEntry,
    PositionLot,
    PositionMemory,
    PositionStoreSnapshot,
    SnapshotManifest,
} from '../types';
import { lotKey } from './codes';
import { StateCorruptionError } from './errors';
import {
    DiagnosticDumpSchema,
    IntentCursorSchema,
    IntentRecordSchema,
    LedgerEntrySchema,
    PositionStoreSchema,
    SnapshotManifestSchema,
    describeIssues,
} from './schemas';

export const POSITION_SCHEMA_VERSION = 1;

export interface DecodedLines<T> {
    rows: T[];
    skipped: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export function emptyPositionState(): PositionStoreSnapshot {
    return {
        schema_version: POSITION_SCHEMA_VERSION,
        updated_at: null,
        positions: {},
        memory: { last_price: {}, last_seen: {}, last_strategy_id: {} },
    };
}

export function initialCursor(): IntentCursor {
    return { offset: 0, last_intent_id: null, last_ts: null };
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function sortedRecord<T>(record: Record<string, T>): Record<string, T> {
    const out: Record<string, T> = {};
    for (const key of Object.keys(record).sort()) {
        out[key] = record[key];
    }
    return out;
}

function parseJson(text: string, file: string): unknown {
    try {
        return JSON.parse(text);
    } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new StateCorruptionError(file, [`invalid JSON: ${reason}`]);
    }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, text: string, file: string): z.output<S> {
    const result = schema.safeParse(parseJson(text, file));
    if (!result.success) {
        throw new StateCorruptionError(file, describeIssues(result.error));
    }
    return result.data;
}

function decodeLines<S extends z.ZodTypeAny>(schema: S, text: string): DecodedLines<z.output<S>> {
    const rows: z.output<S>[] = [];
    let skipped = 0;
    for (const line of text.split('\n')) {
        const trimmed = line.trim();
        if (!trimmed) {
            continue;
        }
        let raw: unknown;
        try {
            raw = JSON.parse(trimmed);
        } catch {
            skipped++;
            continue;
        }
        const result = schema.safeParse(raw);
        if (result.success) {
            rows.push(result.data);
        } else {
            skipped++;
        }
    }
    return { rows, skipped };
}

function encodeLines<T>(rows: readonly T[], encode: (row: T) => string): string {
    return rows.map((row) => `${encode(row)}\n`).join('');
}

// ═══════════════════════════════════════════════════════════════════════════════
// LEDGER (JSONL)
// ═══════════════════════════════════════════════════════════════════════════════

export function encodeLedgerEntry(entry: LedgerEntry): string {
    return JSON.stringify({
        timestamp: entry.timestamp,
        code: entry.code,
        strategy_id: entry.strategy_id,
        side: entry.side,
        qty: entry.qty,
        price: entry.price,
        meta: entry.meta,
    });
}

export function encodeLedger(entries: readonly LedgerEntry[]): string {
    return encodeLines(entries, encodeLedgerEntry);
}

export function decodeLedger(text: string): DecodedLines<LedgerEntry> {
    return decodeLines(LedgerEntrySchema, text);
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTENTS (JSONL) + CURSOR (JSON)
// ═══════════════════════════════════════════════════════════════════════════════

export function encodeIntent(record: IntentRecord): string {
    return JSON.stringify({
        intent_id: record.intent_id,
        ts: record.ts,
        strategy_id: record.strategy_id,
        code: record.code,
        side: record.side,
        qty_hint: record.qty_hint,
        rationale: record.rationale,
    });
}

export function encodeIntents(records: readonly IntentRecord[]): string {
    return encodeLines(records, encodeIntent);
}

export function decodeIntents(text: string): DecodedLines<IntentRecord> {
    return decodeLines(IntentRecordSchema, text);
}

export function encodeCursor(cursor: IntentCursor): string {
    return `${JSON.stringify(
        {
            offset: cursor.offset,
            last_intent_id: cursor.last_intent_id,
            last_ts: cursor.last_ts,
        },
        null,
        2
    )}\n`;
}

export function decodeCursor(text: string, file: string): IntentCursor {
    return parseWith(IntentCursorSchema, text, file);
}

// ═══════════════════════════════════════════════════════════════════════════════
// POSITION STORE (JSON)
// ═══════════════════════════════════════════════════════════════════════════════

function canonicalLot(lot: PositionLot): PositionLot {
    return {
        code: lot.code,
        sid: lot.sid,
        engine: lot.engine,
        qty: lot.qty,
        avg_price: lot.avg_price,
        entry_ts: lot.entry_ts,
        high_watermark: lot.high_watermark,
        flags: sortedRecord(lot.flags),
        last_update_ts: lot.last_update_ts,
    };
}

function canonicalMemory(memory: PositionMemory): PositionMemory {
    return {
        last_price: sortedRecord(memory.last_price),
        last_seen: sortedRecord(memory.last_seen),
        last_strategy_id: sortedRecord(memory.last_strategy_id),
    };
}

export function encodePositionState(state: PositionStoreSnapshot): string {
    const positions: Record<string, PositionLot> = {};
    for (const key of Object.keys(state.positions).sort()) {
        positions[key] = canonicalLot(state.positions[key]);
    }
    return `${JSON.stringify(
        {
            schema_version: state.schema_version,
            updated_at: state.updated_at,
            positions,
            memory: canonicalMemory(state.memory),
        },
        null,
        2
    )}\n`;
}

/**
 * Accepts lots keyed by `code` (older files) or `code:sid`; always returns `code:sid` keys.
 */
export function decodePositionState(text: string, file: string): PositionStoreSnapshot {
    const parsed = parseWith(PositionStoreSchema, text, file);

    const positions: Record<string, PositionLot> = {};
    const issues: string[] = [];
    for (const [key, lot] of Object.entries(parsed.positions)) {
        const canonicalKey = lotKey(lot.code, lot.sid);
        if (key !== canonicalKey && key !== lot.code) {
            issues.push(`positions.${key}: key does not match lot ${canonicalKey}`);
            continue;
        }
        if (positions[canonicalKey]) {
            issues.push(`positions.${key}: duplicate lot ${canonicalKey}`);
            continue;
        }
        positions[canonicalKey] = lot;
    }
    if (issues.length > 0) {
        throw new StateCorruptionError(file, issues);
    }

    return {
        schema_version: parsed.schema_version,
        updated_at: parsed.updated_at,
        positions,
        memory: parsed.memory,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS + MANIFEST
// ═══════════════════════════════════════════════════════════════════════════════

export function encodeDiagnostic(dump: DiagnosticDump): string {
    return `${JSON.stringify({ name: dump.name, created_at: dump.created_at, payload: dump.payload }, null, 2)}\n`;
}

export function decodeDiagnostic(text: string, file: string): DiagnosticDump {
    return parseWith(DiagnosticDumpSchema, text, file);
}

export function encodeManifest(manifest: SnapshotManifest): string {
    return `${JSON.stringify(manifest, null, 2)}\n`;
}

export function decodeManifest(text: string, file: string): SnapshotManifest {
    return parseWith(SnapshotManifestSchema, text, file);
}
