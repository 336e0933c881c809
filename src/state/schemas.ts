/**
 * Schemas for every persisted format. Used on append (ValidationError) and on
 * read (StateCorruptionError).
 */

import { z } from 'zod';
import { isPlaceholderSid, isValidCode } from './codes';
import { parseTimestamp } from '../utils/time';

const timestamp = z.string().refine((value) => parseTimestamp(value) !== null, {
    message: 'not an ISO-8601 timestamp',
});

const code = z.string().refine(isValidCode, { message: 'code must be 6 digits' });

const ownerId = z.string().refine((value) => !isPlaceholderSid(value), {
    message: 'strategy id is empty or a placeholder',
});

export const SideSchema = z.enum(['BUY', 'SELL']);

export const LedgerEntrySchema = z.object({
    timestamp,
    code,
    strategy_id: ownerId,
    side: SideSchema,
    qty: z.number().int().positive(),
    price: z.number().finite().positive(),
    meta: z.record(z.unknown()).default({}),
});

export const PositionLotSchema = z.object({
    code,
    sid: ownerId,
    engine: z.string().min(1),
    qty: z.number().int().positive(),
    avg_price: z.number().finite().positive(),
    entry_ts: timestamp,
    high_watermark: z.number().finite().nonnegative(),
    flags: z.record(z.union([z.boolean(), z.number()])).default({}),
    last_update_ts: timestamp,
});

export const PositionMemorySchema = z.object({
    last_price: z.record(z.number()).default({}),
    last_seen: z.record(z.string()).default({}),
    last_strategy_id: z.record(z.string()).default({}),
});

export const PositionStoreSchema = z.object({
    schema_version: z.number().int().nonnegative(),
    updated_at: z.string().nullable().default(null),
    positions: z.record(PositionLotSchema).default({}),
    memory: PositionMemorySchema.default({}),
});

export const IntentRecordSchema = z.object({
    intent_id: z.string().min(1),
    ts: timestamp,
    strategy_id: ownerId,
    code,
    side: SideSchema,
    qty_hint: z.number().int().nonnegative(),
    rationale: z.string(),
});

export const IntentCursorSchema = z.object({
    offset: z.number().int().nonnegative(),
    last_intent_id: z.string().nullable().default(null),
    last_ts: z.string().nullable().default(null),
});

export const DiagnosticDumpSchema = z.object({
    name: z.string().min(1),
    created_at: timestamp,
    payload: z.record(z.unknown()),
});

export const SnapshotManifestSchema = z.object({
    schema_version: z.number().int(),
    snapshot_version: z.number().int().nonnegative(),
    updated_at: z.string(),
    run_id: z.string(),
    commit_sha: z.string(),
    content_digest: z.string(),
    counts: z.object({
        n_lots: z.number().int(),
        n_unknown: z.number().int(),
        n_manual: z.number().int(),
    }),
    files: z.array(z.object({ path: z.string(), size: z.number().int() })),
    recovery_stats: z.record(z.number()).default({}),
});

export function describeIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
}
