// Type Definitions for the trade state layer

// ═══════════════════════════════════════════════════════════════════════════════
// LEDGER
// ═══════════════════════════════════════════════════════════════════════════════

export type Side = 'BUY' | 'SELL';

/**
 * One confirmed fill. Immutable once appended; append order is the ledger order.
 */
export interface LedgerEntry {
    timestamp: string;
    code: string;
    strategy_id: string;
    side: Side;
    qty: number;
    price: number;
    meta: Record<string, unknown>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ATTRIBUTION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Who owns a lot. The persisted `sid` string is always derived from one of these.
 */
export type Attribution =
    | { kind: 'strategy'; id: string }
    | { kind: 'rebalance'; date: string }   // YYYYMMDD
    | { kind: 'manual' };

export type RecoverySource = 'ledger' | 'rebalance' | 'memory' | 'manual';

// ═══════════════════════════════════════════════════════════════════════════════
// POSITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type LotFlags = Record<string, boolean | number>;

export interface PositionLot {
    code: string;
    sid: string;
    engine: string;
    qty: number;
    avg_price: number;
    entry_ts: string;
    high_watermark: number;
    flags: LotFlags;
    last_update_ts: string;
}

export interface PositionMemory {
    last_price: Record<string, number>;
    last_seen: Record<string, string>;
    last_strategy_id: Record<string, string>;
}

export interface PositionStoreSnapshot {
    schema_version: number;
    updated_at: string | null;
    positions: Record<string, PositionLot>;
    memory: PositionMemory;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTENTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface IntentRecord {
    intent_id: string;
    ts: string;
    strategy_id: string;
    code: string;
    side: Side;
    qty_hint: number;
    rationale: string;
}

export interface IntentCursor {
    offset: number;
    last_intent_id: string | null;
    last_ts: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BROKER (external collaborator)
// ═══════════════════════════════════════════════════════════════════════════════

export interface BrokerHolding {
    qty: number;
    avg_price: number;
}

/** code → holding, as reported by the broker. Authoritative for qty and cost basis. */
export type BrokerBalance = Record<string, BrokerHolding>;

export interface BrokerClient {
    getBalance(): Promise<BrokerBalance>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SNAPSHOT
// ═══════════════════════════════════════════════════════════════════════════════

export interface DiagnosticDump {
    name: string;
    created_at: string;
    payload: Record<string, unknown>;
}

export interface ManifestFile {
    path: string;
    size: number;
}

export interface SnapshotManifest {
    schema_version: number;
    snapshot_version: number;
    updated_at: string;
    run_id: string;
    commit_sha: string;
    content_digest: string;
    counts: {
        n_lots: number;
        n_unknown: number;
        n_manual: number;
    };
    files: ManifestFile[];
    recovery_stats: Record<string, number>;
}

/**
 * Pointer to the visible snapshot in a storage namespace.
 */
export interface SnapshotHead {
    version: number;
    updated_at: string;
}
