/**
 * Reconciler — Broker Balance → Position Store
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * The broker is authoritative for WHAT is held (qty, cost basis). It never
 * reports WHO opened it; attribution is ours to keep or recover.
 *
 * PER CODE:
 * 1. held by broker, unknown locally  → new lot, attribution recovered
 * 2. known locally, gone at broker    → all lots of the code deleted
 * 3. both                             → broker qty/avg_price, everything else kept
 * 4. touched codes                    → memory.last_price / last_seen / last_strategy_id
 * 5. updated_at bumped, schema_version untouched
 *
 * RECOVERY PRIORITY (fixed, decreasing confidence):
 *   ledger latest BUY → today's rebalance bucket → [memory hint, opt-in] → MANUAL
 *
 * GUARANTEES:
 * - codes with qty > 0 afterwards == broker codes with qty > 0
 * - every lot has an explicit sid
 * - the input snapshot is never mutated; a failed cycle leaves nothing half-applied
 *
 * GREP-FRIENDLY LOGS:
 * - [RECONCILE] created / updated / removed / skipped
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import {
    Attribution,
    BrokerBalance,
    BrokerClient,
    BrokerHolding,
    LedgerEntry,
    PositionLot,
    PositionStoreSnapshot,
    RecoverySource,
} from '../types';
import {
    MANUAL_ATTRIBUTION,
    formatSid,
    normalizeCode,
    parseSid,
    rebalanceAttribution,
} from '../state/codes';
import { SourceUnavailableError } from '../state/errors';
import { PositionStore } from '../positions/positionStore';
import { marketDateStamp } from '../utils/time';
import logger from '../utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** The only ledger query recovery needs. */
export interface LedgerLookup {
    findLatestBuy(code: string): LedgerEntry | null;
}

export interface ReconcileOptions {
    /** Engine for a ledger-recovered lot whose entry has no meta.engine */
    defaultEngine: string;
    /** Try memory.last_strategy_id before MANUAL */
    useMemoryHint: boolean;
}

export interface ReconcileInput {
    positions: PositionStoreSnapshot;
    balance: BrokerBalance;
    /** Today's rebalance targets; empty when there is no rebalance */
    rebalanceTargets: ReadonlySet<string>;
    /** null when the ledger is missing or unreadable */
    ledger: LedgerLookup | null;
    now: Date;
    options?: Partial<ReconcileOptions>;
}

export interface RecoveredAttribution {
    attribution: Attribution;
    engine: string;
    source: RecoverySource;
}

export interface SkippedHolding {
    code: string;
    reason: string;
}

export interface ReconcileReport {
    created: { code: string; sid: string; source: RecoverySource }[];
    updated: string[];
    removed: { code: string; sids: string[] }[];
    skipped: SkippedHolding[];
    recoveryStats: Record<RecoverySource, number>;
}

export interface ReconcileResult {
    positions: PositionStoreSnapshot;
    report: ReconcileReport;
}

export const DEFAULT_RECONCILE_OPTIONS: ReconcileOptions = {
    defaultEngine: 'unknown',
    useMemoryHint: false,
};

export const REBALANCE_ENGINE = 'rebalance';
export const MANUAL_ENGINE = 'manual';

// ═══════════════════════════════════════════════════════════════════════════════
// BALANCE VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

interface NormalizedBalance {
    /** Valid holdings with qty > 0 */
    held: Map<string, BrokerHolding>;
    /** Codes the broker reported but we could not read; their lots are left alone */
    unreadable: Set<string>;
    skipped: SkippedHolding[];
}

function holdingProblem(holding: BrokerHolding): string | null {
    const { qty, avg_price } = holding;
    if (typeof qty !== 'number' || !Number.isInteger(qty) || qty < 0) {
        return `qty=${String(qty)} is not a non-negative integer`;
    }
    if (qty === 0) {
        return null;
    }
    if (typeof avg_price !== 'number' || !Number.isFinite(avg_price) || avg_price <= 0) {
        return `avg_price=${String(avg_price)} is not positive`;
    }
    return null;
}

/**
 * Malformed rows are skipped with a warning, never fatal. Rows that normalize
 * to the same code are merged at their weighted average price.
 */
export function normalizeBalance(balance: BrokerBalance): NormalizedBalance {
    const held = new Map<string, BrokerHolding>();
    const unreadable = new Set<string>();
    const skipped: SkippedHolding[] = [];

    for (const [rawCode, holding] of Object.entries(balance)) {
        const code = normalizeCode(rawCode);
        if (!code) {
            skipped.push({ code: rawCode, reason: 'unrecognized code' });
            continue;
        }
        if (holding === null || typeof holding !== 'object') {
            skipped.push({ code, reason: 'holding is not an object' });
            unreadable.add(code);
            continue;
        }
        const problem = holdingProblem(holding);
        if (problem) {
            skipped.push({ code, reason: problem });
            unreadable.add(code);
            continue;
        }
        if (holding.qty === 0) {
            continue;
        }

        const previous = held.get(code);
        if (!previous) {
            held.set(code, { qty: holding.qty, avg_price: holding.avg_price });
            continue;
        }
        const qty = previous.qty + holding.qty;
        const cost = new BigNumber(previous.avg_price).times(previous.qty).plus(new BigNumber(holding.avg_price).times(holding.qty));
        held.set(code, { qty, avg_price: cost.div(qty).decimalPlaces(4).toNumber() });
    }

    for (const item of skipped) {
        logger.warn(`[RECONCILE] skipped broker row ${item.code}: ${item.reason}`);
    }
    return { held, unreadable, skipped };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ATTRIBUTION RECOVERY — PURE
// ═══════════════════════════════════════════════════════════════════════════════

function engineFrom(entry: LedgerEntry, defaultEngine: string): string {
    const engine = entry.meta.engine;
    return typeof engine === 'string' && engine.trim() !== '' ? engine : defaultEngine;
}

/**
 * Decide who owns an untracked holding. The ladder order is fixed.
 */
export function recoverAttribution(
    code: string,
    context: {
        ledger: LedgerLookup | null;
        rebalanceTargets: ReadonlySet<string>;
        memory: PositionStoreSnapshot['memory'];
        now: Date;
        options: ReconcileOptions;
    }
): RecoveredAttribution {
    const latestBuy = context.ledger?.findLatestBuy(code) ?? null;
    if (latestBuy) {
        const attribution = parseSid(latestBuy.strategy_id);
        if (attribution) {
            return { attribution, engine: engineFrom(latestBuy, context.options.defaultEngine), source: 'ledger' };
        }
    }

    if (context.rebalanceTargets.has(code)) {
        return {
            attribution: rebalanceAttribution(marketDateStamp(context.now)),
            engine: REBALANCE_ENGINE,
            source: 'rebalance',
        };
    }

    if (context.options.useMemoryHint) {
        const remembered = parseSid(context.memory.last_strategy_id[code]);
        if (remembered && remembered.kind === 'strategy') {
            return { attribution: remembered, engine: context.options.defaultEngine, source: 'memory' };
        }
    }

    return { attribution: MANUAL_ATTRIBUTION, engine: MANUAL_ENGINE, source: 'manual' };
}

// ═══════════════════════════════════════════════════════════════════════════════
// QTY DISTRIBUTION ACROSS CO-HELD LOTS
// ═══════════════════════════════════════════════════════════════════════════════

function newestFirst(lots: PositionLot[]): PositionLot[] {
    return [...lots].sort((a, b) => b.entry_ts.localeCompare(a.entry_ts) || b.sid.localeCompare(a.sid));
}

/**
 * Target qty per lot for a code held by several strategies.
 *
 * - broker holds less: the newest lots give up qty first (LIFO)
 * - broker holds more: the surplus goes to the lot the ledger's latest BUY
 *   names, else to the newest lot
 */
export function distributeQty(lots: PositionLot[], brokerQty: number, latestBuySid: string | null): Map<string, number> {
    const targets = new Map<string, number>(lots.map((lot) => [lot.sid, lot.qty]));
    const tracked = lots.reduce((sum, lot) => sum + lot.qty, 0);
    const ordered = newestFirst(lots);

    if (brokerQty < tracked) {
        let excess = tracked - brokerQty;
        for (const lot of ordered) {
            if (excess <= 0) {
                break;
            }
            const take = Math.min(lot.qty, excess);
            targets.set(lot.sid, lot.qty - take);
            excess -= take;
        }
    } else if (brokerQty > tracked) {
        const receiver = lots.find((lot) => lot.sid === latestBuySid) ?? ordered[0];
        targets.set(receiver.sid, receiver.qty + (brokerQty - tracked));
    }

    return targets;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECONCILIATION
// ═══════════════════════════════════════════════════════════════════════════════

function emptyStats(): Record<RecoverySource, number> {
    return { ledger: 0, rebalance: 0, memory: 0, manual: 0 };
}

/**
 * One reconciliation pass. Pure: works on a copy of `input.positions`.
 */
export function reconcile(input: ReconcileInput): ReconcileResult {
    const options: ReconcileOptions = { ...DEFAULT_RECONCILE_OPTIONS, ...input.options };
    const { now } = input;
    const store = new PositionStore(input.positions);
    const { held, unreadable, skipped } = normalizeBalance(input.balance);
    const rebalanceTargets = new Set([...input.rebalanceTargets].map(normalizeCode));

    const report: ReconcileReport = {
        created: [],
        updated: [],
        removed: [],
        skipped,
        recoveryStats: emptyStats(),
    };

    const allCodes = [...new Set([...held.keys(), ...store.codes()])].sort();

    for (const code of allCodes) {
        const holding = held.get(code);
        const lots = store.lotsForCode(code);

        // ── Step 1: new holding ────────────────────────────────────────────────
        if (holding && lots.length === 0) {
            const recovered = recoverAttribution(code, {
                ledger: input.ledger,
                rebalanceTargets,
                memory: store.memory,
                now,
                options,
            });
            const lot = store.openLot({
                code,
                attribution: recovered.attribution,
                engine: recovered.engine,
                qty: holding.qty,
                avgPrice: holding.avg_price,
                at: now,
            });
            store.remember(code, { price: holding.avg_price, seenAt: now, sid: lot.sid });
            report.created.push({ code, sid: lot.sid, source: recovered.source });
            report.recoveryStats[recovered.source]++;
            logger.info(`[RECONCILE] created ${code} sid=${lot.sid} qty=${lot.qty} source=${recovered.source}`);
            continue;
        }

        // ── Step 2: gone at the broker ─────────────────────────────────────────
        if (!holding) {
            if (unreadable.has(code)) {
                logger.warn(`[RECONCILE] kept ${code}: broker row unreadable this cycle`);
                continue;
            }
            const removed = store.removeCode(code);
            const largest = removed.reduce((a, b) => (b.qty > a.qty ? b : a));
            store.remember(code, { seenAt: now, sid: largest.sid });
            report.removed.push({ code, sids: removed.map((lot) => lot.sid) });
            logger.info(`[RECONCILE] removed ${code} sids=${removed.map((lot) => lot.sid).join(',')}`);
            continue;
        }

        // ── Step 3: held on both sides ─────────────────────────────────────────
        let changed = false;
        if (lots.length === 1) {
            changed = store.adjustLot(code, lots[0].sid, holding.qty, holding.avg_price, now);
        } else {
            // Ledger ids are raw text; lot sids went through parseSid().
            const latestBuy = parseSid(input.ledger?.findLatestBuy(code)?.strategy_id);
            const latestSid = latestBuy ? formatSid(latestBuy) : null;
            const targets = distributeQty(lots, holding.qty, latestSid);
            for (const lot of lots) {
                const target = targets.get(lot.sid) ?? lot.qty;
                changed = store.adjustLot(code, lot.sid, target, holding.avg_price, now) || changed;
            }
        }

        if (changed) {
            const newest = newestFirst(store.lotsForCode(code))[0];
            store.remember(code, { price: holding.avg_price, seenAt: now, sid: newest.sid });
            report.updated.push(code);
            logger.info(`[RECONCILE] updated ${code} qty=${holding.qty} avg_price=${holding.avg_price}`);
        }
    }

    store.touch(now);

    logger.info(
        `[RECONCILE] done created=${report.created.length} updated=${report.updated.length} ` +
        `removed=${report.removed.length} skipped=${report.skipped.length}`
    );
    return { positions: store.toSnapshot(), report };
}

/**
 * Fetch the balance and reconcile. A failed fetch aborts the cycle; it is never
 * read as "nothing held".
 *
 * @throws SourceUnavailableError
 */
export async function reconcileWithBroker(
    broker: BrokerClient,
    input: Omit<ReconcileInput, 'balance'>
): Promise<ReconcileResult> {
    let balance: BrokerBalance;
    try {
        balance = await broker.getBalance();
    } catch (err: unknown) {
        logger.error(`[RECONCILE] broker balance unavailable, cycle aborted`);
        throw new SourceUnavailableError('broker balance', err);
    }
    return reconcile({ ...input, balance });
}
