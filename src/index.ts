/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS — PUBLIC SURFACE OF THE STATE LAYER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * RULES:
 * 1. NO runtime logic at import time
 * 2. The scheduler calls runStateCycle(); strategies get PositionStore/IntentLog
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export * from './types';
export * from './state/errors';
export {
    MANUAL_ATTRIBUTION,
    MANUAL_SID,
    REBALANCE_PREFIX,
    formatSid,
    isPlaceholderSid,
    isValidCode,
    lotKey,
    normalizeCode,
    parseSid,
    rebalanceAttribution,
    strategyAttribution,
} from './state/codes';

export { Ledger, LedgerEntryInput, LedgerLoadReport, findLatestBuy } from './ledger/ledger';
export { ReplayedHolding, replayLedger } from './ledger/replay';
export { IntentInput, IntentLog, dedupeIntents, loadCursor, saveCursor } from './intents/intentLog';
export { BuyFillInput, OpenLotInput, PositionStore, SellFillInput, SellFillResult } from './positions/positionStore';
export {
    LedgerLookup,
    ReconcileInput,
    ReconcileOptions,
    ReconcileReport,
    ReconcileResult,
    reconcile,
    reconcileWithBroker,
    recoverAttribution,
} from './reconcile/reconciler';

export { SnapshotBackend } from './snapshot/backend';
export { FileSnapshotBackend } from './snapshot/fileBackend';
export { SupabaseSnapshotBackend } from './snapshot/supabaseBackend';
export { createSnapshotBackend } from './snapshot/createBackend';
export { PersistResult, RestoredSnapshot, SnapshotBase, SnapshotBundle, SnapshotTransport } from './snapshot/transport';
export {
    BASE_FILE,
    WorkingCopyPaths,
    collectWorkingCopy,
    commitWorkingCopy,
    materializeWorkingCopy,
    readWorkingCopy,
    workingCopyPaths,
} from './snapshot/workingCopy';

export { StateCycleInput, StateCycleResult, StrategyContext, runStateCycle } from './runtime/stateCycle';
export { StateConfig, loadStateConfig } from './config/stateConfig';
