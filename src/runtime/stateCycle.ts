/**
 * State Cycle — one scheduled run of the state layer
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * restore → working copy → broker balance → reconcile → strategy hook →
 * diagnostic dump → persist
 *
 * The strategy layer works on the files of the working copy (STATE_DIR), so a
 * ledger append is on disk before it resolves. A cycle that dies before
 * persist, or loses to a ConflictError, leaves its fills in STATE_DIR:
 * - same base as the namespace HEAD → the next cycle resumes from the copy
 * - HEAD moved past the base → the next cycle refuses with ConflictError
 *   until an operator merges or discards the copy
 *
 * A ConflictError from persist is surfaced, not retried.
 *
 * GREP-FRIENDLY LOGS:
 * - [STATE-CYCLE] start / resume / done
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import path from 'path';
import { BrokerClient, DiagnosticDump, IntentCursor } from '../types';
import { encodeDiagnostic } from '../state/codec';
import { ConflictError } from '../state/errors';
import { Ledger } from '../ledger/ledger';
import { IntentLog, loadCursor, saveCursor } from '../intents/intentLog';
import { PositionStore } from '../positions/positionStore';
import { ReconcileOptions, ReconcileReport, reconcileWithBroker } from '../reconcile/reconciler';
import { diagnosticPath } from '../snapshot/blobs';
import { PersistResult, SnapshotTransport } from '../snapshot/transport';
import {
    collectWorkingCopy,
    commitWorkingCopy,
    materializeWorkingCopy,
    readWorkingCopy,
    workingCopyPaths,
} from '../snapshot/workingCopy';
import { atomicWriteFile } from '../storage/fileIo';
import { marketTimeStamp } from '../utils/time';
import logger from '../utils/logger';

/**
 * What the strategy layer gets during a cycle. Advance `cursor` as intents are
 * acted upon; the final value is persisted.
 */
export interface StrategyContext {
    positions: PositionStore;
    ledger: Ledger;
    intents: IntentLog;
    cursor: IntentCursor;
    now: Date;
}

export interface StateCycleInput {
    transport: SnapshotTransport;
    broker: BrokerClient;
    /** Working copy directory (STATE_DIR) */
    stateDir: string;
    /** Today's rebalance targets, supplied by the scheduler */
    rebalanceTargets?: ReadonlySet<string>;
    reconcileOptions?: Partial<ReconcileOptions>;
    strategy?: (context: StrategyContext) => Promise<void>;
    /** Write a diag_<stamp> dump with the reconcile report (default true) */
    dumpDiagnostics?: boolean;
    now?: () => Date;
}

export interface StateCycleResult {
    report: ReconcileReport;
    persist: PersistResult;
}

function diagnosticName(existing: readonly DiagnosticDump[], at: Date): string {
    const taken = new Set(existing.map((dump) => dump.name));
    const stem = `diag_${marketTimeStamp(at)}`;
    let name = stem;
    for (let n = 2; taken.has(name); n++) {
        name = `${stem}_${n}`;
    }
    return name;
}

/**
 * Bring STATE_DIR up to the namespace HEAD, unless it holds unpushed work.
 *
 * @throws ConflictError when that work is based on an older version than HEAD
 */
async function prepareWorkingCopy(transport: SnapshotTransport, stateDir: string): Promise<void> {
    const restored = await transport.restore();
    const pending = await readWorkingCopy(stateDir);

    if (pending === null || !transport.hasChanges(pending)) {
        await materializeWorkingCopy(restored, stateDir);
        return;
    }
    if (pending.base.version !== restored.base.version) {
        logger.error(
            `[STATE-CYCLE] ${stateDir} holds unpushed changes based on version ${pending.base.version ?? 'none'} ` +
            `but HEAD is ${restored.base.version ?? 'none'}; merge or discard them first`
        );
        throw new ConflictError(pending.base.version, restored.base.version);
    }
    logger.warn(`[STATE-CYCLE] resume: ${stateDir} holds unpushed changes on version ${pending.base.version ?? 'none'}`);
}

export async function runStateCycle(input: StateCycleInput): Promise<StateCycleResult> {
    const clock = input.now ?? (() => new Date());
    const now = clock();
    const paths = workingCopyPaths(input.stateDir);
    logger.info(`[STATE-CYCLE] start ${now.toISOString()}`);

    await prepareWorkingCopy(input.transport, input.stateDir);

    const { ledger } = await Ledger.open(paths.ledger);
    const stored = await PositionStore.load(paths.positions);

    const { positions: reconciled, report } = await reconcileWithBroker(input.broker, {
        positions: stored.toSnapshot(),
        rebalanceTargets: input.rebalanceTargets ?? new Set<string>(),
        ledger,
        now,
        options: input.reconcileOptions,
    });

    const context: StrategyContext = {
        positions: new PositionStore(reconciled),
        ledger,
        intents: await IntentLog.open(paths.intents),
        cursor: await loadCursor(paths.cursor),
        now,
    };
    await context.positions.save(paths.positions);

    if (input.strategy) {
        await input.strategy(context);
    }
    await context.positions.save(paths.positions);
    await saveCursor(paths.cursor, context.cursor);

    if (input.dumpDiagnostics ?? true) {
        const current = await collectWorkingCopy(input.stateDir);
        const dump: DiagnosticDump = {
            name: diagnosticName(current.diagnostics, now),
            created_at: now.toISOString(),
            payload: {
                created: report.created,
                updated: report.updated,
                removed: report.removed,
                skipped: report.skipped,
                recovery_stats: report.recoveryStats,
            },
        };
        await atomicWriteFile(path.join(input.stateDir, ...diagnosticPath(dump.name).split('/')), encodeDiagnostic(dump));
    }

    const bundle = await collectWorkingCopy(input.stateDir);
    const persist = await commitWorkingCopy(input.transport, input.stateDir, {
        ...bundle,
        recoveryStats: report.recoveryStats,
    });

    logger.info(
        `[STATE-CYCLE] done: ${persist.status}` +
        (persist.status === 'committed' ? ` version ${persist.head.version}` : '')
    );
    return { report, persist };
}
