/**
 * Snapshot Transport — versioned persistence of the bot's state
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * restore(): HEAD → blobs → artifacts. Missing namespace or blob → documented
 * default plus a warning. A corrupt position store throws.
 *
 * persist(bundle):
 * 1. encode artifacts canonically, prune diagnostics to the newest N
 * 2. same digest as the restore it derives from → "unchanged", nothing written
 * 3. build MANIFEST.json
 * 4. backend.commit(base.version, blobs): HEAD re-read right before the write;
 *    moved → ConflictError. No retry here; the caller re-runs the cycle.
 *
 * Round trips: restore = 2, persist ≤ 2 plus pruning.
 *
 * GREP-FRIENDLY LOGS:
 * - [SNAPSHOT] restore / persist / unchanged / conflict
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SnapshotHead, SnapshotManifest } from '../types';
import { ConflictError } from '../state/errors';
import logger from '../utils/logger';
import { SnapshotBackend } from './backend';
import { StateArtifacts, contentDigest, decodeBlobs, encodeBlobs } from './blobs';
import { buildManifest, withManifest } from './manifest';

/** Where a bundle came from: the HEAD it was restored at and that content's digest. */
export interface SnapshotBase {
    version: number | null;
    contentDigest: string | null;
}

export interface SnapshotBundle extends StateArtifacts {
    base: SnapshotBase;
    /** Recovery counts of this run; written to the manifest */
    recoveryStats?: Record<string, number>;
}

export interface RestoredSnapshot extends SnapshotBundle {
    manifest: SnapshotManifest | null;
    warnings: string[];
}

export type PersistResult =
    | { status: 'unchanged'; version: number | null }
    | { status: 'committed'; head: SnapshotHead; manifest: SnapshotManifest };

export interface SnapshotTransportOptions {
    diagnosticsRetention?: number;
    runId?: string;
    commitSha?: string;
    now?: () => Date;
}

export class SnapshotTransport {
    readonly diagnosticsRetention: number;
    private readonly runId: string;
    private readonly commitSha: string;
    private readonly now: () => Date;

    constructor(private readonly backend: SnapshotBackend, options: SnapshotTransportOptions = {}) {
        this.diagnosticsRetention = options.diagnosticsRetention ?? 20;
        this.runId = options.runId ?? 'local';
        this.commitSha = options.commitSha ?? '';
        this.now = options.now ?? (() => new Date());
    }

    async restore(): Promise<RestoredSnapshot> {
        const head = await this.backend.readHead();
        let files = new Map<string, string>();
        let source = `${this.backend.description}@empty`;

        if (head === null) {
            logger.warn(`[SNAPSHOT] ${this.backend.description} has no snapshot yet, using defaults`);
        } else {
            files = await this.backend.readFiles(head.version);
            source = `${this.backend.description}@${head.version}`;
        }

        const { artifacts, manifest, warnings } = decodeBlobs(files, source);
        const digest = contentDigest(encodeBlobs(artifacts, this.diagnosticsRetention));

        logger.info(
            `[SNAPSHOT] restored ${source}: ${Object.keys(artifacts.positionState.positions).length} lot(s), ` +
            `${artifacts.ledger.length} ledger entries, ${artifacts.intentLog.length} intent(s)`
        );

        return {
            ...artifacts,
            base: { version: head?.version ?? null, contentDigest: digest },
            manifest,
            warnings,
        };
    }

    /**
     * Whether persist() would write anything: the bundle no longer matches the
     * content it was restored from.
     */
    hasChanges(bundle: SnapshotBundle): boolean {
        return contentDigest(encodeBlobs(bundle, this.diagnosticsRetention)) !== bundle.base.contentDigest;
    }

    /**
     * @throws ConflictError when the namespace moved past `bundle.base.version`
     */
    async persist(bundle: SnapshotBundle): Promise<PersistResult> {
        const staged = encodeBlobs(bundle, this.diagnosticsRetention);
        const digest = contentDigest(staged);

        if (digest === bundle.base.contentDigest) {
            logger.info(`[SNAPSHOT] no changes since version ${bundle.base.version ?? 'none'}, nothing to commit`);
            return { status: 'unchanged', version: bundle.base.version };
        }

        const manifest = buildManifest({
            files: staged,
            positionState: bundle.positionState,
            snapshotVersion: (bundle.base.version ?? 0) + 1,
            contentDigest: digest,
            runId: this.runId,
            commitSha: this.commitSha,
            recoveryStats: bundle.recoveryStats ?? {},
            now: this.now(),
        });

        let head: SnapshotHead;
        try {
            head = await this.backend.commit(bundle.base.version, withManifest(staged, manifest));
        } catch (err: unknown) {
            if (err instanceof ConflictError) {
                logger.error(`[SNAPSHOT] conflict on ${this.backend.description}: ${err.message}`);
            }
            throw err;
        }

        logger.info(
            `[SNAPSHOT] committed version ${head.version} (lots=${manifest.counts.n_lots} ` +
            `manual=${manifest.counts.n_manual} files=${manifest.files.length} run=${manifest.run_id})`
        );
        return { status: 'committed', head, manifest };
    }
}
