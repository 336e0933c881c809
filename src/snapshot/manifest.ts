/**
 * Snapshot manifest: derived from the staged blobs on every persist, never edited.
 */

import { PositionStoreSnapshot, SnapshotManifest } from '../types';
import { MANUAL_SID, isPlaceholderSid } from '../state/codes';
import { encodeManifest } from '../state/codec';
import { BLOB_PATHS } from './blobs';

export const MANIFEST_SCHEMA_VERSION = 1;

export interface ManifestInput {
    files: ReadonlyMap<string, string>;
    positionState: PositionStoreSnapshot;
    snapshotVersion: number;
    contentDigest: string;
    runId: string;
    commitSha: string;
    recoveryStats: Record<string, number>;
    now: Date;
}

export function countLots(positionState: PositionStoreSnapshot): SnapshotManifest['counts'] {
    const lots = Object.values(positionState.positions);
    return {
        n_lots: lots.length,
        n_unknown: lots.filter((lot) => isPlaceholderSid(lot.sid)).length,
        n_manual: lots.filter((lot) => lot.sid === MANUAL_SID).length,
    };
}

export function buildManifest(input: ManifestInput): SnapshotManifest {
    const files = [...input.files.entries()]
        .filter(([blobPath]) => blobPath !== BLOB_PATHS.manifest)
        .map(([blobPath, content]) => ({ path: blobPath, size: Buffer.byteLength(content, 'utf-8') }))
        .sort((a, b) => a.path.localeCompare(b.path));

    const recoveryStats: Record<string, number> = {};
    for (const key of Object.keys(input.recoveryStats).sort()) {
        recoveryStats[key] = input.recoveryStats[key];
    }

    return {
        schema_version: MANIFEST_SCHEMA_VERSION,
        snapshot_version: input.snapshotVersion,
        updated_at: input.now.toISOString(),
        run_id: input.runId,
        commit_sha: input.commitSha,
        content_digest: input.contentDigest,
        counts: countLots(input.positionState),
        files,
        recovery_stats: recoveryStats,
    };
}

/**
 * Staged blobs plus MANIFEST.json.
 */
export function withManifest(files: ReadonlyMap<string, string>, manifest: SnapshotManifest): Map<string, string> {
    const out = new Map(files);
    out.set(BLOB_PATHS.manifest, encodeManifest(manifest));
    return out;
}
