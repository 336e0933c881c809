/**
 * Blob layout of a snapshot and the conversion between in-memory state and blobs.
 *
 *   positions/position_state.json
 *   ledger/ledger.jsonl
 *   intents/intents.jsonl
 *   intents/cursor.json
 *   diagnostics/<name>.json
 *   MANIFEST.json
 *
 * The same layout is used by every backend and by the working copy on disk.
 */

import { createHash } from 'crypto';
import { DiagnosticDump, IntentCursor, IntentRecord, LedgerEntry, PositionStoreSnapshot, SnapshotManifest } from '../types';
import {
    decodeCursor,
    decodeDiagnostic,
    decodeIntents,
    decodeLedger,
    decodeManifest,
    decodePositionState,
    emptyPositionState,
    encodeCursor,
    encodeDiagnostic,
    encodeIntents,
    encodeLedger,
    encodePositionState,
    initialCursor,
} from '../state/codec';
import { StateCorruptionError, ValidationError } from '../state/errors';
import logger from '../utils/logger';

export const BLOB_PATHS = {
    positions: 'positions/position_state.json',
    ledger: 'ledger/ledger.jsonl',
    intents: 'intents/intents.jsonl',
    cursor: 'intents/cursor.json',
    manifest: 'MANIFEST.json',
} as const;

export const DIAGNOSTICS_PREFIX = 'diagnostics/';

const DIAGNOSTIC_NAME = /^[A-Za-z0-9_.-]+$/;
const ALLOWED_PREFIXES = ['positions/', 'ledger/', 'intents/', DIAGNOSTICS_PREFIX];

/** The five artifacts a snapshot carries. */
export interface StateArtifacts {
    ledger: LedgerEntry[];
    positionState: PositionStoreSnapshot;
    intentLog: IntentRecord[];
    intentCursor: IntentCursor;
    diagnostics: DiagnosticDump[];
}

export interface DecodedBlobs {
    artifacts: StateArtifacts;
    manifest: SnapshotManifest | null;
    /** Defaults substituted and lines skipped, one entry each */
    warnings: string[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// PATH GUARD
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Only state artifacts may enter a snapshot: no code, no config, no paths
 * escaping the namespace.
 */
export function isAllowedBlobPath(blobPath: string): boolean {
    if (blobPath === BLOB_PATHS.manifest) {
        return true;
    }
    if (blobPath.includes('..') || blobPath.includes('\\') || blobPath.startsWith('/')) {
        return false;
    }
    return ALLOWED_PREFIXES.some((prefix) => blobPath.startsWith(prefix) && blobPath.length > prefix.length);
}

export function assertAllowedBlobPaths(paths: Iterable<string>): void {
    const refused = [...paths].filter((blobPath) => !isAllowedBlobPath(blobPath));
    if (refused.length > 0) {
        throw new ValidationError(`refusing to snapshot non-state file(s): ${refused.join(', ')}`, refused);
    }
}

export function diagnosticPath(name: string): string {
    if (!DIAGNOSTIC_NAME.test(name)) {
        throw new ValidationError(`invalid diagnostic name "${name}"`, [`name=${name}`]);
    }
    return `${DIAGNOSTICS_PREFIX}${name}.json`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENCODE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Newest `limit` dumps by created_at (name breaks ties), oldest first.
 */
export function retainDiagnostics(dumps: readonly DiagnosticDump[], limit: number): DiagnosticDump[] {
    const ordered = [...dumps].sort((a, b) => a.created_at.localeCompare(b.created_at) || a.name.localeCompare(b.name));
    return limit <= 0 ? [] : ordered.slice(-limit);
}

/**
 * Every artifact as a blob, manifest excluded. Same state, same bytes.
 */
export function encodeBlobs(artifacts: StateArtifacts, diagnosticsRetention: number): Map<string, string> {
    const files = new Map<string, string>();
    files.set(BLOB_PATHS.positions, encodePositionState(artifacts.positionState));
    files.set(BLOB_PATHS.ledger, encodeLedger(artifacts.ledger));
    files.set(BLOB_PATHS.intents, encodeIntents(artifacts.intentLog));
    files.set(BLOB_PATHS.cursor, encodeCursor(artifacts.intentCursor));

    for (const dump of retainDiagnostics(artifacts.diagnostics, diagnosticsRetention)) {
        const blobPath = diagnosticPath(dump.name);
        if (files.has(blobPath)) {
            throw new ValidationError(`duplicate diagnostic name "${dump.name}"`, [blobPath]);
        }
        files.set(blobPath, encodeDiagnostic(dump));
    }
    return files;
}

/**
 * sha256 over the sorted blobs, manifest excluded.
 */
export function contentDigest(files: ReadonlyMap<string, string>): string {
    const hash = createHash('sha256');
    for (const blobPath of [...files.keys()].sort()) {
        if (blobPath === BLOB_PATHS.manifest) {
            continue;
        }
        hash.update(blobPath);
        hash.update('\0');
        hash.update(files.get(blobPath) ?? '');
        hash.update('\0');
    }
    return hash.digest('hex');
}

// ═══════════════════════════════════════════════════════════════════════════════
// DECODE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Blobs back to artifacts.
 *
 * Missing blob → its default. Bad ledger/intent lines and unreadable
 * diagnostics or manifest → skipped. A corrupt position or cursor blob throws.
 *
 * @param source - label used in warnings and errors (namespace@version, a directory)
 */
export function decodeBlobs(files: ReadonlyMap<string, string>, source: string): DecodedBlobs {
    const warnings: string[] = [];
    const where = (blobPath: string): string => `${source}/${blobPath}`;
    const missing = (blobPath: string, fallback: string): void => {
        warnings.push(`${where(blobPath)} missing, using ${fallback}`);
    };

    const positionsText = files.get(BLOB_PATHS.positions);
    let positionState: PositionStoreSnapshot;
    if (positionsText === undefined) {
        missing(BLOB_PATHS.positions, 'an empty position store');
        positionState = emptyPositionState();
    } else {
        positionState = decodePositionState(positionsText, where(BLOB_PATHS.positions));
    }

    const ledgerText = files.get(BLOB_PATHS.ledger);
    let ledger: LedgerEntry[] = [];
    if (ledgerText === undefined) {
        missing(BLOB_PATHS.ledger, 'an empty ledger');
    } else {
        const decoded = decodeLedger(ledgerText);
        ledger = decoded.rows;
        if (decoded.skipped > 0) {
            warnings.push(`${where(BLOB_PATHS.ledger)}: skipped ${decoded.skipped} unreadable line(s)`);
        }
    }

    const intentsText = files.get(BLOB_PATHS.intents);
    let intentLog: IntentRecord[] = [];
    if (intentsText === undefined) {
        missing(BLOB_PATHS.intents, 'an empty intent log');
    } else {
        const decoded = decodeIntents(intentsText);
        intentLog = decoded.rows;
        if (decoded.skipped > 0) {
            warnings.push(`${where(BLOB_PATHS.intents)}: skipped ${decoded.skipped} invalid line(s)`);
        }
    }

    const cursorText = files.get(BLOB_PATHS.cursor);
    let intentCursor: IntentCursor;
    if (cursorText === undefined) {
        missing(BLOB_PATHS.cursor, 'offset 0');
        intentCursor = initialCursor();
    } else {
        intentCursor = decodeCursor(cursorText, where(BLOB_PATHS.cursor));
    }

    const diagnostics: DiagnosticDump[] = [];
    for (const [blobPath, text] of files) {
        if (!blobPath.startsWith(DIAGNOSTICS_PREFIX)) {
            continue;
        }
        try {
            diagnostics.push(decodeDiagnostic(text, where(blobPath)));
        } catch (err: unknown) {
            if (!(err instanceof StateCorruptionError)) {
                throw err;
            }
            warnings.push(`${err.message}; dump skipped`);
        }
    }
    diagnostics.sort((a, b) => a.created_at.localeCompare(b.created_at) || a.name.localeCompare(b.name));

    const manifestText = files.get(BLOB_PATHS.manifest);
    let manifest: SnapshotManifest | null = null;
    if (manifestText !== undefined) {
        try {
            manifest = decodeManifest(manifestText, where(BLOB_PATHS.manifest));
        } catch (err: unknown) {
            if (!(err instanceof StateCorruptionError)) {
                throw err;
            }
            warnings.push(`${err.message}; manifest ignored`);
        }
    }

    for (const warning of warnings) {
        logger.warn(`[SNAPSHOT] ${warning}`);
    }

    return {
        artifacts: { ledger, positionState, intentLog, intentCursor, diagnostics },
        manifest,
        warnings,
    };
}
