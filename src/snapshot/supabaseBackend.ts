/**
 * Supabase Snapshot Backend
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * TABLES:
 *   state_snapshots(namespace, version, files jsonb, created_at)   PK (namespace, version)
 *   state_heads(namespace, version, commit_sha, updated_at)        PK (namespace)
 *
 * COMMIT:
 * 1. insert the snapshot row for expected+1; duplicate key → ConflictError
 * 2. move the head with a conditional update (WHERE version = expected), or
 *    insert it on first commit; zero rows / duplicate key → ConflictError and
 *    the orphan snapshot row is deleted
 * 3. snapshot rows older than the history limit deleted
 *
 * Readers go through state_heads, so a snapshot row is invisible until step 2.
 * A row left at expected+1 by a crash between 1 and 2 blocks the next commit
 * until it is older than `staleClaimMs`, then it is deleted (same policy as
 * the fs backend's version claims).
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { SnapshotHead } from '../types';
import { ConflictError, NotFoundError, SourceUnavailableError, StateCorruptionError, ValidationError } from '../state/errors';
import { describeIssues } from '../state/schemas';
import logger from '../utils/logger';
import { SnapshotBackend } from './backend';
import { assertAllowedBlobPaths } from './blobs';

const SNAPSHOTS_TABLE = 'state_snapshots';
const HEADS_TABLE = 'state_heads';
const UNIQUE_VIOLATION = '23505';

const HeadRowSchema = z.object({
    version: z.number().int().positive(),
    updated_at: z.string(),
});

const FilesRowSchema = z.object({
    files: z.record(z.string()),
});

const CreatedRowSchema = z.object({
    created_at: z.string(),
});

interface PostgrestFailure {
    message: string;
    code?: string;
}

export interface SupabaseSnapshotBackendOptions {
    historyLimit?: number;
    /** Age after which a snapshot row the head never reached is deleted */
    staleClaimMs?: number;
    commitSha?: string;
    now?: () => Date;
}

function unavailable(operation: string, error: PostgrestFailure): SourceUnavailableError {
    return new SourceUnavailableError(`supabase ${operation}`, new Error(error.message));
}

export class SupabaseSnapshotBackend implements SnapshotBackend {
    readonly description: string;
    private readonly historyLimit: number;
    private readonly staleClaimMs: number;
    private readonly commitSha: string;
    private readonly now: () => Date;

    constructor(
        private readonly client: SupabaseClient,
        private readonly namespace: string,
        options: SupabaseSnapshotBackendOptions = {}
    ) {
        this.description = `supabase:${namespace}`;
        this.historyLimit = Math.max(1, options.historyLimit ?? 10);
        this.staleClaimMs = options.staleClaimMs ?? 10 * 60 * 1000;
        this.commitSha = options.commitSha ?? '';
        this.now = options.now ?? (() => new Date());
    }

    async readHead(): Promise<SnapshotHead | null> {
        const { data, error } = await this.client
            .from(HEADS_TABLE)
            .select('version, updated_at')
            .eq('namespace', this.namespace)
            .maybeSingle();

        if (error) {
            throw unavailable(`read ${HEADS_TABLE}`, error);
        }
        if (!data) {
            return null;
        }

        const parsed = HeadRowSchema.safeParse(data);
        if (!parsed.success) {
            throw new StateCorruptionError(`${HEADS_TABLE}/${this.namespace}`, describeIssues(parsed.error));
        }
        return parsed.data;
    }

    async readFiles(version: number): Promise<Map<string, string>> {
        const { data, error } = await this.client
            .from(SNAPSHOTS_TABLE)
            .select('files')
            .eq('namespace', this.namespace)
            .eq('version', version)
            .maybeSingle();

        if (error) {
            throw unavailable(`read ${SNAPSHOTS_TABLE}`, error);
        }
        if (!data) {
            throw new NotFoundError(`snapshot version ${version} in ${this.description}`);
        }

        const parsed = FilesRowSchema.safeParse(data);
        if (!parsed.success) {
            throw new StateCorruptionError(`${SNAPSHOTS_TABLE}/${this.namespace}@${version}`, describeIssues(parsed.error));
        }
        return new Map(Object.entries(parsed.data.files));
    }

    async commit(expected: number | null, files: ReadonlyMap<string, string>): Promise<SnapshotHead> {
        assertAllowedBlobPaths(files.keys());
        if (files.size === 0) {
            throw new ValidationError('refusing to commit an empty snapshot');
        }

        const next = (expected ?? 0) + 1;
        const updatedAt = this.now().toISOString();

        // ── Step 1: stage the version row ──────────────────────────────────────
        const { error: insertError } = await this.client.from(SNAPSHOTS_TABLE).insert({
            namespace: this.namespace,
            version: next,
            files: Object.fromEntries(files),
            created_at: updatedAt,
        });
        if (insertError) {
            if (insertError.code === UNIQUE_VIOLATION) {
                await this.clearStaleClaim(expected, next);
                throw new ConflictError(expected, next);
            }
            throw unavailable(`insert ${SNAPSHOTS_TABLE}`, insertError);
        }

        // ── Step 2: move the head ──────────────────────────────────────────────
        let moved: boolean;
        try {
            moved = await this.moveHead(expected, next, updatedAt);
        } catch (err: unknown) {
            await this.deleteVersion(next);
            throw err;
        }
        if (!moved) {
            await this.deleteVersion(next);
            const head = await this.readHead();
            throw new ConflictError(expected, head?.version ?? null);
        }
        logger.info(`[SNAPSHOT] ${this.description} HEAD → ${next}`);

        // ── Step 3: prune ──────────────────────────────────────────────────────
        const oldest = next - this.historyLimit + 1;
        const { error: pruneError } = await this.client
            .from(SNAPSHOTS_TABLE)
            .delete()
            .eq('namespace', this.namespace)
            .lt('version', oldest);
        if (pruneError) {
            logger.warn(`[SNAPSHOT] ${this.description} prune failed: ${pruneError.message}`);
        }

        return { version: next, updated_at: updatedAt };
    }

    /**
     * @returns false when another writer moved the head first
     */
    private async moveHead(expected: number | null, next: number, updatedAt: string): Promise<boolean> {
        const row = { namespace: this.namespace, version: next, commit_sha: this.commitSha, updated_at: updatedAt };

        if (expected === null) {
            const { error } = await this.client.from(HEADS_TABLE).insert(row);
            if (!error) {
                return true;
            }
            if (error.code === UNIQUE_VIOLATION) {
                return false;
            }
            throw unavailable(`insert ${HEADS_TABLE}`, error);
        }

        const { data, error } = await this.client
            .from(HEADS_TABLE)
            .update(row)
            .eq('namespace', this.namespace)
            .eq('version', expected)
            .select('version');
        if (error) {
            throw unavailable(`update ${HEADS_TABLE}`, error);
        }
        return Array.isArray(data) && data.length === 1;
    }

    /**
     * Delete the row at `next` when the head never moved onto it and it is old
     * enough to belong to a dead writer.
     */
    private async clearStaleClaim(expected: number | null, next: number): Promise<void> {
        const head = await this.readHead();
        if ((head?.version ?? null) !== expected) {
            return;
        }

        const { data, error } = await this.client
            .from(SNAPSHOTS_TABLE)
            .select('created_at')
            .eq('namespace', this.namespace)
            .eq('version', next)
            .maybeSingle();
        if (error) {
            throw unavailable(`read ${SNAPSHOTS_TABLE}`, error);
        }
        if (!data) {
            return;
        }
        const parsed = CreatedRowSchema.safeParse(data);
        if (!parsed.success) {
            throw new StateCorruptionError(`${SNAPSHOTS_TABLE}/${this.namespace}@${next}`, describeIssues(parsed.error));
        }

        const age = this.now().getTime() - Date.parse(parsed.data.created_at);
        if (Number.isNaN(age) || age < this.staleClaimMs) {
            return;
        }
        logger.warn(`[SNAPSHOT] removing stale uncommitted ${this.description} version ${next} (${Math.round(age / 1000)}s old)`);
        await this.deleteVersion(next);
    }

    private async deleteVersion(version: number): Promise<void> {
        const { error } = await this.client
            .from(SNAPSHOTS_TABLE)
            .delete()
            .eq('namespace', this.namespace)
            .eq('version', version);
        if (error) {
            logger.warn(`[SNAPSHOT] ${this.description} could not delete orphan version ${version}: ${error.message}`);
        }
    }
}
