/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * STATE CONFIGURATION — SINGLE SOURCE OF TRUTH
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * All paths, retention limits and run identity come from the environment.
 * Invalid values fail at load, never at first use. Entry points load .env
 * first; importing this module reads nothing.
 *
 * Usage:
 *   dotenv.config();
 *   const config = loadStateConfig();
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { z } from 'zod';
import { describeIssues } from '../state/schemas';

export type SnapshotBackendKind = 'fs' | 'supabase';

export interface StateConfig {
    /** Working copy the running process reads and writes */
    stateDir: string;

    /** Where snapshots are stored */
    snapshotBackend: SnapshotBackendKind;

    /** Root directory of the fs backend */
    snapshotDir: string;

    /** Namespace inside the backend; one per account */
    snapshotNamespace: string;

    /** Snapshot versions kept by the backend, the visible one included */
    snapshotHistoryLimit: number;

    /** Diagnostic dumps kept in each snapshot */
    diagnosticsRetention: number;

    /** Engine recorded on a lot recovered from a ledger entry without meta.engine */
    defaultEngine: string;

    /** Use memory.last_strategy_id before falling back to MANUAL */
    useMemoryHint: boolean;

    runId: string;
    commitSha: string;

    supabaseUrl: string | null;
    supabaseServiceRoleKey: string | null;
}

const flag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default('false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
    STATE_DIR: z.string().min(1).default('bot_state'),
    SNAPSHOT_BACKEND: z.enum(['fs', 'supabase']).default('fs'),
    SNAPSHOT_DIR: z.string().min(1).default('.bot-state-snapshots'),
    SNAPSHOT_NAMESPACE: z.string().regex(/^[A-Za-z0-9_-]+$/).default('trader_state'),
    SNAPSHOT_HISTORY_LIMIT: z.coerce.number().int().min(1).default(10),
    DIAGNOSTICS_RETENTION: z.coerce.number().int().min(0).default(20),
    DEFAULT_ENGINE: z.string().min(1).default('unknown'),
    RECOVERY_USE_MEMORY_HINT: flag,
    RUN_ID: z.string().optional(),
    GITHUB_RUN_ID: z.string().optional(),
    COMMIT_SHA: z.string().optional(),
    GITHUB_SHA: z.string().optional(),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
});

function firstNonEmpty(...values: (string | undefined)[]): string | undefined {
    return values.find((value) => value !== undefined && value.trim() !== '');
}

/**
 * Build the config from an env map. Empty strings count as unset.
 *
 * @throws Error listing every invalid variable
 */
export function loadStateConfig(env: NodeJS.ProcessEnv = process.env): StateConfig {
    const present: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            present[key] = value.trim();
        }
    }

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new Error(`[CONFIG] invalid environment: ${describeIssues(parsed.error).join('; ')}`);
    }
    const e = parsed.data;

    return {
        stateDir: e.STATE_DIR,
        snapshotBackend: e.SNAPSHOT_BACKEND,
        snapshotDir: e.SNAPSHOT_DIR,
        snapshotNamespace: e.SNAPSHOT_NAMESPACE,
        snapshotHistoryLimit: e.SNAPSHOT_HISTORY_LIMIT,
        diagnosticsRetention: e.DIAGNOSTICS_RETENTION,
        defaultEngine: e.DEFAULT_ENGINE,
        useMemoryHint: e.RECOVERY_USE_MEMORY_HINT,
        runId: firstNonEmpty(e.RUN_ID, e.GITHUB_RUN_ID) ?? 'local',
        commitSha: firstNonEmpty(e.COMMIT_SHA, e.GITHUB_SHA) ?? '',
        supabaseUrl: e.SUPABASE_URL ?? null,
        supabaseServiceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY ?? null,
    };
}
