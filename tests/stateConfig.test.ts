/**
 * State Config Tests
 */

import { loadStateConfig } from '../src/config/stateConfig';

describe('loadStateConfig', () => {
    test('defaults', () => {
        expect(loadStateConfig({})).toEqual({
            stateDir: 'bot_state',
            snapshotBackend: 'fs',
            snapshotDir: '.bot-state-snapshots',
            snapshotNamespace: 'trader_state',
            snapshotHistoryLimit: 10,
            diagnosticsRetention: 20,
            defaultEngine: 'unknown',
            useMemoryHint: false,
            runId: 'local',
            commitSha: '',
            supabaseUrl: null,
            supabaseServiceRoleKey: null,
        });
    });

    test('reads overrides and coerces numbers and flags', () => {
        const config = loadStateConfig({
            STATE_DIR: '/var/bot/state',
            SNAPSHOT_BACKEND: 'supabase',
            DIAGNOSTICS_RETENTION: '5',
            SNAPSHOT_HISTORY_LIMIT: '3',
            RECOVERY_USE_MEMORY_HINT: 'true',
            SUPABASE_URL: 'https://example.supabase.co',
            SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
        });

        expect(config).toMatchObject({
            stateDir: '/var/bot/state',
            snapshotBackend: 'supabase',
            diagnosticsRetention: 5,
            snapshotHistoryLimit: 3,
            useMemoryHint: true,
            supabaseUrl: 'https://example.supabase.co',
            supabaseServiceRoleKey: 'test-secret',
        });
    });

    test('run identity prefers explicit values over CI ones', () => {
        expect(loadStateConfig({ GITHUB_RUN_ID: '42', GITHUB_SHA: 'deadbeef' })).toMatchObject({ runId: '42', commitSha: 'deadbeef' });
        expect(loadStateConfig({ RUN_ID: 'manual-1', GITHUB_RUN_ID: '42' }).runId).toBe('manual-1');
    });

    test('empty strings count as unset', () => {
        expect(loadStateConfig({ STATE_DIR: '', RUN_ID: '  ' })).toMatchObject({ stateDir: 'bot_state', runId: 'local' });
    });

    test.each([
        ['SNAPSHOT_BACKEND', 's3'],
        ['DIAGNOSTICS_RETENTION', '-1'],
        ['SNAPSHOT_HISTORY_LIMIT', 'many'],
        ['SNAPSHOT_NAMESPACE', '../other'],
        ['RECOVERY_USE_MEMORY_HINT', 'maybe'],
    ])('rejects invalid %s', (name, value) => {
        expect(() => loadStateConfig({ [name]: value })).toThrow(/\[CONFIG\] invalid environment/);
    });
});
