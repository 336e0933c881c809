import { StateConfig } from '../config/stateConfig';
import { createSupabaseClient } from '../integrations/supabaseClient';
import { SnapshotBackend } from './backend';
import { FileSnapshotBackend } from './fileBackend';
import { SupabaseSnapshotBackend } from './supabaseBackend';

export function createSnapshotBackend(config: StateConfig): SnapshotBackend {
    switch (config.snapshotBackend) {
        case 'fs':
            return new FileSnapshotBackend(config.snapshotDir, config.snapshotNamespace, {
                historyLimit: config.snapshotHistoryLimit,
            });
        case 'supabase':
            return new SupabaseSnapshotBackend(createSupabaseClient(config), config.snapshotNamespace, {
                historyLimit: config.snapshotHistoryLimit,
                commitSha: config.commitSha,
            });
    }
}
