/**
 * Supabase Client - snapshot storage connection
 *
 * Uses SUPABASE_SERVICE_ROLE_KEY for full database access.
 * Only built when SNAPSHOT_BACKEND=supabase; nothing connects at import time.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { StateConfig } from '../config/stateConfig';
import logger from '../utils/logger';

// Validate URL format
const isValidUrl = (url: string): boolean => {
    try {
        new URL(url);
        return true;
    } catch {
        return false;
    }
};

/**
 * @throws Error when SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY is missing or invalid
 */
export function createSupabaseClient(config: Pick<StateConfig, 'supabaseUrl' | 'supabaseServiceRoleKey'>): SupabaseClient {
    const { supabaseUrl, supabaseServiceRoleKey } = config;
    if (!supabaseUrl || !isValidUrl(supabaseUrl) || !supabaseServiceRoleKey) {
        logger.error('[SUPABASE] Missing or invalid SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY');
        throw new Error('[SUPABASE] SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase snapshot backend');
    }
    return createClient(supabaseUrl, supabaseServiceRoleKey, {
        auth: { persistSession: false, autoRefreshToken: false },
    });
}
