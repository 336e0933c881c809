/**
 * ID Generation Utilities
 *
 * Intent ids are random v4 UUIDs, generated fresh per call.
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * New id for an intent record.
 *
 * @example
 * ```typescript
 * const intentId = generateIntentId();
 * // Returns: "intent-550e8400-e29b-41d4-a716-446655440000"
 * ```
 */
export function generateIntentId(): string {
    return `intent-${uuidv4()}`;
}

