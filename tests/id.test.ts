/**
 * ID Generation Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Validates that intent ids are always unique and never reused.
 *
 * ID Format: intent-{uuid}
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { generateIntentId } from '../src/utils/id';

describe('ID Generation', () => {
    describe('generateIntentId', () => {
        test('always returns unique values', () => {
            const a = generateIntentId();
            const b = generateIntentId();
            expect(a).not.toBe(b);
        });

        test('prefixes a v4 UUID', () => {
            const id = generateIntentId();
            expect(id).toMatch(/^intent-[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i);
        });

        test('no collisions across a batch', () => {
            const ids = new Set(Array.from({ length: 1000 }, () => generateIntentId()));
            expect(ids.size).toBe(1000);
        });
    });
});
