/**
 * Unit tests for configuration constants
 */

import { CLIENT_CONFIG, SEARCH_API, parseTimeout } from '../../../src/config/constants';

describe('Configuration Constants', () => {
    describe('parseTimeout', () => {
        test('should parse a numeric value', () => {
            expect(parseTimeout('5000')).toBe(5000);
        });

        test('should fall back to the default when unset', () => {
            expect(parseTimeout(undefined)).toBe(SEARCH_API.TIMEOUT_MS);
            expect(parseTimeout('')).toBe(SEARCH_API.TIMEOUT_MS);
        });

        test('should fall back to the default for a non-numeric value', () => {
            expect(parseTimeout('soon')).toBe(30000);
        });

        test('should fall back to the default for a non-positive value', () => {
            expect(parseTimeout('0')).toBe(30000);
            expect(parseTimeout('-10')).toBe(30000);
        });
    });

    test('should expose a finite client timeout', () => {
        expect(Number.isFinite(CLIENT_CONFIG.TIMEOUT_MS)).toBe(true);
    });
});
