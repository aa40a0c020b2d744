/**
 * Configuration tests
 */

import { describe, it, expect } from 'vitest';
import { getConfig, DEFAULT_CONFIG } from '../config';
import { ConfigurationError } from '../errors';

describe('getConfig', () => {
    it('should fall back to defaults', () => {
        expect(getConfig({})).toEqual({ dbPath: 'data/db.json', historySize: 100 });
        expect(getConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it('should read values from the environment', () => {
        expect(getConfig({ CELLAR_DB_PATH: '/tmp/test.json', CELLAR_HISTORY_SIZE: '25' })).toEqual({
            dbPath: '/tmp/test.json',
            historySize: 25,
        });
    });

    it('should treat a blank history size as unset', () => {
        expect(getConfig({ CELLAR_HISTORY_SIZE: '' }).historySize).toBe(100);
    });

    it('should reject an invalid history size', () => {
        expect(() => getConfig({ CELLAR_HISTORY_SIZE: '0' })).toThrow(ConfigurationError);
        expect(() => getConfig({ CELLAR_HISTORY_SIZE: '0' })).toThrow('Invalid CELLAR_HISTORY_SIZE: must be positive');
        expect(() => getConfig({ CELLAR_HISTORY_SIZE: '2.5' })).toThrow('Invalid CELLAR_HISTORY_SIZE: must be an integer');
        expect(() => getConfig({ CELLAR_HISTORY_SIZE: 'lots' })).toThrow(/CELLAR_HISTORY_SIZE/);
    });

    it('should reject a blank snapshot path', () => {
        expect(() => getConfig({ CELLAR_DB_PATH: '  ' })).toThrow('Invalid CELLAR_DB_PATH: must not be empty');
    });
});
