import { describe, it, expect } from 'vitest';
import { DEFAULT_THRESHOLDS, loadConfig, parseThresholds } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
    it('should fall back to defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            profile: undefined,
            region: 'us-east-1',
            maxAttempts: 3,
            outputDir: 'reports',
            logLevel: 'info',
            thresholds: DEFAULT_THRESHOLDS,
        });
    });

    it('should read AWS and threshold settings', () => {
        const config = loadConfig({
            AWS_PROFILE: 'audit',
            AWS_REGION: 'eu-central-1',
            AWS_MAX_ATTEMPTS: '5',
            KEY_AUDIT_OUTPUT_DIR: '/tmp/out',
            LOG_LEVEL: 'debug',
            KEY_AUDIT_NEVER_USED_DAYS: '30',
            KEY_AUDIT_MAX_KEY_AGE_DAYS: '180',
        });

        expect(config.profile).toBe('audit');
        expect(config.region).toBe('eu-central-1');
        expect(config.maxAttempts).toBe(5);
        expect(config.outputDir).toBe('/tmp/out');
        expect(config.logLevel).toBe('debug');
        expect(config.thresholds).toEqual({
            ...DEFAULT_THRESHOLDS,
            neverUsedDays: 30,
            maxKeyAgeDays: 180,
        });
    });

    it('should use AWS_DEFAULT_REGION when AWS_REGION is unset', () => {
        expect(loadConfig({ AWS_DEFAULT_REGION: 'ap-south-1' }).region).toBe('ap-south-1');
    });

    it('should ignore blank values', () => {
        const config = loadConfig({ AWS_PROFILE: '  ', KEY_AUDIT_HIGH_STALE_DAYS: '' });
        expect(config.profile).toBeUndefined();
        expect(config.thresholds.highStaleDays).toBe(90);
    });

    it('should reject a non-numeric threshold', () => {
        expect(() => loadConfig({ KEY_AUDIT_MEDIUM_STALE_DAYS: 'soon' })).toThrow(ConfigError);
    });

    it('should reject a zero attempt count', () => {
        expect(() => loadConfig({ AWS_MAX_ATTEMPTS: '0' })).toThrow('Invalid AWS_MAX_ATTEMPTS');
    });

    it('should reject an unknown log level', () => {
        expect(() => loadConfig({ LOG_LEVEL: 'eror' })).toThrow(ConfigError);
        expect(() => loadConfig({ LOG_LEVEL: 'eror' })).toThrow(/^Invalid LOG_LEVEL: /);
    });

    it('should accept every winston npm level', () => {
        expect(loadConfig({ LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
        expect(loadConfig({ LOG_LEVEL: 'silly' }).logLevel).toBe('silly');
    });
});

describe('parseThresholds', () => {
    it('should fill missing values with defaults', () => {
        expect(parseThresholds({ highStaleDays: 120 })).toEqual({ ...DEFAULT_THRESHOLDS, highStaleDays: 120 });
    });

    it('should reject windows that do not nest', () => {
        expect(() => parseThresholds({ mediumStaleDays: 100 })).toThrow(
            'Invalid thresholds: Staleness thresholds must satisfy medium <= high <= critical'
        );
    });

    it('should reject negative and fractional days', () => {
        expect(() => parseThresholds({ maxKeyAgeDays: -1 })).toThrow(ConfigError);
        expect(() => parseThresholds({ neverUsedDays: 1.5 })).toThrow(ConfigError);
    });
});
