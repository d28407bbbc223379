/**
 * Unit tests for environment configuration
 */

import {
    ConfigurationError,
    getBoolean,
    getInteger,
    getString,
    loadConfig,
    parseListenAddress,
    parseUpstreams,
} from '../../../src/config/environment';

describe('Environment configuration', () => {
    describe('getString', () => {
        test('should return fallback when unset', () => {
            expect(getString({}, 'CACHE_DIR', './cache')).toBe('./cache');
        });

        test('should keep an explicitly empty value', () => {
            expect(getString({ CACHE_PREFIX: '' }, 'CACHE_PREFIX', '/')).toBe('');
        });
    });

    describe('getInteger', () => {
        test('should parse decimal integers', () => {
            expect(getInteger({ CACHE_MAX_FILES: '250' }, 'CACHE_MAX_FILES', 10)).toBe(250);
            expect(getInteger({ CACHE_MAX_FILES: '-3' }, 'CACHE_MAX_FILES', 10)).toBe(-3);
        });

        test('should reject non-integers', () => {
            expect(() => getInteger({ CACHE_MAX_FILES: '12abc' }, 'CACHE_MAX_FILES', 10))
                .toThrow('invalid value for CACHE_MAX_FILES: 12abc');
            expect(() => getInteger({ CACHE_MAX_FILES: '1.5' }, 'CACHE_MAX_FILES', 10))
                .toThrow(ConfigurationError);
        });
    });

    describe('getBoolean', () => {
        test.each(['1', 't', 'T', 'TRUE', 'true', 'True'])('should read %s as true', value => {
            expect(getBoolean({ FLAG: value }, 'FLAG', false)).toBe(true);
        });

        test.each(['0', 'f', 'F', 'FALSE', 'false', 'False'])('should read %s as false', value => {
            expect(getBoolean({ FLAG: value }, 'FLAG', true)).toBe(false);
        });

        test('should reject other spellings', () => {
            expect(() => getBoolean({ FLAG: 'yes' }, 'FLAG', true)).toThrow('invalid value for FLAG: yes');
        });
    });

    describe('parseListenAddress', () => {
        test('should parse port-only addresses', () => {
            expect(parseListenAddress(':3333')).toEqual({ port: 3333 });
        });

        test('should parse host and port', () => {
            expect(parseListenAddress('127.0.0.1:8080')).toEqual({ host: '127.0.0.1', port: 8080 });
        });

        test('should unbracket IPv6 hosts', () => {
            expect(parseListenAddress('[::1]:3333')).toEqual({ host: '::1', port: 3333 });
        });

        test('should reject bad ports', () => {
            expect(() => parseListenAddress('localhost:http')).toThrow('invalid listen address: localhost:http');
            expect(() => parseListenAddress(':70000')).toThrow(ConfigurationError);
        });
    });

    describe('parseUpstreams', () => {
        test('should split on spaces and drop empty items', () => {
            expect(parseUpstreams(' http://a.test  http://b.test ')).toEqual(['http://a.test', 'http://b.test']);
        });
    });

    describe('loadConfig', () => {
        test('should apply defaults', () => {
            const config = loadConfig({});

            expect(config).toEqual({
                listen: { port: 3333 },
                cacheDir: './cache',
                upstreams: ['https://example.com'],
                prefix: '/',
                keyMode: 'path',
                cannedReplies: {},
                printStats: true,
                maxCacheFiles: 10000,
                maxCacheSizeMb: 1000,
                maxAgeHours: 3,
                cacheClean: true,
                dryRun: false,
                logLevel: 'info',
            });
        });

        test('should read every variable', () => {
            const config = loadConfig({
                CACHE_LISTEN: '0.0.0.0:9000',
                CACHE_DIR: '/var/cache/media',
                CACHE_UPSTREAM: 'http://a.test http://b.test',
                CACHE_PREFIX: '/media/',
                CACHE_KEY_QUERY: 'true',
                CACHE_REPLY_404: 'not here',
                CACHE_REPLY_503: 'busy',
                CACHE_PRINT_STATS: 'false',
                CACHE_MAX_FILES: '20',
                CACHE_MAX_SIZE_MB: '64',
                CACHE_MAX_AGE_HOURS: '0',
                CACHE_CLEAN: '0',
                CACHE_DRY_RUN: '1',
                LOG_LEVEL: 'debug',
            });

            expect(config).toEqual({
                listen: { host: '0.0.0.0', port: 9000 },
                cacheDir: '/var/cache/media',
                upstreams: ['http://a.test', 'http://b.test'],
                prefix: '/media/',
                keyMode: 'query',
                cannedReplies: { 404: 'not here', 503: 'busy' },
                printStats: false,
                maxCacheFiles: 20,
                maxCacheSizeMb: 64,
                maxAgeHours: 0,
                cacheClean: false,
                dryRun: true,
                logLevel: 'debug',
            });
        });

        test('should require at least one upstream', () => {
            expect(() => loadConfig({ CACHE_UPSTREAM: '   ' })).toThrow(ConfigurationError);
        });

        test('should fail on malformed numbers', () => {
            expect(() => loadConfig({ CACHE_MAX_AGE_HOURS: 'three' }))
                .toThrow('invalid value for CACHE_MAX_AGE_HOURS: three');
        });
    });
});
