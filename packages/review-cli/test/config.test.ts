/**
 * Config Tests
 *
 * Tests for CLI configuration loading from the environment and merging.
 */

import { describe, it, expect } from 'vitest';
import {
    DEFAULT_CONFIG,
    ENV_API_KEY,
    ENV_BASE_URL,
    ENV_NO_COLOR,
    loadEnvConfig,
    mergeConfig,
    resolveConfig,
} from '../src/config';

describe('Config', () => {
    // ========================================================================
    // Constants
    // ========================================================================

    describe('Constants', () => {
        it('should name the environment variables', () => {
            expect(ENV_API_KEY).toBe('OPENAI_API_KEY');
            expect(ENV_BASE_URL).toBe('OPENAI_BASE_URL');
            expect(ENV_NO_COLOR).toBe('NO_COLOR');
        });

        it('should have correct default config', () => {
            expect(DEFAULT_CONFIG.baseUrl).toBe('https://api.openai.com/v1');
            expect(DEFAULT_CONFIG.model).toBe('davinci003');
            expect(DEFAULT_CONFIG.mode).toBe('comment');
            expect(DEFAULT_CONFIG.color).toBe(true);
            expect(DEFAULT_CONFIG.verbose).toBe(false);
            expect(DEFAULT_CONFIG.apiKey).toBeUndefined();
            expect(DEFAULT_CONFIG.timeout).toBeUndefined();
        });
    });

    // ========================================================================
    // loadEnvConfig
    // ========================================================================

    describe('loadEnvConfig', () => {
        it('should return nothing for an empty environment', () => {
            expect(loadEnvConfig({})).toEqual({});
        });

        it('should read the key and base URL', () => {
            expect(loadEnvConfig({
                OPENAI_API_KEY: 'test-secret',
                OPENAI_BASE_URL: ' http://localhost:8080/v1 ',
            })).toEqual({
                apiKey: 'test-secret',
                baseUrl: 'http://localhost:8080/v1',
            });
        });

        it('should ignore blank values', () => {
            expect(loadEnvConfig({ OPENAI_API_KEY: '  ', OPENAI_BASE_URL: '' })).toEqual({});
        });

        it('should disable colors when NO_COLOR is set, even to an empty string', () => {
            expect(loadEnvConfig({ NO_COLOR: '' })).toEqual({ color: false });
            expect(loadEnvConfig({ NO_COLOR: '1' })).toEqual({ color: false });
        });
    });

    // ========================================================================
    // resolveConfig / mergeConfig
    // ========================================================================

    describe('resolveConfig', () => {
        it('should return defaults for an empty environment', () => {
            expect(resolveConfig({})).toEqual({
                apiKey: undefined,
                baseUrl: 'https://api.openai.com/v1',
                model: 'davinci003',
                mode: 'comment',
                timeout: undefined,
                color: true,
                verbose: false,
            });
        });

        it('should apply environment values', () => {
            const config = resolveConfig({ OPENAI_API_KEY: 'test-secret', NO_COLOR: '1' });
            expect(config.apiKey).toBe('test-secret');
            expect(config.color).toBe(false);
        });
    });

    describe('mergeConfig', () => {
        it('should copy the base without an override', () => {
            const merged = mergeConfig(DEFAULT_CONFIG);
            expect(merged).toEqual(DEFAULT_CONFIG);
            expect(merged).not.toBe(DEFAULT_CONFIG);
        });

        it('should prefer override values', () => {
            const merged = mergeConfig(DEFAULT_CONFIG, {
                model: 'turbo',
                mode: 'fix',
                timeout: 30,
                verbose: true,
            });
            expect(merged.model).toBe('turbo');
            expect(merged.mode).toBe('fix');
            expect(merged.timeout).toBe(30);
            expect(merged.verbose).toBe(true);
            expect(merged.baseUrl).toBe(DEFAULT_CONFIG.baseUrl);
        });

        it('should keep base values for undefined overrides', () => {
            const base = mergeConfig(DEFAULT_CONFIG, { color: false, apiKey: 'test-secret' });
            const merged = mergeConfig(base, { color: undefined, apiKey: undefined });
            expect(merged.color).toBe(false);
            expect(merged.apiKey).toBe('test-secret');
        });
    });
});
