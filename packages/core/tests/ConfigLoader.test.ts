/**
 * ConfigLoader.test.ts — File Discovery, Validation, Override Layers
 *
 * Categories:
 *  1. loadConfig: discovery order, explicit path, parse errors
 *  2. mergeConfig: zod validation, issue lists
 *  3. Overrides: MESHTOP_BINARY, then CLI flags
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { applyCliOverrides, applyEnvOverrides, loadConfig } from '../src/config/ConfigLoader.js';
import { ConfigValidationError, DEFAULT_CONFIG, mergeConfig } from '../src/config/DashboardConfig.js';

let dir: string;

beforeEach(() => { dir = mkdtempSync(join(tmpdir(), 'meshtop-config-')); });
afterEach(() => { rmSync(dir, { recursive: true, force: true }); });

// ============================================================================
// loadConfig
// ============================================================================

describe('loadConfig', () => {
    it('should return defaults when no file exists', () => {
        expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
    });

    it('should auto-detect meshtop.yaml and merge it over defaults', () => {
        writeFileSync(join(dir, 'meshtop.yaml'), [
            'binary: /opt/vpn/bin/tailscale',
            'intervalMs: 2000',
            'ping:',
            '  count: 5',
        ].join('\n'));

        const config = loadConfig(undefined, dir);
        expect(config.binary).toBe('/opt/vpn/bin/tailscale');
        expect(config.intervalMs).toBe(2_000);
        expect(config.ping).toEqual({ count: 5, timeoutMs: 15_000 });
        expect(config.ui).toEqual(DEFAULT_CONFIG.ui);
    });

    it('should prefer meshtop.yaml over meshtop.json', () => {
        writeFileSync(join(dir, 'meshtop.yaml'), 'intervalMs: 3000\n');
        writeFileSync(join(dir, 'meshtop.json'), '{"intervalMs": 4000}');
        expect(loadConfig(undefined, dir).intervalMs).toBe(3_000);
    });

    it('should read JSON files', () => {
        writeFileSync(join(dir, 'meshtop.json'), '{"clipboard": {"enabled": false}}');
        expect(loadConfig(undefined, dir).clipboard.enabled).toBe(false);
    });

    it('should treat an empty file as all defaults', () => {
        writeFileSync(join(dir, 'meshtop.yaml'), '');
        expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
    });

    it('should load an explicit path relative to cwd', () => {
        writeFileSync(join(dir, 'custom.yml'), 'commandTimeoutMs: 750\n');
        expect(loadConfig('custom.yml', dir).commandTimeoutMs).toBe(750);
    });

    it('should throw when an explicit path does not exist', () => {
        expect(() => loadConfig('missing.yaml', dir))
            .toThrow(`Config file not found: "${join(dir, 'missing.yaml')}"`);
    });

    it('should throw on a file that does not parse', () => {
        writeFileSync(join(dir, 'meshtop.json'), '{"intervalMs": ');
        expect(() => loadConfig(undefined, dir))
            .toThrow(`Cannot parse config file "${join(dir, 'meshtop.json')}"`);
    });

    it('should name the file in validation errors', () => {
        writeFileSync(join(dir, 'meshtop.yaml'), 'intervalMs: 100\n');
        expect(() => loadConfig(undefined, dir)).toThrow(ConfigValidationError);
        expect(() => loadConfig(undefined, dir)).toThrow(`in ${join(dir, 'meshtop.yaml')}`);
    });
});

// ============================================================================
// mergeConfig
// ============================================================================

describe('mergeConfig', () => {
    it('should reject unknown keys', () => {
        expect(() => mergeConfig({ refresh: 5 })).toThrow(ConfigValidationError);
        expect(() => mergeConfig({ ping: { retries: 2 } })).toThrow(ConfigValidationError);
    });

    it('should list every issue with its path', () => {
        try {
            mergeConfig({ binary: '', ping: { count: 0 } });
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigValidationError);
            if (err instanceof ConfigValidationError) {
                expect(err.issues).toHaveLength(2);
                expect(err.issues[0]).toMatch(/^binary: /);
                expect(err.issues[1]).toMatch(/^ping\.count: /);
                expect(err.source).toBeUndefined();
                expect(err.message.startsWith('Invalid configuration:\n  - binary: ')).toBe(true);
            }
        }
    });

    it('should accept a larger status limit and refuse a tiny one', () => {
        expect(mergeConfig({ statusMaxBytes: 64 * 1024 * 1024 }).statusMaxBytes).toBe(67_108_864);
        expect(() => mergeConfig({ statusMaxBytes: 10 })).toThrow(ConfigValidationError);
    });

    it('should reject a non-object root', () => {
        expect(() => mergeConfig('tailscale')).toThrow(ConfigValidationError);
    });
});

// ============================================================================
// Overrides
// ============================================================================

describe('override layers', () => {
    it('should let MESHTOP_BINARY replace the binary', () => {
        expect(applyEnvOverrides(DEFAULT_CONFIG, { MESHTOP_BINARY: ' /usr/local/bin/tailscale ' }).binary)
            .toBe('/usr/local/bin/tailscale');
        expect(applyEnvOverrides(DEFAULT_CONFIG, { MESHTOP_BINARY: '  ' })).toBe(DEFAULT_CONFIG);
        expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toBe(DEFAULT_CONFIG);
    });

    it('should apply CLI values last', () => {
        const fromEnv = applyEnvOverrides(DEFAULT_CONFIG, { MESHTOP_BINARY: '/env/tailscale' });
        const config = applyCliOverrides(fromEnv, { binary: '/cli/tailscale', intervalMs: 1_500 });
        expect(config.binary).toBe('/cli/tailscale');
        expect(config.intervalMs).toBe(1_500);
        expect(config.ping).toBe(DEFAULT_CONFIG.ping);
    });

    it('should leave values the CLI did not set', () => {
        expect(applyCliOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });
});
