/**
 * meshtop.test.ts — Argument Parsing and Entry Point
 *
 * Categories:
 *  1. Arg Parser: flags, values, errors
 *  2. Entry Point: help, version, config errors, output modes
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
    MESHTOP_HELP, MESHTOP_VERSION, parseMeshtopArgs, runMeshtop, type MeshtopIO,
} from '../../src/cli/meshtop.js';

// ============================================================================
// 1. Arg Parser
// ============================================================================

describe('parseMeshtopArgs', () => {
    it('should default to the dashboard with no overrides', () => {
        expect(parseMeshtopArgs([])).toEqual({
            configPath: undefined,
            binary: undefined,
            intervalSeconds: undefined,
            out: 'tui',
            demo: false,
            help: false,
            version: false,
        });
    });

    it('should read every option in long and short form', () => {
        expect(parseMeshtopArgs(['-c', 'net.yaml', '-b', '/opt/ts/tailscale', '-i', '2.5', '-o', 'stderr', '--demo']))
            .toEqual({
                configPath: 'net.yaml',
                binary: '/opt/ts/tailscale',
                intervalSeconds: 2.5,
                out: 'stderr',
                demo: true,
                help: false,
                version: false,
            });
        expect(parseMeshtopArgs(['--config', 'a.yml', '--interval', '1', '--out', 'tui', '--help'])).toMatchObject({
            configPath: 'a.yml', intervalSeconds: 1, out: 'tui', help: true,
        });
    });

    it('should reject an interval below half a second', () => {
        expect(() => parseMeshtopArgs(['-i', '0.2']))
            .toThrow('Invalid --interval "0.2": expected a number of seconds, at least 0.5');
        expect(() => parseMeshtopArgs(['--interval', 'soon'])).toThrow('Invalid --interval "soon"');
    });

    it('should reject an unknown output mode', () => {
        expect(() => parseMeshtopArgs(['--out', 'web'])).toThrow('Invalid --out "web": expected "tui" or "stderr"');
    });

    it('should reject a flag without its value', () => {
        expect(() => parseMeshtopArgs(['--config'])).toThrow('--config needs a value');
        expect(() => parseMeshtopArgs(['-b', '--demo'])).toThrow('-b needs a value');
    });

    it('should reject unknown arguments', () => {
        expect(() => parseMeshtopArgs(['--verbose'])).toThrow('Unknown argument: "--verbose"');
    });
});

// ============================================================================
// 2. Entry Point
// ============================================================================

describe('runMeshtop', () => {
    let dir: string;
    let stdout: string[];
    let stderr: string[];

    function io(overrides: Partial<MeshtopIO> = {}): MeshtopIO {
        return {
            stdout: { write: (text: string) => { stdout.push(text); } },
            stderr: { write: (text: string) => { stderr.push(text); } },
            env: {},
            cwd: dir,
            ...overrides,
        };
    }

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'meshtop-cli-'));
        stdout = [];
        stderr = [];
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should print help', async () => {
        await expect(runMeshtop(['--help'], io())).resolves.toBe(0);
        expect(stdout).toEqual([MESHTOP_HELP + '\n']);
        expect(MESHTOP_HELP).toContain('--out, -o <tui|stderr>');
    });

    it('should print the version', async () => {
        await expect(runMeshtop(['-v'], io())).resolves.toBe(0);
        expect(stdout).toEqual([`meshtop ${MESHTOP_VERSION}\n`]);
    });

    it('should report usage errors on stderr', async () => {
        await expect(runMeshtop(['--bogus'], io())).resolves.toBe(1);
        expect(stderr.join('')).toBe('✗ Unknown argument: "--bogus"\nRun "meshtop --help" for usage.\n');
        expect(stdout).toEqual([]);
    });

    it('should report a missing config file', async () => {
        await expect(runMeshtop(['-c', 'missing.yaml'], io())).resolves.toBe(1);
        expect(stderr.join('')).toBe(`✗ Config file not found: "${join(dir, 'missing.yaml')}"\n`);
    });

    it('should report an invalid config file', async () => {
        writeFileSync(join(dir, 'meshtop.yaml'), 'intervalMs: 10\n');
        await expect(runMeshtop([], io())).resolves.toBe(1);
        expect(stderr.join('').startsWith(`✗ Invalid configuration in ${join(dir, 'meshtop.yaml')}:\n  - intervalMs: `))
            .toBe(true);
    });

    it('should refuse the dashboard without a terminal', async () => {
        await expect(runMeshtop(['--demo'], io())).resolves.toBe(1);
        expect(stderr.join('')).toBe(
            '✗ The dashboard needs an interactive terminal on stdout.\n'
            + 'Use --out stderr to log refreshes instead.\n',
        );
    });

    it('should stream refreshes to stderr until stopped', async () => {
        const abort = new AbortController();
        const exit = runMeshtop(['--out', 'stderr', '--demo', '-i', '1'], io({ signal: abort.signal }));

        await vi.waitFor(() => {
            expect(stderr.some(l => l.includes('[SYNC] 6 peers, 5 online'))).toBe(true);
        });
        abort.abort();

        await expect(exit).resolves.toBe(0);
        expect(stderr[0]).toBe('Polling tailscale every 1000ms…\n');
    });

    it('should apply MESHTOP_BINARY, with --binary taking precedence', async () => {
        const abort = new AbortController();
        abort.abort();

        await runMeshtop(['--out', 'stderr'], io({ env: { MESHTOP_BINARY: 'ts-env' }, signal: abort.signal }));
        await runMeshtop(['--out', 'stderr', '-b', 'ts-flag'], io({ env: { MESHTOP_BINARY: 'ts-env' }, signal: abort.signal }));

        expect(stderr).toEqual([
            'Polling ts-env every 10000ms…\n',
            'Polling ts-flag every 10000ms…\n',
        ]);
    });
});
