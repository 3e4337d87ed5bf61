/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `meshtop.yaml` from cwd or a specified path, validates the
 * structure, and merges with defaults. Environment and CLI values are
 * layered on top, CLI last.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { mergeConfig, type DashboardConfig } from './DashboardConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'meshtop.yaml',
    'meshtop.yml',
    'meshtop.json',
] as const;

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `meshtop.yaml` in `cwd`
 *   3. Fall back to all defaults
 *
 * @throws Error when an explicit `configPath` does not exist
 * @throws {ConfigValidationError} when the file content is invalid
 */
export function loadConfig(configPath?: string, cwd?: string): DashboardConfig {
    const workDir = cwd ?? process.cwd();

    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new Error(`Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath);
    }

    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    return mergeConfig({});
}

/** CLI arguments that can override config file values */
export interface CliOverrides {
    readonly binary?: string | undefined;
    readonly intervalMs?: number | undefined;
}

/**
 * Merge a loaded config with CLI argument overrides.
 * CLI args take precedence over file values.
 */
export function applyCliOverrides(config: DashboardConfig, cli: CliOverrides): DashboardConfig {
    return {
        ...config,
        ...(cli.binary !== undefined ? { binary: cli.binary } : {}),
        ...(cli.intervalMs !== undefined ? { intervalMs: cli.intervalMs } : {}),
    };
}

/**
 * `MESHTOP_BINARY` replaces the configured binary. Applied before CLI
 * overrides so `--binary` still wins.
 */
export function applyEnvOverrides(config: DashboardConfig, env: NodeJS.ProcessEnv): DashboardConfig {
    const binary = env['MESHTOP_BINARY']?.trim();
    return binary ? { ...config, binary } : config;
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): DashboardConfig {
    const content = readFileSync(filePath, 'utf-8');
    let raw: unknown;
    try {
        raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new Error(`Cannot parse config file "${filePath}": ${detail}`);
    }
    return mergeConfig(raw, filePath);
}
