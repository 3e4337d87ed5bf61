/**
 * DashboardConfig — Everything the Dashboard Can Be Told
 *
 * Loaded from `meshtop.yaml` (see {@link loadConfig}) or built
 * programmatically. All fields have defaults; see {@link DEFAULT_CONFIG}.
 *
 * @module
 */
import { z } from 'zod';

// ── Sections ─────────────────────────────────────────────

export interface PingConfig {
    /** Pings sent per request (`--c`) */
    readonly count: number;
    /** Bounded wait for the whole ping command */
    readonly timeoutMs: number;
}

export interface ClipboardConfig {
    readonly enabled: boolean;
}

export interface UiConfig {
    /** How long a transient status message stays in the footer */
    readonly messageTtlMs: number;
    /** Activity log capacity */
    readonly activityLines: number;
}

// ── Full Config ──────────────────────────────────────────

export interface DashboardConfig {
    /** VPN client binary, looked up on PATH */
    readonly binary: string;
    /** Refresh period */
    readonly intervalMs: number;
    /** Bounded wait for status, diagnostics and exit-node commands */
    readonly commandTimeoutMs: number;
    /** Largest `status --json` output accepted, in bytes */
    readonly statusMaxBytes: number;
    readonly ping: PingConfig;
    readonly clipboard: ClipboardConfig;
    readonly ui: UiConfig;
}

export const DEFAULT_CONFIG: DashboardConfig = {
    binary: 'tailscale',
    intervalMs: 10_000,
    commandTimeoutMs: 5_000,
    statusMaxBytes: 32 * 1024 * 1024,
    ping: {
        count: 3,
        timeoutMs: 15_000,
    },
    clipboard: {
        enabled: true,
    },
    ui: {
        messageTtlMs: 5_000,
        activityLines: 200,
    },
};

// ── Validation ───────────────────────────────────────────

const PartialConfigSchema = z.object({
    binary: z.string().min(1).optional(),
    intervalMs: z.number().int().min(500).optional(),
    commandTimeoutMs: z.number().int().min(100).optional(),
    statusMaxBytes: z.number().int().min(1024).optional(),
    ping: z.object({
        count: z.number().int().min(1).max(100).optional(),
        timeoutMs: z.number().int().min(100).optional(),
    }).strict().optional(),
    clipboard: z.object({
        enabled: z.boolean().optional(),
    }).strict().optional(),
    ui: z.object({
        messageTtlMs: z.number().int().min(0).optional(),
        activityLines: z.number().int().min(1).max(10_000).optional(),
    }).strict().optional(),
}).strict();

/** Shape accepted from a config file. */
export type PartialConfig = z.input<typeof PartialConfigSchema>;

export class ConfigValidationError extends Error {
    /** `path: message` lines */
    readonly issues: readonly string[];
    /** File the values came from, when there was one */
    readonly source: string | undefined;

    constructor(issues: readonly string[], source?: string) {
        const where = source ? ` in ${source}` : '';
        super(`Invalid configuration${where}:\n  - ${issues.join('\n  - ')}`);
        this.name = 'ConfigValidationError';
        this.issues = Object.freeze([...issues]);
        this.source = source;
    }
}

// ── Merge Helper ─────────────────────────────────────────

/**
 * Validate `raw` and deep-merge it with defaults.
 *
 * `null` / `undefined` (an empty YAML file) yields the defaults.
 *
 * @throws {ConfigValidationError} when a value has the wrong type, is out
 *   of range, or the key is unknown
 */
export function mergeConfig(raw: unknown, source?: string): DashboardConfig {
    const parsed = PartialConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        throw new ConfigValidationError(
            parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
            source,
        );
    }

    const partial = parsed.data;
    return {
        binary: partial.binary ?? DEFAULT_CONFIG.binary,
        intervalMs: partial.intervalMs ?? DEFAULT_CONFIG.intervalMs,
        commandTimeoutMs: partial.commandTimeoutMs ?? DEFAULT_CONFIG.commandTimeoutMs,
        statusMaxBytes: partial.statusMaxBytes ?? DEFAULT_CONFIG.statusMaxBytes,
        ping: {
            count: partial.ping?.count ?? DEFAULT_CONFIG.ping.count,
            timeoutMs: partial.ping?.timeoutMs ?? DEFAULT_CONFIG.ping.timeoutMs,
        },
        clipboard: {
            enabled: partial.clipboard?.enabled ?? DEFAULT_CONFIG.clipboard.enabled,
        },
        ui: {
            messageTtlMs: partial.ui?.messageTtlMs ?? DEFAULT_CONFIG.ui.messageTtlMs,
            activityLines: partial.ui?.activityLines ?? DEFAULT_CONFIG.ui.activityLines,
        },
    };
}
