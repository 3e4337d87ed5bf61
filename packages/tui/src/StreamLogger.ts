/**
 * StreamLogger — Headless Output for Non-TTY Environments
 *
 * Runs the refresh loop without a screen and writes one line per
 * {@link DashboardEvent} to stderr: colored human-readable lines, or
 * NDJSON when `MESHTOP_LOG_FORMAT=json`. `NO_COLOR` turns colors off.
 *
 * Usage:
 *   meshtop --out stderr
 *   meshtop --out stderr --demo
 *   MESHTOP_LOG_FORMAT=json meshtop --out stderr
 *
 * @module
 */
import pc from 'picocolors';
import {
    RefreshScheduler, describeEvent,
    type CommandRunner, type DashboardConfig, type DashboardEvent, type EventTone,
} from '@meshtop/core';

export type LogFormat = 'text' | 'json';

type Colors = ReturnType<typeof pc.createColors>;

function toneColor(colors: Colors, tone: EventTone): (s: string) => string {
    switch (tone) {
        case 'ok': return colors.green;
        case 'warn': return colors.yellow;
        case 'error': return colors.red;
        case 'info': return colors.cyan;
        case 'dim': return colors.dim;
    }
}

// ============================================================================
// Formatters
// ============================================================================

/**
 * One human-readable line: ISO timestamp, bracketed tag, message.
 *
 * @example
 * ```
 * 2026-05-04T09:12:44.120Z [SYNC] 6 peers, 5 online (41ms)
 * ```
 */
export function formatEvent(event: DashboardEvent, colors: Colors = pc): string {
    const { tag, tone, message } = describeEvent(event);
    const time = colors.dim(new Date(event.timestamp).toISOString());
    return `${time} ${toneColor(colors, tone)(`[${tag}]`)} ${message}`;
}

function eventLevel(tone: EventTone): 'info' | 'warn' | 'error' {
    if (tone === 'error') return 'error';
    if (tone === 'warn') return 'warn';
    return 'info';
}

/** One NDJSON line: `time`, `level`, `event`, then the event's own fields. */
export function formatEventJson(event: DashboardEvent): string {
    const base: Record<string, unknown> = {
        time: new Date(event.timestamp).toISOString(),
        level: eventLevel(describeEvent(event).tone),
        event: event.type,
    };
    for (const [key, value] of Object.entries(event)) {
        if (key === 'type' || key === 'timestamp') continue;
        base[key] = value;
    }
    return JSON.stringify(base);
}

// ============================================================================
// Stream Logger
// ============================================================================

export interface StreamLoggerOptions {
    readonly runner: CommandRunner;
    readonly config: DashboardConfig;
    /** Defaults to `process.stderr.write` */
    readonly write?: ((text: string) => void) | undefined;
    /** Defaults to `MESHTOP_LOG_FORMAT` */
    readonly format?: LogFormat | undefined;
    /** Defaults to on for a TTY stderr without `NO_COLOR` */
    readonly color?: boolean | undefined;
    /** Stops the loop; without one, SIGINT / SIGTERM do */
    readonly signal?: AbortSignal | undefined;
    readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Refresh on the configured interval and log every event until
 * stopped. Resolves after the loop is stopped.
 */
export function streamToStderr(options: StreamLoggerOptions): Promise<void> {
    const env = options.env ?? process.env;
    const write = options.write ?? ((text: string) => { process.stderr.write(text); });
    const format: LogFormat = options.format ?? (env['MESHTOP_LOG_FORMAT'] === 'json' ? 'json' : 'text');
    const colors = pc.createColors(options.color ?? (!env['NO_COLOR'] && process.stderr.isTTY === true));

    const scheduler = new RefreshScheduler({
        runner: options.runner,
        config: options.config,
        debug: (event) => {
            write((format === 'json' ? formatEventJson(event) : formatEvent(event, colors)) + '\n');
        },
    });

    if (format === 'text') {
        write(colors.dim(`Polling ${options.config.binary} every ${options.config.intervalMs}ms…`) + '\n');
    }

    return new Promise<void>((resolve) => {
        const signal = options.signal;

        const shutdown = (): void => {
            scheduler.stop();
            signal?.removeEventListener('abort', shutdown);
            process.removeListener('SIGINT', shutdown);
            process.removeListener('SIGTERM', shutdown);
            resolve();
        };

        if (signal) {
            if (signal.aborted) {
                resolve();
                return;
            }
            signal.addEventListener('abort', shutdown, { once: true });
        } else {
            process.on('SIGINT', shutdown);
            process.on('SIGTERM', shutdown);
        }

        scheduler.start();
    });
}
