/**
 * VpnCommands — The Compatibility Surface With the VPN Client
 *
 * Every subcommand the dashboard issues is listed here. Outputs are
 * returned verbatim; only `status --json` is parsed (by the Status Parser).
 *
 * @module
 */
import type { DashboardConfig } from '../config/DashboardConfig.js';
import type { CommandResult, CommandRunner } from '../runner/CommandRunner.js';

export const STATUS_ARGS = ['status', '--json'] as const;
export const DIAGNOSTICS_ARGS = ['netcheck'] as const;
export const EXIT_NODE_LIST_ARGS = ['exit-node', 'list'] as const;

export function pingArgs(address: string, count: number): string[] {
    return ['ping', '--c', String(count), address];
}

/** `null` clears the exit node. */
export function setExitNodeArgs(address: string | null): string[] {
    return ['set', `--exit-node=${address ?? ''}`];
}

// ── Invocations ──────────────────────────────────────────

/** Large tailnets print several MiB here, hence its own capture limit. */
export function fetchStatus(runner: CommandRunner, config: DashboardConfig): Promise<CommandResult> {
    return runner(config.binary, STATUS_ARGS, {
        timeoutMs: config.commandTimeoutMs,
        maxOutputBytes: config.statusMaxBytes,
    });
}

/** Connectivity diagnostics as free-form text. */
export function fetchDiagnostics(runner: CommandRunner, config: DashboardConfig): Promise<CommandResult> {
    return runner(config.binary, DIAGNOSTICS_ARGS, { timeoutMs: config.commandTimeoutMs });
}

export function listExitNodes(runner: CommandRunner, config: DashboardConfig): Promise<CommandResult> {
    return runner(config.binary, EXIT_NODE_LIST_ARGS, { timeoutMs: config.commandTimeoutMs });
}
