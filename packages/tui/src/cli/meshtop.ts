/**
 * meshtop CLI — `meshtop`
 *
 * Usage:
 *
 *   meshtop [--config <file>] [--binary <path>] [--interval <seconds>]
 *       Full-screen dashboard (needs an interactive terminal).
 *
 *   meshtop --out stderr
 *       No screen; one log line per refresh and command, on stderr.
 *
 *   meshtop --demo
 *       Either mode, against a simulated tailnet instead of the real client.
 *
 * @module
 */
import pc from 'picocolors';
import {
    applyCliOverrides, applyEnvOverrides, loadConfig, runCommand,
    type CommandRunner, type DashboardConfig,
} from '@meshtop/core';
import { runDashboard } from '../CommandDashboard.js';
import { SimulatedTailnet } from '../Simulator.js';
import { streamToStderr } from '../StreamLogger.js';

// ============================================================================
// Constants
// ============================================================================

export const MESHTOP_VERSION = '0.1.0';

/** Shortest refresh interval accepted from the command line, in seconds */
export const MIN_INTERVAL_SECONDS = 0.5;

export const MESHTOP_HELP = `
meshtop — Terminal dashboard for your tailnet

USAGE
  meshtop                           Open the dashboard
  meshtop --out stderr              Log refreshes to stderr instead

OPTIONS
  --config, -c <file>       Config file (default: ./meshtop.yaml if present)
  --binary, -b <path>       VPN client binary (default: tailscale)
  --interval, -i <seconds>  Refresh interval, at least ${MIN_INTERVAL_SECONDS}s (default: 10)
  --out, -o <tui|stderr>    Output mode (default: tui)
  --demo                    Use a simulated tailnet
  --version, -v             Print the version
  --help, -h                Show this help message

KEYS
  j/k ↑/↓  move      g/G  first/last     r  refresh
  enter    ping      e    list exits     x  use exit node
  X        clear exit node               c  copy address
  q        quit

ENVIRONMENT
  MESHTOP_BINARY            Same as --binary (the flag wins)
  MESHTOP_LOG_FORMAT=json   NDJSON lines in --out stderr mode
  NO_COLOR                  Disable colors in --out stderr mode
`.trim();

// ============================================================================
// Arg Parser
// ============================================================================

export type OutputMode = 'tui' | 'stderr';

export interface MeshtopArgs {
    configPath: string | undefined;
    binary: string | undefined;
    intervalSeconds: number | undefined;
    out: OutputMode;
    demo: boolean;
    help: boolean;
    version: boolean;
}

/**
 * Parse the arguments after the program name.
 *
 * @throws Error on an unknown flag, a missing value or an invalid value
 */
export function parseMeshtopArgs(argv: readonly string[]): MeshtopArgs {
    const result: MeshtopArgs = {
        configPath: undefined,
        binary: undefined,
        intervalSeconds: undefined,
        out: 'tui',
        demo: false,
        help: false,
        version: false,
    };

    const valueOf = (flag: string, value: string | undefined): string => {
        if (value === undefined || value.startsWith('-')) {
            throw new Error(`${flag} needs a value`);
        }
        return value;
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case '-c':
            case '--config':
                result.configPath = valueOf(arg, argv[++i]);
                break;
            case '-b':
            case '--binary':
                result.binary = valueOf(arg, argv[++i]);
                break;
            case '-i':
            case '--interval':
                result.intervalSeconds = parseInterval(valueOf(arg, argv[++i]));
                break;
            case '-o':
            case '--out':
                result.out = parseOutputMode(valueOf(arg, argv[++i]));
                break;
            case '--demo':
                result.demo = true;
                break;
            case '-h':
            case '--help':
                result.help = true;
                break;
            case '-v':
            case '--version':
                result.version = true;
                break;
            default:
                throw new Error(`Unknown argument: "${arg ?? ''}"`);
        }
    }

    return result;
}

function parseInterval(value: string): number {
    const seconds = Number(value);
    if (!Number.isFinite(seconds) || seconds < MIN_INTERVAL_SECONDS) {
        throw new Error(`Invalid --interval "${value}": expected a number of seconds, at least ${MIN_INTERVAL_SECONDS}`);
    }
    return seconds;
}

function parseOutputMode(value: string): OutputMode {
    if (value === 'tui' || value === 'stderr') return value;
    throw new Error(`Invalid --out "${value}": expected "tui" or "stderr"`);
}

// ============================================================================
// Entry Point
// ============================================================================

export interface MeshtopIO {
    readonly stdout: { write(text: string): unknown; readonly isTTY?: boolean | undefined };
    readonly stderr: { write(text: string): unknown; readonly isTTY?: boolean | undefined };
    readonly env: NodeJS.ProcessEnv;
    readonly cwd: string;
    /** Stops `--out stderr` mode; without one, SIGINT / SIGTERM do */
    readonly signal?: AbortSignal | undefined;
}

function processIO(): MeshtopIO {
    return { stdout: process.stdout, stderr: process.stderr, env: process.env, cwd: process.cwd() };
}

/**
 * Run the CLI and resolve with the process exit code. Usage and
 * configuration errors are reported on stderr, not thrown.
 */
export async function runMeshtop(argv: readonly string[], io: MeshtopIO = processIO()): Promise<number> {
    const colors = pc.createColors(io.stderr.isTTY === true && !io.env['NO_COLOR']);
    const fail = (message: string, hint?: string): number => {
        io.stderr.write(`${colors.red('✗')} ${message}\n${hint !== undefined ? `${colors.dim(hint)}\n` : ''}`);
        return 1;
    };

    let args: MeshtopArgs;
    try {
        args = parseMeshtopArgs(argv);
    } catch (err) {
        return fail(err instanceof Error ? err.message : String(err), 'Run "meshtop --help" for usage.');
    }

    if (args.help) {
        io.stdout.write(MESHTOP_HELP + '\n');
        return 0;
    }
    if (args.version) {
        io.stdout.write(`meshtop ${MESHTOP_VERSION}\n`);
        return 0;
    }

    let config: DashboardConfig;
    try {
        config = applyCliOverrides(applyEnvOverrides(loadConfig(args.configPath, io.cwd), io.env), {
            binary: args.binary,
            intervalMs: args.intervalSeconds !== undefined ? Math.round(args.intervalSeconds * 1000) : undefined,
        });
    } catch (err) {
        return fail(err instanceof Error ? err.message : String(err));
    }

    const runner: CommandRunner = args.demo ? new SimulatedTailnet().run : runCommand;

    if (args.out === 'stderr') {
        await streamToStderr({
            runner,
            config,
            write: (text) => { io.stderr.write(text); },
            color: io.stderr.isTTY === true && !io.env['NO_COLOR'],
            signal: io.signal,
            env: io.env,
        });
        return 0;
    }

    if (io.stdout.isTTY !== true) {
        return fail(
            'The dashboard needs an interactive terminal on stdout.',
            'Use --out stderr to log refreshes instead.',
        );
    }

    await runDashboard({ runner, config });
    return 0;
}
