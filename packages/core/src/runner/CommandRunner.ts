/**
 * CommandRunner — The Only Door to the Operating System
 *
 * Spawns one external process per call, with arguments passed as a
 * discrete list (`shell: false`), and resolves with a {@link CommandResult}
 * once the child has fully exited. The returned promise never rejects.
 *
 * ```
 *   runCommand('tailscale', ['status', '--json'], { timeoutMs: 5000 })
 *       │
 *       ├── spawn (no shell, own process group) ── stdout ─┐
 *       │                                         stderr ─┤  capped collectors
 *       ├── timer ── SIGKILL to the group on expiry        │
 *       ▼                                                  ▼
 *     'close' (or 'exit' after a timeout) ─────────► CommandResult
 * ```
 *
 * On POSIX the child leads its own process group, so the timeout also
 * kills helpers it forked that still hold the output pipes.
 *
 * @module
 */
import { spawn, type ChildProcess } from 'node:child_process';

// ============================================================================
// Types
// ============================================================================

/** Why an invocation did not produce usable output. */
export type CommandFailureReason =
    | 'not-found'
    | 'not-executable'
    | 'exit'
    | 'timeout'
    | 'output-too-large'
    | 'spawn';

export interface CommandSuccess {
    readonly ok: true;
    readonly stdout: string;
    readonly stderr: string;
    readonly durationMs: number;
}

export interface CommandFailure {
    readonly ok: false;
    readonly reason: CommandFailureReason;
    /** One-line description, including trimmed stderr when present */
    readonly message: string;
    readonly stdout: string;
    readonly stderr: string;
    /** `null` when the process never started or was killed by a signal */
    readonly exitCode: number | null;
    readonly durationMs: number;
}

/** Outcome of one external invocation. Transient, never stored. */
export type CommandResult = CommandSuccess | CommandFailure;

export interface RunOptions {
    /** Bounded wait. The child is killed when it expires. */
    readonly timeoutMs: number;
    /** Text piped to stdin. When absent, stdin is ignored. */
    readonly input?: string | undefined;
    /**
     * Per-stream capture limit in bytes (default: 1 MiB). Stdout beyond it
     * turns the result into an `output-too-large` failure.
     */
    readonly maxOutputBytes?: number | undefined;
}

/**
 * Signature shared by {@link runCommand} and every in-process stand-in
 * (the demo simulator, test fakes).
 */
export type CommandRunner = (
    command: string,
    args: readonly string[],
    options: RunOptions,
) => Promise<CommandResult>;

export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

// ============================================================================
// Output Capture
// ============================================================================

class OutputCollector {
    private readonly _chunks: Buffer[] = [];
    private _bytes = 0;
    private _truncated = false;

    constructor(private readonly _limit: number) {}

    /** Whether bytes past the limit were dropped. */
    get truncated(): boolean {
        return this._truncated;
    }

    push(chunk: Buffer): void {
        const room = this._limit - this._bytes;
        if (chunk.length > room) this._truncated = true;
        if (room <= 0) return;
        const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
        this._chunks.push(kept);
        this._bytes += kept.length;
    }

    text(): string {
        return Buffer.concat(this._chunks).toString('utf8');
    }
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Run `command` with `args` and capture its output.
 *
 * @example
 * ```typescript
 * const result = await runCommand('tailscale', ['netcheck'], { timeoutMs: 5000 });
 * if (result.ok) console.log(result.stdout);
 * else console.error(result.reason, result.message);
 * ```
 */
export const runCommand: CommandRunner = (command, args, options) => {
    const startedAt = Date.now();
    const limit = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const stdout = new OutputCollector(limit);
    const stderr = new OutputCollector(limit);

    return new Promise<CommandResult>((resolve) => {
        let settled = false;
        let timedOut = false;
        let exited = false;
        let spawnError: NodeJS.ErrnoException | undefined;
        let stdinError: Error | undefined;
        let timer: ReturnType<typeof setTimeout> | undefined;

        const settle = (result: CommandResult): void => {
            if (settled) return;
            settled = true;
            if (timer) clearTimeout(timer);
            resolve(result);
        };

        const failure = (
            reason: CommandFailureReason,
            message: string,
            exitCode: number | null,
        ): CommandFailure => {
            const errText = stderr.text();
            const detail = errText.trim();
            return {
                ok: false,
                reason,
                message: detail ? `${message}: ${firstLines(detail, 3)}` : message,
                stdout: stdout.text(),
                stderr: errText,
                exitCode,
                durationMs: Date.now() - startedAt,
            };
        };

        let child: ChildProcess;
        try {
            child = spawn(command, [...args], {
                shell: false,
                windowsHide: true,
                detached: process.platform !== 'win32',
                stdio: [options.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
            });
        } catch (err) {
            // Invalid arguments (e.g. NUL bytes) throw synchronously
            const message = err instanceof Error ? err.message : String(err);
            settle(failure('spawn', `Cannot start ${command}: ${message}`, null));
            return;
        }

        const timeoutFailure = (): CommandFailure =>
            failure('timeout', `${command} timed out after ${options.timeoutMs}ms`, null);

        timer = setTimeout(() => {
            timedOut = true;
            killProcessGroup(child);
            // A surviving grandchild would hold the pipes open and delay 'close'
            child.stdout?.destroy();
            child.stderr?.destroy();
            if (exited) settle(timeoutFailure());
        }, options.timeoutMs);

        child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

        child.on('error', (err: NodeJS.ErrnoException) => {
            spawnError = err;
            // Never started: no 'close' is guaranteed to follow
            if (child.pid === undefined) {
                settle(spawnFailure(command, err, failure));
            }
        });

        child.on('exit', () => {
            exited = true;
            if (timedOut) settle(timeoutFailure());
        });

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
            if (spawnError && child.pid === undefined) {
                settle(spawnFailure(command, spawnError, failure));
                return;
            }
            if (timedOut) {
                settle(timeoutFailure());
                return;
            }
            if (code !== 0) {
                const how = signal ? `was killed by ${signal}` : `exited with code ${code}`;
                settle(failure('exit', `${command} ${how}`, code));
                return;
            }
            if (stdout.truncated) {
                settle(failure('output-too-large', `${command} printed more than ${limit} bytes`, code));
                return;
            }
            if (stdinError) {
                settle(failure('spawn', `${command} did not accept input: ${stdinError.message}`, code));
                return;
            }
            settle({
                ok: true,
                stdout: stdout.text(),
                stderr: stderr.text(),
                durationMs: Date.now() - startedAt,
            });
        });

        if (options.input !== undefined && child.stdin) {
            // EPIPE when the child exits before reading everything
            child.stdin.on('error', (err: Error) => { stdinError = err; });
            child.stdin.end(options.input);
        }
    });
};

// ============================================================================
// Helpers
// ============================================================================

/**
 * SIGKILL the child's process group, or just the child when it has no
 * group of its own (Windows) or the group is already gone.
 */
function killProcessGroup(child: ChildProcess): void {
    if (child.pid !== undefined && process.platform !== 'win32') {
        try {
            process.kill(-child.pid, 'SIGKILL');
        } catch {
            // ESRCH: the group is gone, the child may not be
            child.kill('SIGKILL');
        }
        return;
    }
    child.kill('SIGKILL');
}

function spawnFailure(
    command: string,
    err: NodeJS.ErrnoException,
    failure: (reason: CommandFailureReason, message: string, exitCode: number | null) => CommandFailure,
): CommandFailure {
    switch (err.code) {
        case 'ENOENT':
            return failure('not-found', `${command}: command not found`, null);
        case 'EACCES':
        case 'EPERM':
            return failure('not-executable', `${command}: permission denied`, null);
        default:
            return failure('spawn', `Cannot start ${command}: ${err.message}`, null);
    }
}

function firstLines(text: string, max: number): string {
    const lines = text.split(/\r?\n/);
    return lines.length > max ? `${lines.slice(0, max).join(' / ')} …` : lines.join(' / ');
}

/** Whether a failure means the binary itself is unusable. */
export function isToolMissing(result: CommandResult): boolean {
    return !result.ok && (result.reason === 'not-found' || result.reason === 'not-executable');
}

/**
 * Text for human display: stdout on success; on failure, whatever the
 * tool printed followed by the failure message.
 */
export function commandText(result: CommandResult): string {
    if (result.ok) return result.stdout.trimEnd() || '(no output)';
    const printed = result.stdout.trimEnd();
    return printed ? `${printed}\n\n${result.message}` : result.message;
}
