/**
 * ClipboardWriter — Best-Effort Copy via the Host's Clipboard Utility
 *
 * Text is piped on stdin to `pbcopy`, `clip`, `wl-copy` or `xclip`.
 * The first time the utility turns out to be missing, the writer disables
 * itself for the rest of the session and reports it once.
 *
 * @module
 */
import type { DebugFn } from '../observability/DashboardEvent.js';
import { isToolMissing, type CommandRunner } from '../runner/CommandRunner.js';

export interface ClipboardUtility {
    readonly command: string;
    readonly args: readonly string[];
}

/** Pick the clipboard utility for a platform, or `undefined` if none is known. */
export function resolveClipboardUtility(
    platform: NodeJS.Platform,
    env: NodeJS.ProcessEnv,
): ClipboardUtility | undefined {
    switch (platform) {
        case 'darwin':
            return { command: 'pbcopy', args: [] };
        case 'win32':
            return { command: 'clip', args: [] };
        case 'linux':
        case 'freebsd':
        case 'openbsd':
            return env['WAYLAND_DISPLAY']
                ? { command: 'wl-copy', args: [] }
                : { command: 'xclip', args: ['-selection', 'clipboard'] };
        default:
            return undefined;
    }
}

export type ClipboardOutcome =
    | { readonly ok: true }
    | { readonly ok: false; readonly reason: 'disabled' | 'failed'; readonly message: string };

export interface ClipboardWriterOptions {
    readonly runner: CommandRunner;
    readonly enabled?: boolean | undefined;
    readonly timeoutMs?: number | undefined;
    readonly platform?: NodeJS.Platform | undefined;
    readonly env?: NodeJS.ProcessEnv | undefined;
    readonly debug?: DebugFn | undefined;
}

export class ClipboardWriter {
    private readonly _runner: CommandRunner;
    private readonly _utility: ClipboardUtility | undefined;
    private readonly _timeoutMs: number;
    private readonly _debug: DebugFn | undefined;
    private _disabledReason: string | undefined;

    constructor(options: ClipboardWriterOptions) {
        this._runner = options.runner;
        this._timeoutMs = options.timeoutMs ?? 2_000;
        this._debug = options.debug;
        const platform = options.platform ?? process.platform;
        this._utility = resolveClipboardUtility(platform, options.env ?? process.env);

        if (options.enabled === false) {
            this._disabledReason = 'turned off in config';
        } else if (!this._utility) {
            this._disabledReason = `no clipboard utility for ${platform}`;
        }
    }

    get enabled(): boolean {
        return this._disabledReason === undefined;
    }

    /** Why copying is unavailable, when it is. */
    get disabledReason(): string | undefined {
        return this._disabledReason;
    }

    async copy(text: string): Promise<ClipboardOutcome> {
        if (this._disabledReason !== undefined || !this._utility) {
            return { ok: false, reason: 'disabled', message: this._disabledReason ?? 'clipboard unavailable' };
        }

        const { command, args } = this._utility;
        const result = await this._runner(command, args, { timeoutMs: this._timeoutMs, input: text });

        if (result.ok) {
            this._debug?.({ type: 'clipboard.copied', chars: text.length, timestamp: Date.now() });
            return { ok: true };
        }

        if (isToolMissing(result)) {
            this._disabledReason = `${command} is not installed`;
            this._debug?.({ type: 'clipboard.disabled', reason: this._disabledReason, timestamp: Date.now() });
            return { ok: false, reason: 'disabled', message: this._disabledReason };
        }

        return { ok: false, reason: 'failed', message: result.message };
    }
}
