/**
 * RefreshScheduler — One Timer, One Writer, One Snapshot
 *
 * ```
 *          start() / timer tick / refresh('manual')
 *                       │
 *   ┌──────┐            ▼           ┌──────────┐   build + freeze   ┌────────────┐
 *   │ idle │ ────────────────────►  │ fetching │ ─────────────────► │ publishing │
 *   └──────┘                        └──────────┘                    └────────────┘
 *      ▲  ▲        any failure           │                                │
 *      │  └──────────────────────────────┘                                │
 *      └──────────────────── arm next tick ◄──────────────────────────────┘
 * ```
 *
 * - Requests while `fetching` / `publishing` are coalesced, never queued.
 * - A failed cycle keeps the previous snapshot object untouched.
 * - The next tick is armed after every cycle, failed or not, so the
 *   loop keeps retrying a missing binary at the configured interval.
 *
 * @module
 */
import type { DashboardConfig } from '../config/DashboardConfig.js';
import { fetchDiagnostics, fetchStatus } from '../commands/VpnCommands.js';
import type {
    DebugFn, RefreshFailureKind, RefreshTrigger,
} from '../observability/DashboardEvent.js';
import { isToolMissing, type CommandFailure, type CommandRunner } from '../runner/CommandRunner.js';
import { countOnline, createSnapshot, type Snapshot } from '../status/Snapshot.js';
import { parseStatus } from '../status/StatusParser.js';

export type SchedulerPhase = 'idle' | 'fetching' | 'publishing';

export type RefreshOutcome = 'published' | 'failed' | 'coalesced';

/** Last failed cycle, cleared by the next successful one. */
export interface RefreshFailure {
    readonly kind: RefreshFailureKind;
    readonly message: string;
    readonly at: number;
}

export interface RefreshSchedulerOptions {
    readonly runner: CommandRunner;
    readonly config: DashboardConfig;
    readonly debug?: DebugFn | undefined;
    readonly now?: (() => number) | undefined;
}

export class RefreshScheduler {
    private readonly _runner: CommandRunner;
    private readonly _config: DashboardConfig;
    private readonly _debug: DebugFn | undefined;
    private readonly _now: () => number;
    private readonly _listeners = new Set<() => void>();

    private _phase: SchedulerPhase = 'idle';
    private _snapshot: Snapshot | undefined;
    private _lastFailure: RefreshFailure | undefined;
    private _toolMissing = false;
    private _attempts = 0;
    private _running = false;
    private _timer: ReturnType<typeof setTimeout> | undefined;

    constructor(options: RefreshSchedulerOptions) {
        this._runner = options.runner;
        this._config = options.config;
        this._debug = options.debug;
        this._now = options.now ?? Date.now;
    }

    // ── Read Side ────────────────────────────────────────

    get phase(): SchedulerPhase { return this._phase; }
    /** Latest published snapshot; `undefined` until the first success */
    get snapshot(): Snapshot | undefined { return this._snapshot; }
    get lastFailure(): RefreshFailure | undefined { return this._lastFailure; }
    /** Stays `true` from a `tool-missing` failure until a cycle succeeds */
    get toolMissing(): boolean { return this._toolMissing; }
    /** Cycles started so far */
    get attempts(): number { return this._attempts; }
    get running(): boolean { return this._running; }
    get intervalMs(): number { return this._config.intervalMs; }

    /**
     * Called after every phase change and at the end of every cycle.
     * @returns unsubscribe function
     */
    subscribe(listener: () => void): () => void {
        this._listeners.add(listener);
        return () => { this._listeners.delete(listener); };
    }

    // ── Control ──────────────────────────────────────────

    /** Run one cycle now, then one every `intervalMs`. */
    start(): void {
        if (this._running) return;
        this._running = true;
        void this.refresh('initial');
    }

    /** Disarm the timer. An in-flight cycle completes but arms nothing. */
    stop(): void {
        this._running = false;
        this._clearTimer();
    }

    /**
     * Run a cycle unless one is already in flight. From idle, the pending
     * timer is reset so the next tick counts from the end of this cycle.
     * Never rejects.
     */
    refresh(trigger: RefreshTrigger = 'manual'): Promise<RefreshOutcome> {
        if (this._phase !== 'idle') {
            this._debug?.({ type: 'refresh.coalesced', trigger, timestamp: this._now() });
            return Promise.resolve('coalesced');
        }
        this._clearTimer();
        return this._cycle(trigger);
    }

    // ── Cycle ────────────────────────────────────────────

    private async _cycle(trigger: RefreshTrigger): Promise<RefreshOutcome> {
        const startedAt = this._now();
        this._attempts++;
        this._setPhase('fetching');
        this._debug?.({ type: 'refresh.started', trigger, timestamp: startedAt });

        try {
            const [status, diagnostics] = await Promise.all([
                fetchStatus(this._runner, this._config),
                fetchDiagnostics(this._runner, this._config),
            ]);

            if (!status.ok) return this._fail(trigger, startedAt, commandFailureKind(status), status.message);
            if (!diagnostics.ok) {
                return this._fail(trigger, startedAt, commandFailureKind(diagnostics), diagnostics.message);
            }

            const parsed = parseStatus(status.stdout);
            if (!parsed.ok) return this._fail(trigger, startedAt, 'parse', parsed.error.message);

            this._setPhase('publishing');
            const next = createSnapshot(parsed.value, diagnostics.stdout.trimEnd(), this._now());
            this._snapshot = next;
            this._toolMissing = false;
            this._lastFailure = undefined;

            this._debug?.({
                type: 'refresh.published',
                trigger,
                peers: next.peers.length,
                online: countOnline(next.peers),
                durationMs: this._now() - startedAt,
                timestamp: this._now(),
            });
            return 'published';
        } catch (err) {
            // A runner that breaks its never-reject contract still must not stop the loop
            const message = err instanceof Error ? err.message : String(err);
            return this._fail(trigger, startedAt, 'command', message);
        } finally {
            this._setPhase('idle');
            this._arm();
        }
    }

    private _fail(
        trigger: RefreshTrigger,
        startedAt: number,
        kind: RefreshFailureKind,
        message: string,
    ): RefreshOutcome {
        const at = this._now();
        this._lastFailure = { kind, message, at };
        if (kind === 'tool-missing') this._toolMissing = true;
        this._debug?.({
            type: 'refresh.failed',
            trigger,
            kind,
            message,
            durationMs: at - startedAt,
            timestamp: at,
        });
        return 'failed';
    }

    private _setPhase(phase: SchedulerPhase): void {
        this._phase = phase;
        for (const listener of this._listeners) listener();
    }

    private _arm(): void {
        if (!this._running) return;
        this._clearTimer();
        this._timer = setTimeout(() => {
            this._timer = undefined;
            void this.refresh('timer');
        }, this._config.intervalMs);
    }

    private _clearTimer(): void {
        if (this._timer) {
            clearTimeout(this._timer);
            this._timer = undefined;
        }
    }
}

function commandFailureKind(result: CommandFailure): RefreshFailureKind {
    return isToolMissing(result) ? 'tool-missing' : 'command';
}
