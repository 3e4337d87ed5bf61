/**
 * DashboardController — Dashboard State Without a Terminal
 *
 * Owns the refresh scheduler, the action dispatcher and the clipboard
 * writer, turns keypresses into commands, and exposes everything the
 * renderer needs as one plain {@link DashboardView}. Nothing here writes
 * to a stream, so the whole interaction model runs under test.
 *
 * ```
 *   keypress ──► handleKey() ──► scheduler / dispatcher / clipboard
 *                                     │
 *   debug events ──► activity log     │ results
 *                         │           ▼
 *                         └────► listeners ──► view() ──► renderer
 * ```
 *
 * @module
 */
import {
    ActionDispatcher, ClipboardWriter, RefreshScheduler, UNKNOWN,
    commandText, describeEvent,
    type ActionKind, type ActionOutcome, type CommandRunner, type DashboardConfig,
    type DebugFn, type EventTone, type Peer, type RefreshFailure, type Snapshot,
} from '@meshtop/core';
import { RingBuffer } from './RingBuffer.js';

// ============================================================================
// Types
// ============================================================================

/** One line of the activity log. */
export interface ActivityEntry {
    readonly timestamp: number;
    readonly tag: string;
    readonly tone: EventTone;
    readonly message: string;
}

/** Command output shown in a box over the dashboard until any key. */
export interface Overlay {
    readonly title: string;
    readonly body: string;
    readonly ok: boolean;
}

/** Everything one frame shows. */
export interface DashboardView {
    readonly snapshot: Snapshot | undefined;
    /** Index into `snapshot.peers`, or -1 when there is nothing to select */
    readonly selectedIndex: number;
    readonly binary: string;
    readonly intervalMs: number;
    readonly toolMissing: boolean;
    readonly attempts: number;
    readonly lastFailure: RefreshFailure | undefined;
    readonly refreshing: boolean;
    readonly pendingAction: ActionKind | undefined;
    readonly overlay: Overlay | undefined;
    readonly message: string | undefined;
    readonly activity: readonly ActivityEntry[];
    readonly now: number;
}

export type KeyResult = 'quit' | 'redraw' | 'none';

export const KEYS = {
    ctrlC: '\x03',
    enter: '\r',
    up: '\x1b[A',
    down: '\x1b[B',
    home: '\x1b[H',
    end: '\x1b[F',
} as const;

export interface DashboardControllerOptions {
    readonly runner: CommandRunner;
    readonly config: DashboardConfig;
    readonly now?: (() => number) | undefined;
    /** Receives every event after it reaches the activity log */
    readonly debug?: DebugFn | undefined;
    /** Clipboard platform detection, for tests */
    readonly platform?: NodeJS.Platform | undefined;
    readonly env?: NodeJS.ProcessEnv | undefined;
}

// ============================================================================
// Controller
// ============================================================================

export class DashboardController {
    private readonly _config: DashboardConfig;
    private readonly _now: () => number;
    private readonly _scheduler: RefreshScheduler;
    private readonly _dispatcher: ActionDispatcher;
    private readonly _clipboard: ClipboardWriter;
    private readonly _activity: RingBuffer<ActivityEntry>;
    private readonly _listeners = new Set<() => void>();
    private readonly _tasks = new Set<Promise<void>>();

    private _selectedAddress: string | undefined;
    private _selectedIndex = 0;
    private _overlay: Overlay | undefined;
    private _message: { readonly text: string; readonly at: number } | undefined;
    private _unsubscribe: (() => void) | undefined;

    constructor(options: DashboardControllerOptions) {
        const { runner, config } = options;
        this._config = config;
        this._now = options.now ?? Date.now;
        this._activity = new RingBuffer(config.ui.activityLines);

        const debug: DebugFn = (event) => {
            this._activity.push({ timestamp: event.timestamp, ...describeEvent(event) });
            options.debug?.(event);
            this._notify();
        };

        this._scheduler = new RefreshScheduler({ runner, config, debug, now: this._now });
        this._dispatcher = new ActionDispatcher({ runner, config, debug, now: this._now });
        this._clipboard = new ClipboardWriter({
            runner,
            enabled: config.clipboard.enabled,
            platform: options.platform,
            env: options.env,
            debug,
        });
    }

    // ── Lifecycle ────────────────────────────────────────

    start(): void {
        if (this._unsubscribe) return;
        this._unsubscribe = this._scheduler.subscribe(() => {
            this._syncSelection();
            this._notify();
        });
        this._scheduler.start();
    }

    stop(): void {
        this._scheduler.stop();
        this._unsubscribe?.();
        this._unsubscribe = undefined;
    }

    /** Called whenever the view may have changed. */
    subscribe(listener: () => void): () => void {
        this._listeners.add(listener);
        return () => { this._listeners.delete(listener); };
    }

    /** Resolves once every command started from a keypress has settled. */
    async settle(): Promise<void> {
        while (this._tasks.size > 0) {
            await Promise.all([...this._tasks]);
        }
    }

    // ── Read Side ────────────────────────────────────────

    get selectedPeer(): Peer | undefined {
        this._syncSelection();
        return this._peers()[this._selectedIndex];
    }

    view(now: number = this._now()): DashboardView {
        this._syncSelection();
        const snapshot = this._scheduler.snapshot;
        return {
            snapshot,
            selectedIndex: this._peers().length > 0 ? this._selectedIndex : -1,
            binary: this._config.binary,
            intervalMs: this._scheduler.intervalMs,
            toolMissing: this._scheduler.toolMissing,
            attempts: this._scheduler.attempts,
            lastFailure: this._scheduler.lastFailure,
            refreshing: this._scheduler.phase !== 'idle',
            pendingAction: this._dispatcher.pending,
            overlay: this._overlay,
            message: this._currentMessage(now),
            activity: this._activity.toArray(),
            now,
        };
    }

    // ── Input ────────────────────────────────────────────

    handleKey(key: string): KeyResult {
        if (key === KEYS.ctrlC) return 'quit';

        // An open overlay swallows the key that closes it
        if (this._overlay) {
            this._overlay = undefined;
            return 'redraw';
        }

        switch (key) {
            case 'q':
            case 'Q':
                return 'quit';
            case 'r':
                this._refresh();
                return 'redraw';
            case 'k':
            case KEYS.up:
                return this._move((i) => i - 1);
            case 'j':
            case KEYS.down:
                return this._move((i) => i + 1);
            case 'g':
            case KEYS.home:
                return this._move(() => 0);
            case 'G':
            case KEYS.end:
                return this._move((_, count) => count - 1);
            case KEYS.enter:
            case '\n':
                return this._ping();
            case 'e':
                return this._dispatch('Exit nodes', () => this._dispatcher.listExitNodes(), 'No exit nodes to list');
            case 'x':
                return this._useExitNode();
            case 'X':
                return this._dispatch(
                    'Stop using an exit node',
                    () => this._dispatcher.setExitNode(null, this._scheduler.snapshot),
                    'Cannot clear the exit node',
                );
            case 'c':
                return this._copy();
            default:
                return 'none';
        }
    }

    // ── Commands ─────────────────────────────────────────

    private _refresh(): void {
        this._flash('Refreshing…');
        this._track(this._scheduler.refresh('manual').then((outcome) => {
            if (outcome === 'coalesced') {
                this._flash('Refresh already in progress');
            } else if (outcome === 'published') {
                this._flash(`Refreshed, ${this._peers().length} peers`);
            } else {
                this._flash(`Refresh failed: ${this._scheduler.lastFailure?.message ?? 'unknown error'}`);
            }
        }));
    }

    private _ping(): KeyResult {
        const peer = this.selectedPeer;
        if (!peer) return this._flashNow('No peer selected');
        return this._dispatch(
            `Ping ${peer.hostname} (${peer.address})`,
            () => this._dispatcher.ping(peer.address, this._scheduler.snapshot),
            `${peer.hostname} has no address to ping`,
        );
    }

    private _useExitNode(): KeyResult {
        const peer = this.selectedPeer;
        if (!peer) return this._flashNow('No peer selected');
        return this._dispatch(
            `Use ${peer.hostname} as exit node`,
            () => this._dispatcher.setExitNode(peer.address, this._scheduler.snapshot),
            `${peer.hostname} does not offer itself as an exit node`,
        );
    }

    private _copy(): KeyResult {
        const peer = this.selectedPeer;
        if (!peer || peer.address === UNKNOWN) return this._flashNow('No address to copy');
        const address = peer.address;
        this._track(this._clipboard.copy(address).then((outcome) => {
            if (outcome.ok) this._flash(`Copied ${address}`);
            else if (outcome.reason === 'disabled') this._flash(`Clipboard unavailable: ${outcome.message}`);
            else this._flash(`Copy failed: ${outcome.message}`);
        }));
        return 'none';
    }

    /**
     * Start an action in the shared slot. A busy slot or an invalid
     * target is reported in the status bar; command output opens an
     * overlay.
     */
    private _dispatch(title: string, run: () => Promise<ActionOutcome>, invalidTarget: string): KeyResult {
        const running = this._dispatcher.pending;
        if (running === undefined) this._flash(`${title}…`);

        this._track(run().then((outcome) => {
            if (outcome.status === 'rejected') {
                this._flash(outcome.reason === 'busy'
                    ? `Busy: ${running ?? 'another action'} in progress, ${outcome.action} ignored`
                    : invalidTarget);
                return;
            }
            this._overlay = { title, body: commandText(outcome.result), ok: outcome.result.ok };
            this._message = undefined;
            if (outcome.action === 'exit-node.set' && outcome.result.ok) this._refresh();
        }));
        return 'redraw';
    }

    // ── Selection ────────────────────────────────────────

    private _peers(): readonly Peer[] {
        return this._scheduler.snapshot?.peers ?? [];
    }

    /** Keep the selection on the same peer across snapshots. */
    private _syncSelection(): void {
        const peers = this._peers();
        if (peers.length === 0) return;

        const address = this._selectedAddress;
        let index = address !== undefined && address !== UNKNOWN
            ? peers.findIndex((p) => p.address === address)
            : -1;
        if (index < 0) index = Math.min(Math.max(this._selectedIndex, 0), peers.length - 1);
        this._select(peers, index);
    }

    private _select(peers: readonly Peer[], index: number): void {
        this._selectedIndex = index;
        this._selectedAddress = peers[index]?.address;
    }

    private _move(to: (current: number, count: number) => number): KeyResult {
        const peers = this._peers();
        if (peers.length === 0) return 'none';
        this._syncSelection();

        const next = Math.min(Math.max(to(this._selectedIndex, peers.length), 0), peers.length - 1);
        if (next === this._selectedIndex) return 'none';
        this._select(peers, next);
        return 'redraw';
    }

    // ── Messages & Notification ──────────────────────────

    private _flash(text: string): void {
        this._message = { text, at: this._now() };
    }

    private _flashNow(text: string): KeyResult {
        this._flash(text);
        return 'redraw';
    }

    private _currentMessage(now: number): string | undefined {
        if (!this._message) return undefined;
        if (now - this._message.at >= this._config.ui.messageTtlMs) {
            this._message = undefined;
            return undefined;
        }
        return this._message.text;
    }

    private _track(task: Promise<void>): void {
        const tracked: Promise<void> = task
            .catch((err: unknown) => {
                this._flash(`Error: ${err instanceof Error ? err.message : String(err)}`);
            })
            .finally(() => {
                this._tasks.delete(tracked);
                this._notify();
            });
        this._tasks.add(tracked);
    }

    private _notify(): void {
        for (const listener of this._listeners) listener();
    }
}
