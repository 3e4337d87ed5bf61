/**
 * ActionDispatcher — Single-Flight User Actions
 *
 * Ping and exit-node commands run through one slot: while an action is
 * outstanding, every new request is refused with `busy` and nothing is
 * spawned. Targets must come from the current snapshot, so no
 * user-controlled string ever reaches the argument list.
 *
 * Runs independently of the refresh scheduler; neither waits on the other.
 *
 * @module
 */
import type { DashboardConfig } from '../config/DashboardConfig.js';
import type { ActionKind, DebugFn, RejectionReason } from '../observability/DashboardEvent.js';
import type { CommandResult, CommandRunner } from '../runner/CommandRunner.js';
import { isExitNodeCandidate, isKnownPeerAddress, type Snapshot } from '../status/Snapshot.js';
import { listExitNodes, pingArgs, setExitNodeArgs } from './VpnCommands.js';

export interface ActionDone {
    readonly status: 'done';
    readonly action: ActionKind;
    readonly target: string | null;
    readonly result: CommandResult;
}

export interface ActionRejected {
    readonly status: 'rejected';
    readonly action: ActionKind;
    readonly target: string | null;
    readonly reason: RejectionReason;
}

export type ActionOutcome = ActionDone | ActionRejected;

export interface ActionDispatcherOptions {
    readonly runner: CommandRunner;
    readonly config: DashboardConfig;
    readonly debug?: DebugFn | undefined;
    readonly now?: (() => number) | undefined;
}

export class ActionDispatcher {
    private readonly _runner: CommandRunner;
    private readonly _config: DashboardConfig;
    private readonly _debug: DebugFn | undefined;
    private readonly _now: () => number;
    private _pending: ActionKind | undefined;

    constructor(options: ActionDispatcherOptions) {
        this._runner = options.runner;
        this._config = options.config;
        this._debug = options.debug;
        this._now = options.now ?? Date.now;
    }

    /** The action currently in flight, if any. */
    get pending(): ActionKind | undefined {
        return this._pending;
    }

    /**
     * Ping one peer. `target` must be a peer address of `snapshot`.
     */
    ping(target: string, snapshot: Snapshot | undefined): Promise<ActionOutcome> {
        if (!isKnownPeerAddress(snapshot, target)) {
            return Promise.resolve(this._reject('ping', target, 'unknown-target'));
        }
        const { count, timeoutMs } = this._config.ping;
        return this._run('ping', target, () =>
            this._runner(this._config.binary, pingArgs(target, count), { timeoutMs }));
    }

    listExitNodes(): Promise<ActionOutcome> {
        return this._run('exit-node.list', null, () => listExitNodes(this._runner, this._config));
    }

    /**
     * Route traffic through `target`, or stop using an exit node when
     * `target` is `null`. A non-null target must be an exit-node
     * candidate of `snapshot`.
     */
    setExitNode(target: string | null, snapshot: Snapshot | undefined): Promise<ActionOutcome> {
        if (target !== null && !isExitNodeCandidate(snapshot, target)) {
            return Promise.resolve(this._reject('exit-node.set', target, 'unknown-target'));
        }
        return this._run('exit-node.set', target, () =>
            this._runner(this._config.binary, setExitNodeArgs(target), {
                timeoutMs: this._config.commandTimeoutMs,
            }));
    }

    // ── Private ──────────────────────────────────────────

    private async _run(
        action: ActionKind,
        target: string | null,
        invoke: () => Promise<CommandResult>,
    ): Promise<ActionOutcome> {
        if (this._pending !== undefined) {
            return this._reject(action, target, 'busy');
        }

        this._pending = action;
        const startedAt = this._now();
        try {
            const result = await invoke();
            this._debug?.({
                type: 'action.completed',
                action,
                target,
                ok: result.ok,
                durationMs: this._now() - startedAt,
                timestamp: this._now(),
            });
            return { status: 'done', action, target, result };
        } finally {
            this._pending = undefined;
        }
    }

    private _reject(action: ActionKind, target: string | null, reason: RejectionReason): ActionRejected {
        this._debug?.({ type: 'action.rejected', action, target, reason, timestamp: this._now() });
        return { status: 'rejected', action, target, reason };
    }
}
