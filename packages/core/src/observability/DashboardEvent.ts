/**
 * DashboardEvent — Typed Events Emitted by the Refresh and Action Paths
 *
 * Discriminated union (exhaustive switch possible), immutable payloads.
 * Consumed by the TUI activity log, the headless stream logger, and the
 * default {@link createDebugObserver} handler.
 *
 * @module
 */

/** What started a refresh cycle. */
export type RefreshTrigger = 'initial' | 'timer' | 'manual';

/**
 * Why a refresh cycle kept the previous snapshot.
 * - `tool-missing`: the VPN binary is absent or not executable
 * - `command`: nonzero exit, timeout, or spawn failure
 * - `parse`: status output was not a valid payload
 */
export type RefreshFailureKind = 'tool-missing' | 'command' | 'parse';

/** User-triggered commands that share the single action slot. */
export type ActionKind = 'ping' | 'exit-node.list' | 'exit-node.set';

/** Why an action was refused without spawning anything. */
export type RejectionReason = 'busy' | 'unknown-target';

export interface RefreshStartedEvent {
    readonly type: 'refresh.started';
    readonly trigger: RefreshTrigger;
    readonly timestamp: number;
}

export interface RefreshPublishedEvent {
    readonly type: 'refresh.published';
    readonly trigger: RefreshTrigger;
    readonly peers: number;
    readonly online: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

export interface RefreshFailedEvent {
    readonly type: 'refresh.failed';
    readonly trigger: RefreshTrigger;
    readonly kind: RefreshFailureKind;
    readonly message: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** A refresh request arrived while a cycle was in flight and was dropped. */
export interface RefreshCoalescedEvent {
    readonly type: 'refresh.coalesced';
    readonly trigger: RefreshTrigger;
    readonly timestamp: number;
}

export interface ActionCompletedEvent {
    readonly type: 'action.completed';
    readonly action: ActionKind;
    readonly target: string | null;
    readonly ok: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

export interface ActionRejectedEvent {
    readonly type: 'action.rejected';
    readonly action: ActionKind;
    readonly target: string | null;
    readonly reason: RejectionReason;
    readonly timestamp: number;
}

export interface ClipboardCopiedEvent {
    readonly type: 'clipboard.copied';
    readonly chars: number;
    readonly timestamp: number;
}

/** Emitted once, when clipboard support turns itself off. */
export interface ClipboardDisabledEvent {
    readonly type: 'clipboard.disabled';
    readonly reason: string;
    readonly timestamp: number;
}

export type DashboardEvent =
    | RefreshStartedEvent
    | RefreshPublishedEvent
    | RefreshFailedEvent
    | RefreshCoalescedEvent
    | ActionCompletedEvent
    | ActionRejectedEvent
    | ClipboardCopiedEvent
    | ClipboardDisabledEvent;

/** Observer callback. Must not throw. */
export type DebugFn = (event: DashboardEvent) => void;
