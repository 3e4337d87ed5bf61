/**
 * DebugObserver — Opt-in Event Sink
 *
 * When no observer is attached (the default), components emit nothing.
 *
 * @example
 * ```typescript
 * import { createDebugObserver, RefreshScheduler } from '@meshtop/core';
 *
 * // Default: one console.debug line per event
 * const debug = createDebugObserver();
 *
 * // Custom handler
 * const debug = createDebugObserver((event) => metrics.track(event.type));
 *
 * const scheduler = new RefreshScheduler({ runner, config, debug });
 * ```
 *
 * @module
 */
import type { ActionKind, DashboardEvent, DebugFn } from './DashboardEvent.js';

/** Severity hint used for coloring. */
export type EventTone = 'dim' | 'info' | 'ok' | 'warn' | 'error';

export interface EventSummary {
    /** Four-character label, e.g. `SYNC` */
    readonly tag: string;
    readonly tone: EventTone;
    readonly message: string;
}

/** Human-readable one-liner for an event, shared by every sink. */
export function describeEvent(event: DashboardEvent): EventSummary {
    switch (event.type) {
        case 'refresh.started':
            return { tag: 'SYNC', tone: 'dim', message: `refresh (${event.trigger})` };

        case 'refresh.published':
            return {
                tag: 'SYNC',
                tone: 'ok',
                message: `${event.peers} peers, ${event.online} online (${event.durationMs}ms)`,
            };

        case 'refresh.failed':
            return {
                tag: 'FAIL',
                tone: event.kind === 'tool-missing' ? 'error' : 'warn',
                message: `${event.kind}: ${event.message}`,
            };

        case 'refresh.coalesced':
            return { tag: 'SYNC', tone: 'dim', message: `${event.trigger} refresh skipped, cycle in flight` };

        case 'action.completed':
            return {
                tag: actionTag(event.action),
                tone: event.ok ? 'ok' : 'warn',
                message: `${actionLabel(event.action, event.target)} ${event.ok ? 'ok' : 'failed'} (${event.durationMs}ms)`,
            };

        case 'action.rejected':
            return {
                tag: actionTag(event.action),
                tone: 'warn',
                message: `${actionLabel(event.action, event.target)} rejected: ${event.reason}`,
            };

        case 'clipboard.copied':
            return { tag: 'CLIP', tone: 'ok', message: `copied ${event.chars} chars` };

        case 'clipboard.disabled':
            return { tag: 'CLIP', tone: 'warn', message: `clipboard disabled: ${event.reason}` };
    }
}

function actionTag(action: ActionKind): string {
    return action === 'ping' ? 'PING' : 'EXIT';
}

function actionLabel(action: ActionKind, target: string | null): string {
    if (action === 'exit-node.set') return `exit-node.set ${target ?? '(none)'}`;
    return target ? `${action} ${target}` : action;
}

/**
 * Create an observer. Without a handler, each event is written as one
 * `console.debug` line.
 */
export function createDebugObserver(handler?: DebugFn): DebugFn {
    if (handler) return handler;
    return (event) => {
        const { tag, message } = describeEvent(event);
        console.debug(`[meshtop] ${tag} ${message}`);
    };
}
