/**
 * CommandDashboard — Interactive Full-Screen Dashboard
 *
 * Wires a {@link DashboardController} to the terminal: alternate screen,
 * raw-mode keys, one coalesced frame per 16ms, and a 1s ticker for the
 * clock and message expiry. Resolves when the user quits.
 *
 * @module
 */
import type { CommandRunner, DashboardConfig } from '@meshtop/core';
import { ScreenManager } from './AnsiRenderer.js';
import { DashboardController } from './DashboardController.js';
import { composeFrame } from './DashboardRenderer.js';

const FRAME_MS = 16;
const TICK_MS = 1_000;

export interface DashboardOptions {
    readonly runner: CommandRunner;
    readonly config: DashboardConfig;
}

/**
 * Launch the dashboard on `process.stdout` / `process.stdin`.
 *
 * @example
 * ```typescript
 * await runDashboard({ runner: runCommand, config: loadConfig() });
 * ```
 */
export function runDashboard(options: DashboardOptions): Promise<void> {
    const screen = new ScreenManager();
    const controller = new DashboardController(options);

    return new Promise<void>((resolve) => {
        let renderScheduled = false;
        let closed = false;

        const render = (): void => {
            if (screen.active) screen.write(composeFrame(controller.view(), screen.cols, screen.rows));
        };

        const scheduleRender = (): void => {
            if (renderScheduled) return;
            renderScheduled = true;
            setTimeout(() => {
                renderScheduled = false;
                render();
            }, FRAME_MS);
        };

        const ticker = setInterval(scheduleRender, TICK_MS);
        const unsubscribe = controller.subscribe(scheduleRender);

        const shutdown = (): void => {
            if (closed) return;
            closed = true;
            clearInterval(ticker);
            unsubscribe();
            controller.stop();
            screen.exit();
            process.removeListener('SIGINT', shutdown);
            process.removeListener('SIGTERM', shutdown);
            resolve();
        };

        screen.enter({
            onResize: render,
            onInput: (key) => {
                const result = controller.handleKey(key);
                if (result === 'quit') shutdown();
                else if (result === 'redraw') scheduleRender();
            },
        });

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);

        render();
        controller.start();
    });
}
