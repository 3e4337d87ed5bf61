#!/usr/bin/env node
/**
 * Process entry point for the `meshtop` binary.
 *
 * Exits explicitly once the CLI is done: a ping still running when the
 * user quits must not hold the process open.
 *
 * @module
 */
import pc from 'picocolors';
import { runMeshtop } from './cli/meshtop.js';

runMeshtop(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
        console.error(`${pc.red('✗')} ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
    },
);
