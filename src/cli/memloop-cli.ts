#!/usr/bin/env node
/**
 * @file memloop CLI
 *
 * Records text, prints history, and fingerprints or verifies payloads.
 * With no arguments on a terminal it starts an interactive REPL.
 *
 * Usage:
 *   npx tsx src/cli/memloop-cli.ts "Hello, Persistent World!"
 *   npx tsx src/cli/memloop-cli.ts fingerprint abc
 *   npx tsx src/cli/memloop-cli.ts verify <sig> abc
 *
 * Environment:
 *   MEMLOOP_CONFIG   YAML settings file (default ./memloop.yml)
 *   MEMLOOP_USER     settings and session user (default: anonymous)
 *   MEMLOOP_VERBOSE  'true' prints memory events
 *
 * @module
 */

import * as readline from 'readline';
import path from 'path';
import chalk from 'chalk';
import { SettingsService } from '../config/settings.js';
import type { OverridesLoadResult } from '../config/settings.js';
import { Dispatcher } from '../dispatch/Dispatcher.js';
import { USAGE } from '../dispatch/argv.js';
import type { MemoryEvent } from '../bus/types.js';
import { config_load, event_describe, oneShot_run, replLine_handle } from './run.js';

const write = (line: string): void => {
    console.log(line);
};

/**
 * Interactive loop; resolves when the user quits or stdin closes.
 */
async function repl_start(dispatcher: Dispatcher): Promise<void> {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: `${chalk.cyan('memloop')}> `,
    });

    console.log(chalk.dim('Type text to record it, "help" for commands, "quit" to exit.'));
    rl.prompt();

    return new Promise((resolve) => {
        rl.on('line', (line: string): void => {
            if (replLine_handle(line, dispatcher, write) === 'exit') {
                rl.close();
                return;
            }
            rl.prompt();
        });
        rl.on('close', (): void => {
            console.log(chalk.dim('Goodbye.'));
            resolve();
        });
    });
}

async function main(): Promise<void> {
    const user: string = process.env.MEMLOOP_USER || '';
    const settings: SettingsService = SettingsService.instance_get();
    const configPath: string = path.resolve(process.cwd(), process.env.MEMLOOP_CONFIG || 'memloop.yml');

    const loaded: OverridesLoadResult = config_load(settings, user, configPath);
    if (!loaded.ok) {
        for (const error of loaded.errors) {
            console.warn(chalk.yellow(`[MEMLOOP] ${configPath}: ${error}`));
        }
    }

    const dispatcher: Dispatcher = Dispatcher.create({ settingsService: settings, user });
    if (process.env.MEMLOOP_VERBOSE === 'true') {
        dispatcher.bus.subscribe((event: MemoryEvent): void => {
            console.error(chalk.dim(event_describe(event)));
        });
    }

    const argv: string[] = process.argv.slice(2);
    if (argv.length > 0) {
        process.exitCode = oneShot_run(argv, dispatcher, write);
        return;
    }
    if (!process.stdin.isTTY) {
        console.log(USAGE);
        return;
    }
    await repl_start(dispatcher);
}

main().catch((e: unknown) => {
    const message: string = e instanceof Error ? e.message : String(e);
    console.error(chalk.red(`Fatal error: ${message}`));
    process.exit(1);
});
