/**
 * @file Presenter
 *
 * Visual language for dispatcher output: line markers in plain text,
 * ANSI colors applied only when rendering for a terminal.
 *
 * @module dispatch/Presenter
 */

import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { DispatchResponse } from './types.js';

/**
 * Standard line markers.
 */
export const MARKERS = {
    AFFIRMATIVE: '●',
    INFO: '○',
    ERROR: '>> ERROR:',
    WARNING: '>> WARNING:',
};

export const Presenter = {
    success_format(message: string): string {
        return `${MARKERS.AFFIRMATIVE} ${message}`;
    },

    info_format(message: string): string {
        return `${MARKERS.INFO} ${message}`;
    },

    error_format(message: string): string {
        return `${MARKERS.ERROR} ${message}`;
    },

    warning_format(message: string): string {
        return `${MARKERS.WARNING} ${message}`;
    },

    /**
     * Numbered listing, one entry per line.
     */
    history_format(entries: readonly string[]): string {
        if (entries.length === 0) {
            return `${MARKERS.INFO} history is empty`;
        }
        const lines: string[] = entries.map(
            (entry: string, index: number): string => `  ${String(index + 1).padStart(4)}  ${entry}`
        );
        return [`${MARKERS.INFO} history (${entries.length}):`, ...lines].join('\n');
    },

    /**
     * Recall results, newest first.
     */
    recall_format(query: string, matches: readonly string[]): string {
        if (matches.length === 0) {
            return `${MARKERS.INFO} no memories contain "${query}"`;
        }
        const lines: string[] = matches.map((entry: string): string => `  ${entry}`);
        return [`${MARKERS.AFFIRMATIVE} recall "${query}" (${matches.length}):`, ...lines].join('\n');
    },

    /**
     * Color each line of a response by its leading marker.
     */
    response_render(response: DispatchResponse, ink: ChalkInstance = chalk): string {
        return response.message
            .split('\n')
            .map((line: string): string => {
                if (line.startsWith(MARKERS.ERROR)) return ink.red(line);
                if (line.startsWith(MARKERS.WARNING)) return ink.yellow(line);
                if (line.startsWith(MARKERS.AFFIRMATIVE)) return ink.cyan(line);
                if (line.startsWith(MARKERS.INFO)) return ink.white(line);
                return ink.dim(line);
            })
            .join('\n');
    },
};
