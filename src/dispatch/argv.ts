/**
 * @file Argument Parsing
 *
 * Turns command-line words, or a raw REPL line, into a DispatchRequest.
 * Anything that does not start with a known verb is recorded verbatim.
 *
 * Text operands are never re-tokenized: argv words are joined with a
 * single space (the shell already split them), and a REPL line keeps
 * everything after the verb and its one separator character as typed.
 *
 * @module dispatch/argv
 */

import type { DispatchRequest } from './schemas.js';

export type ArgvParseResult =
    | { ok: true; request: DispatchRequest }
    | { ok: false; error: string };

export const USAGE: string = [
    'usage: memloop <text...>                 record text',
    '       memloop record <text...>          record text',
    '       memloop history                   show recorded inputs',
    '       memloop recall <query...>         recorded inputs containing query, newest first',
    '       memloop fingerprint <text...>     print the SHA-256 fingerprint',
    '       memloop verify <sig> <text...>    check text against a fingerprint',
    '       memloop consolidate               fold short-term memory into long-term',
    '       memloop help',
].join('\n');

/** Leading token, one separator character, then the untouched remainder. */
const HEAD_PATTERN: RegExp = /^\s*(\S+)(?:\s([\s\S]*))?$/;

/**
 * Operand after a verb, in the form the front end delivered it.
 */
interface VerbOperand {
    /** Remaining text, exactly as it will be recorded or hashed. */
    text: string;
    /** Split off a leading signature token; null when there is none. */
    signature_split(): { signature: string; text: string } | null;
    /** Whether anything follows the verb. */
    present: boolean;
    /** First extra token, for error messages. */
    first: string;
}

/**
 * Build a request for a known verb, or null when `verb` is not one.
 */
function verbRequest_build(verb: string, operand: VerbOperand): ArgvParseResult | null {
    switch (verb) {
        case 'help':
        case '--help':
        case '-h':
            return { ok: true, request: { op: 'help' } };
        case 'record':
            return { ok: true, request: { op: 'record', text: operand.text } };
        case 'recall':
            return { ok: true, request: { op: 'recall', query: operand.text } };
        case 'fingerprint':
            return { ok: true, request: { op: 'fingerprint', text: operand.text } };
        case 'verify': {
            const split = operand.signature_split();
            if (!split) {
                return { ok: false, error: 'verify: missing signature' };
            }
            return { ok: true, request: { op: 'verify', signature: split.signature, text: split.text } };
        }
        case 'history':
            if (operand.present) {
                return { ok: false, error: `history: unexpected argument '${operand.first}'` };
            }
            return { ok: true, request: { op: 'history' } };
        case 'consolidate':
            if (operand.present) {
                return { ok: false, error: `consolidate: unexpected argument '${operand.first}'` };
            }
            return { ok: true, request: { op: 'consolidate' } };
        default:
            return null;
    }
}

/**
 * Parse argv words (without the node and script entries).
 */
export function argv_parse(argv: readonly string[]): ArgvParseResult {
    if (argv.length === 0) {
        return { ok: true, request: { op: 'help' } };
    }

    const [verb, ...rest] = argv;
    const operand: VerbOperand = {
        text: rest.join(' '),
        signature_split: () => {
            const [signature, ...words] = rest;
            return signature === undefined ? null : { signature, text: words.join(' ') };
        },
        present: rest.length > 0,
        first: rest[0] ?? '',
    };
    return verbRequest_build(verb, operand)
        ?? { ok: true, request: { op: 'record', text: argv.join(' ') } };
}

/**
 * Parse one raw REPL line.
 *
 * A blank line maps to help. A line with no known verb is recorded
 * exactly as typed.
 */
export function line_parse(line: string): ArgvParseResult {
    const head: RegExpExecArray | null = HEAD_PATTERN.exec(line);
    if (!head) {
        return { ok: true, request: { op: 'help' } };
    }

    const rest: string = head[2] ?? '';
    const extra: RegExpExecArray | null = HEAD_PATTERN.exec(rest);
    const operand: VerbOperand = {
        text: rest,
        signature_split: () => extra ? { signature: extra[1], text: extra[2] ?? '' } : null,
        present: extra !== null,
        first: extra ? extra[1] : '',
    };
    return verbRequest_build(head[1], operand)
        ?? { ok: true, request: { op: 'record', text: line } };
}
