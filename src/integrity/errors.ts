/**
 * @file Integrity Errors
 *
 * @module integrity
 */

/**
 * Raised when text cannot be encoded as UTF-8 without substitution,
 * i.e. it contains an unpaired UTF-16 surrogate.
 */
export class EncodingError extends Error {
    public readonly index: number;

    constructor(index: number) {
        super(`Text is not well-formed UTF-16: unpaired surrogate at index ${index}`);
        this.name = 'EncodingError';
        this.index = index;
    }
}
