/**
 * @file Integrity Checker
 *
 * Computes SHA-256 fingerprints over the exact UTF-8 encoding of a text
 * payload and verifies payloads against previously issued fingerprints.
 *
 * Text containing an unpaired surrogate has no exact UTF-8 encoding;
 * the encoder would substitute U+FFFD, so such input is rejected with
 * an EncodingError instead of being hashed.
 *
 * @module integrity
 */

import { createHash, timingSafeEqual } from 'crypto';
import { EncodingError } from './errors.js';
import { FINGERPRINT_LENGTH } from './types.js';
import type { Fingerprint, FingerprintHasher } from './types.js';

const FINGERPRINT_PATTERN: RegExp = new RegExp(`^[0-9a-f]{${FINGERPRINT_LENGTH}}$`);

/**
 * Locate the first unpaired surrogate in `data`.
 *
 * @returns Code unit index, or -1 when the text is well-formed.
 */
export function surrogate_findUnpaired(data: string): number {
    for (let i = 0; i < data.length; i++) {
        const unit: number = data.charCodeAt(i);
        if (unit >= 0xd800 && unit <= 0xdbff) {
            const next: number = i + 1 < data.length ? data.charCodeAt(i + 1) : -1;
            if (next >= 0xdc00 && next <= 0xdfff) {
                i++;
                continue;
            }
            return i;
        }
        if (unit >= 0xdc00 && unit <= 0xdfff) {
            return i;
        }
    }
    return -1;
}

/**
 * Compute the SHA-256 fingerprint of a text payload.
 *
 * @param data - Arbitrary well-formed text
 * @returns 64-character lowercase hex digest
 * @throws EncodingError if `data` contains an unpaired surrogate
 */
export function fingerprint_compute(data: string): Fingerprint {
    const badIndex: number = surrogate_findUnpaired(data);
    if (badIndex !== -1) {
        throw new EncodingError(badIndex);
    }
    return createHash('sha256').update(data, 'utf8').digest('hex');
}

/**
 * Check whether a value has the shape of a fingerprint.
 */
export function fingerprint_isWellFormed(value: unknown): value is Fingerprint {
    return typeof value === 'string' && FINGERPRINT_PATTERN.test(value);
}

/**
 * SHA-256 hasher implementing the FingerprintHasher interface.
 */
export class Sha256Hasher implements FingerprintHasher {
    fingerprint_compute(data: string): Fingerprint {
        return fingerprint_compute(data);
    }
}

/**
 * Fingerprint and verify text payloads.
 *
 * Stateless; a single instance may be shared by any number of callers.
 */
export class IntegrityChecker {
    private readonly hasher: FingerprintHasher;

    constructor(hasher: FingerprintHasher = new Sha256Hasher()) {
        this.hasher = hasher;
    }

    /**
     * Compute the fingerprint of `data`.
     */
    fingerprint(data: string): Fingerprint {
        return this.hasher.fingerprint_compute(data);
    }

    /**
     * Recompute the fingerprint of `data` and compare it to `signature`.
     *
     * A mismatch, or a signature that is not 64 lowercase hex characters,
     * yields false. Only an EncodingError for `data` is thrown.
     */
    verify(data: string, signature: unknown): boolean {
        const expected: Fingerprint = this.fingerprint(data);
        if (typeof signature !== 'string' || signature.length !== expected.length) {
            return false;
        }
        if (fingerprint_isWellFormed(expected) && !fingerprint_isWellFormed(signature)) {
            return false;
        }
        const expectedBytes: Buffer = Buffer.from(expected, 'utf8');
        const signatureBytes: Buffer = Buffer.from(signature, 'utf8');
        if (expectedBytes.length !== signatureBytes.length) {
            return false;
        }
        return timingSafeEqual(expectedBytes, signatureBytes);
    }
}
