/**
 * @file Integrity Type Definitions
 *
 * Types for content fingerprinting. A fingerprint is a one-way digest
 * of a text payload used to detect tampering; it provides no
 * confidentiality and the payload cannot be recovered from it.
 *
 * @module integrity
 */

// ─── Fingerprint ────────────────────────────────────────────────

/**
 * Lowercase hexadecimal SHA-256 digest (64 characters).
 */
export type Fingerprint = string;

/** Length of a hex-encoded SHA-256 digest. */
export const FINGERPRINT_LENGTH = 64 as const;

// ─── Hasher Interface ───────────────────────────────────────────

/**
 * Interface for computing fingerprints.
 *
 * The hasher is pluggable. The default uses SHA-256; tests can
 * substitute a readable hash for deterministic assertions.
 */
export interface FingerprintHasher {
    /**
     * Compute a fingerprint over the UTF-8 bytes of `data`.
     */
    fingerprint_compute(data: string): Fingerprint;
}
