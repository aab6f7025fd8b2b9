export { IntegrityChecker, Sha256Hasher, fingerprint_compute, fingerprint_isWellFormed, surrogate_findUnpaired } from './IntegrityChecker.js';
export { EncodingError } from './errors.js';
export { FINGERPRINT_LENGTH } from './types.js';
export type { Fingerprint, FingerprintHasher } from './types.js';
