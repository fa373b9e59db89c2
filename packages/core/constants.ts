/**
 * Shared constants for reading cargo metadata and lockfiles.
 */

/** Sub-table of the root `package.metadata` holding third-party ownership records */
export const EXTRA_METADATA_KEY = "third-party"

/** Cargo.lock format version this package reads */
export const LOCKFILE_VERSION = 3

export const LOCKFILE_FILENAME = "Cargo.lock"
