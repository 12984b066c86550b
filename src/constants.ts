/**
 * Shared constants used across the codebase.
 */

// ============================================================================
// Repository Layout
// ============================================================================

/** Name of the repository directory inside a working tree */
export const REPO_DIR_NAME = '.grove'

/** Branch HEAD points at after `init` */
export const DEFAULT_BRANCH = 'master'

// ============================================================================
// Binary Detection
// ============================================================================

/**
 * Number of bytes to check when detecting binary content.
 * Content with a NUL byte in this window is treated as binary.
 */
export const BINARY_CHECK_BYTES = 8000

// ============================================================================
// Diff Output
// ============================================================================

/** Unchanged lines shown around each change in a unified diff */
export const DEFAULT_CONTEXT_LINES = 3

// ============================================================================
// Conflict Markers
// ============================================================================

export const CONFLICT_MARKER_OURS = '<<<<<<<'
export const CONFLICT_MARKER_SEPARATOR = '======='
export const CONFLICT_MARKER_THEIRS = '>>>>>>>'
