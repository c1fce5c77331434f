/**
 * Constants for the map script runner.
 */

// Default configuration values
export const DEFAULT_PYTHON = "python3"; // Interpreter used by run-python
export const DEFAULT_TIMEOUT_SEC = 120; // Default external program timeout in seconds
export const DEFAULT_MAX_SCRIPT_DEPTH = 8; // Maximum run-script nesting
export const DEFAULT_LOG_LEVEL = "info";

// Script syntax
export const COMMENT_MARKERS = ["//", "#"] as const;
export const INLINE_ORIGIN = "<inline>"; // Origin label for scripts that have no file

// Limits
export const MAX_PAUSE_MS = 10 * 60 * 1000; // Longest accepted pause
export const MAX_STDERR_CHARS = 2000; // stderr tail kept in invocation errors
export const BOUNDS_SNIFF_BYTES = 64 * 1024; // Bytes read from a source file when looking for declared bounds
