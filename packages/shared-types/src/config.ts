/**
 * Runtime Configuration for @graphtx/shared-types
 *
 * This module holds the runtime state that affects the behavior of the
 * factory functions in the main module. It is kept apart from the pure type
 * definitions in index.ts.
 *
 * - _devMode: enables runtime validation in factory functions (default on)
 *
 * @module config
 */

// =============================================================================
// Runtime Mode Configuration
// =============================================================================

let _devMode = true;

/**
 * Set development mode for enabling runtime validation
 */
export function setDevMode(enabled: boolean): void {
  _devMode = enabled;
}

/**
 * Check if development mode is enabled
 */
export function isDevMode(): boolean {
  return _devMode;
}

/**
 * Internal getter for dev mode (used by factory functions)
 * @internal
 */
export function _isDevModeInternal(): boolean {
  return _devMode;
}
