/**
 * @accordo/core - shared foundations for Accordo
 *
 * - Error taxonomy, error codes and driver error parsing
 * - Logger interface and level handling
 * - Cursor, row, value and context types
 * - Environment helpers
 *
 * @module @accordo/core
 */

// Error handling
export * from './errors.js'
export * from './error-codes.js'

// Helpers
export * from './helpers.js'

// Types
export * from './types.js'

// Logger
export * from './logger.js'
