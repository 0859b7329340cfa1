/**
 * @turtle-trails/turtle
 *
 * Turtle geometry: state machine, commands and shapes.
 * Pure functions and factory functions, no rendering.
 */

// ============================================================================
// Vocabulary - Keywords and schemas
// ============================================================================

export * from './vocabulary'

// ============================================================================
// Core - Errors, geometry, palette, state and commands
// ============================================================================

export * from './core'
