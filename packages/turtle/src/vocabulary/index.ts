/**
 * Turtle Vocabulary
 *
 * Public exports for keywords and schemas.
 */

// Keywords
export * from './keywords'

// Schemas
export * from './schemas'
