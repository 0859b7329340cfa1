/**
 * turtle-trails
 *
 * Interactive turtle graphics for the terminal, usable from code or
 * from the keyboard.
 */

export * from './config'
export * from './input'
export * from './turtle'
export * from './loop'
export * from './system'
export * from './session'
