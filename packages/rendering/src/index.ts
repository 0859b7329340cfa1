/**
 * @turtle-trails/rendering
 *
 * Render surfaces and the scene that draws turtle trails on them.
 */

// Surface contract
export * from './surface'

// Surfaces
export * from './recordingSurface'
export * from './terminal/terminalSurface'
export * from './terminal/ansi'

// Rasterization
export * from './raster'

// Scene
export * from './scene'
