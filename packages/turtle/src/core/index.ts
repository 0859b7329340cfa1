export * from './errors'
export * from './geometry'
export * from './palette'
export * from './turtleState'
export * from './commands'
export * from './shapes'
