export * from './turtleController'
export * from './turtleRegistry'
