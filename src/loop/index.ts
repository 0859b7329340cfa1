export * from './turtleLoop'
