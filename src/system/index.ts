export * from './system'
