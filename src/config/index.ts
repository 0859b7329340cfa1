export * from './configSchema'
export * from './loadConfig'
