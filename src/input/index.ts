export * from './inputSource'
export * from './keymap'
export * from './scriptedInput'
export * from './terminalInput'
