/**
 * Turtle Keywords
 *
 * Single source of truth for command, input event and error strings.
 *
 * Philosophy:
 * - No magic strings anywhere in the codebase
 * - Schemas and handlers reference these constants
 */

export const turtleKeywords = {
  /**
   * Commands understood by a turtle state
   */
  commands: {
    move: 'move',
    turn: 'turn',
    setHeading: 'setHeading',
    moveTo: 'moveTo',
    setPen: 'setPen',
    togglePen: 'togglePen',
    setColor: 'setColor',
    cycleColor: 'cycleColor',
    setWidth: 'setWidth',
    reset: 'reset',
    clear: 'clear',
  },

  /**
   * Discrete input signals fed to the render loop
   */
  inputEvents: {
    // Movement
    moveForward: 'MoveForward',
    moveBackward: 'MoveBackward',
    turnLeft: 'TurnLeft',
    turnRight: 'TurnRight',
    quarterTurnLeft: 'QuarterTurnLeft',
    quarterTurnRight: 'QuarterTurnRight',
    faceEast: 'FaceEast',

    // Pen
    togglePen: 'TogglePen',
    cycleColor: 'CycleColor',
    wider: 'Wider',
    narrower: 'Narrower',

    // Page
    cycleBackground: 'CycleBackground',
    clear: 'Clear',
    reset: 'Reset',
    ngon: 'Ngon',

    // Surface / lifecycle
    resize: 'Resize',
    quit: 'Quit',
  },

  errors: {
    invalidArgument: 'InvalidArgument',
    surfaceUnavailable: 'SurfaceUnavailable',
  },
} as const

export type TurtleCommandType =
  (typeof turtleKeywords.commands)[keyof typeof turtleKeywords.commands]

export type InputEventType =
  (typeof turtleKeywords.inputEvents)[keyof typeof turtleKeywords.inputEvents]

export type TurtleErrorCode =
  (typeof turtleKeywords.errors)[keyof typeof turtleKeywords.errors]
