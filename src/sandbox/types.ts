import { toErrorMessage } from './errors.js'

/**
 * The call ran to completion. `success` reflects the snippet's ok flag
 * or the command's exit code; a false value is an execution failure
 * reported through `stderr`, not a transport problem.
 */
export interface SuccessResult {
  kind: 'success'
  success: boolean
  stdout: string
  stderr: string
  /** Exit code for commands; null for interpreter snippets. */
  exitCode: number | null
  truncated: boolean
  executionTime: number
}

/**
 * The call exceeded its bound. No output is guaranteed.
 */
export interface TimeoutResult {
  kind: 'timeout'
  error: string
  executionTime: number
}

/**
 * Transport, session or provisioning failure.
 */
export interface FailureResult {
  kind: 'failure'
  error: string
  executionTime: number
}

export type ExecutionResult = SuccessResult | TimeoutResult | FailureResult

/**
 * Interpreter session states.
 *
 * absent -> starting -> ready; any live state -> failed on a transport
 * error; failed -> starting on restart; anything -> terminated (final).
 */
export type SessionState = 'absent' | 'starting' | 'ready' | 'failed' | 'terminated'

/**
 * Interpreter session configuration.
 */
export interface InterpreterOptions {
  /** Interpreter invocation, e.g. ['python3', '-u']. */
  command: string[]
  /** Snippet run once after every (re)start. */
  initCode: string
  /** Bound on spawning the process and running the init snippet. */
  startTimeoutMs: number
  terminateGraceMs: number
  maxOutputSize: number
  /** Discard the resident process after a timed-out call. */
  restartOnTimeout: boolean
}

/**
 * Command runner configuration.
 */
export interface CommandOptions {
  shell: string
  maxOutputSize: number
}

export const DEFAULT_INTERPRETER_OPTIONS: InterpreterOptions = {
  command: ['python3', '-u'],
  initCode: '',
  startTimeoutMs: 120000,
  terminateGraceMs: 5000,
  maxOutputSize: 1024 * 1024, // 1MB
  restartOnTimeout: false,
}

export const DEFAULT_COMMAND_OPTIONS: CommandOptions = {
  shell: 'bash',
  maxOutputSize: 1024 * 1024, // 1MB
}

export function timeoutResult(timeoutMs: number, startTime: number): TimeoutResult {
  return {
    kind: 'timeout',
    error: `Timeout after ${timeoutMs}ms`,
    executionTime: Date.now() - startTime,
  }
}

export function failureResult(error: unknown, startTime: number): FailureResult {
  return {
    kind: 'failure',
    error: toErrorMessage(error),
    executionTime: Date.now() - startTime,
  }
}

/**
 * Cap text at `maxLength` characters.
 */
export function truncate(text: string, maxLength: number): { text: string; truncated: boolean } {
  if (text.length <= maxLength) return { text, truncated: false }
  return { text: text.slice(0, maxLength), truncated: true }
}
