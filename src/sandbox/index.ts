// Types
export type {
  ExecutionResult,
  SuccessResult,
  TimeoutResult,
  FailureResult,
  SessionState,
  InterpreterOptions,
  CommandOptions,
} from './types.js'

export {
  DEFAULT_INTERPRETER_OPTIONS,
  DEFAULT_COMMAND_OPTIONS,
  timeoutResult,
  failureResult,
} from './types.js'

// Errors
export {
  SandboxError,
  ExecutionTimeoutError,
  TransportError,
  ProtocolError,
  ProvisioningError,
  SessionTerminatedError,
  toErrorMessage,
  type SandboxErrorCode,
} from './errors.js'

// Sessions
export { InterpreterSession } from './interpreter.js'
export { CommandRunner } from './command.js'
export {
  SessionRegistry,
  type SessionEntry,
  type SessionSummary,
  type SessionRegistryOptions,
} from './registry.js'

// Unified executor
export { SandboxExecutor, type SandboxExecutorConfig } from './executor.js'

// Cleanup
export { attempt, type AttemptContext } from './cleanup.js'
