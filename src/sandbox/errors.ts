/**
 * Error codes carried by every sandbox error.
 */
export type SandboxErrorCode =
  | 'TIMEOUT'
  | 'TRANSPORT'
  | 'PROTOCOL'
  | 'PROVISIONING'
  | 'TERMINATED'

/**
 * Base class for errors raised inside the sandbox layer.
 *
 * None of these cross the executor boundary: callers receive an
 * ExecutionResult instead.
 */
export class SandboxError extends Error {
  constructor(
    message: string,
    public readonly code: SandboxErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'SandboxError'
  }
}

/**
 * A call exceeded its time bound. Says nothing about environment health.
 */
export class ExecutionTimeoutError extends SandboxError {
  constructor(public readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`, 'TIMEOUT')
    this.name = 'ExecutionTimeoutError'
  }
}

/**
 * Stream-level failure: broken pipe, closed stream, missing handle.
 */
export class TransportError extends SandboxError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT', options)
    this.name = 'TransportError'
  }
}

/**
 * A response record arrived but was not a well-formed control record.
 */
export class ProtocolError extends TransportError {
  constructor(
    message: string,
    public readonly line?: string
  ) {
    super(message)
    this.name = 'ProtocolError'
  }
}

/**
 * An environment, volume or process could not be created.
 * `optional` marks attachments the caller may proceed without.
 */
export class ProvisioningError extends SandboxError {
  constructor(
    message: string,
    public readonly optional = false,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROVISIONING', options)
    this.name = 'ProvisioningError'
  }
}

/**
 * The interpreter session was shut down; it accepts no further requests.
 */
export class SessionTerminatedError extends SandboxError {
  constructor(message = 'Interpreter session terminated') {
    super(message, 'TERMINATED')
    this.name = 'SessionTerminatedError'
  }
}

/**
 * Render any thrown value as a message.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  try {
    return JSON.stringify(error) ?? String(error)
  } catch {
    return String(error)
  }
}
