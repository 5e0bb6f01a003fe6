import type { ExecutionResult } from '../sandbox/types.js'

export interface OutputStreams {
  stdout: { write(text: string): unknown }
  stderr: { write(text: string): unknown }
}

/** Exit code used for timed-out calls, as timeout(1) does. */
export const TIMEOUT_EXIT_CODE = 124
/** Exit code for transport, session or provisioning failures. */
export const FAILURE_EXIT_CODE = 2

/**
 * Process exit code for a finished call.
 */
export function exitCodeFor(result: ExecutionResult): number {
  switch (result.kind) {
    case 'success':
      if (result.exitCode !== null) return result.exitCode
      return result.success ? 0 : 1
    case 'timeout':
      return TIMEOUT_EXIT_CODE
    case 'failure':
      return FAILURE_EXIT_CODE
  }
}

/**
 * Write a result the way a local run would look: captured stdout to
 * stdout, captured stderr and errors to stderr.
 */
export function writeResult(result: ExecutionResult, streams: OutputStreams): void {
  if (result.kind !== 'success') {
    streams.stderr.write(`${result.kind}: ${result.error}\n`)
    return
  }

  if (result.stdout) streams.stdout.write(result.stdout)
  if (result.stderr) streams.stderr.write(result.stderr)
  if (result.truncated) streams.stderr.write('[output truncated]\n')
}
