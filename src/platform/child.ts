import { spawn, type ChildProcessWithoutNullStreams } from 'child_process'
import type { ProcessHandle } from './types.js'
import { ProvisioningError } from '../sandbox/errors.js'

export interface ChildSpawnOptions {
  cwd?: string
  env?: Record<string, string>
  /** Hard kill after this many ms. */
  timeoutMs?: number
}

/**
 * Spawn a child process and expose it as a ProcessHandle.
 * Resolves once the OS has started the process; spawn failures
 * (missing binary, bad cwd) reject with a ProvisioningError.
 */
export async function spawnChild(
  command: string,
  args: string[],
  options: ChildSpawnOptions = {}
): Promise<ProcessHandle> {
  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ['pipe', 'pipe', 'pipe'],
    timeout: options.timeoutMs,
    killSignal: 'SIGKILL',
  })

  await new Promise<void>((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError)
      resolve()
    }
    const onError = (error: Error): void => {
      child.off('spawn', onSpawn)
      reject(new ProvisioningError(`Failed to spawn ${command}: ${error.message}`, false, { cause: error }))
    }
    child.once('spawn', onSpawn)
    child.once('error', onError)
  })

  return wrapChild(child)
}

function wrapChild(child: ChildProcessWithoutNullStreams): ProcessHandle {
  const exited = new Promise<number>((resolve) => {
    child.once('close', (code) => resolve(code ?? -1))
  })

  // Late errors (EPIPE on stdin, failed kill) surface through write
  // callbacks and the exit code.
  child.on('error', () => undefined)
  child.stdin.on('error', () => undefined)

  return {
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    wait: () => exited,
    kill: async () => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGKILL')
      }
    },
  }
}
