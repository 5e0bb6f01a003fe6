import type { AuditLogger } from '../audit/index.js'
import type { EnvironmentHandle, ProcessHandle } from '../platform/types.js'
import { createLineReader } from '../stream/adapter.js'
import { abortable, runWithTimeout } from '../stream/abort.js'
import { ExecutionTimeoutError } from './errors.js'
import {
  DEFAULT_COMMAND_OPTIONS,
  failureResult,
  timeoutResult,
  type CommandOptions,
  type ExecutionResult,
} from './types.js'
import { attempt } from './cleanup.js'
import { auditExecutionComplete, auditExecutionStart } from './audit.js'

/**
 * One-shot shell commands in a fresh process.
 *
 * No state survives between commands beyond what the command itself
 * leaves in the environment's filesystem. Runs independently of the
 * environment's interpreter session.
 */
export class CommandRunner {
  private readonly options: CommandOptions

  constructor(
    private readonly audit: AuditLogger,
    options: Partial<CommandOptions> = {}
  ) {
    this.options = { ...DEFAULT_COMMAND_OPTIONS, ...options }
  }

  /**
   * Run `command` under the configured shell. Never rejects.
   *
   * `timeoutMs` counts from `startTime`, which callers set when part of
   * the budget went elsewhere (provisioning).
   */
  async run(
    environment: EnvironmentHandle,
    command: string,
    timeoutMs: number,
    sessionId: string,
    startTime = Date.now()
  ): Promise<ExecutionResult> {
    await auditExecutionStart(this.audit, {
      sessionId,
      path: 'command',
      payloadLength: command.length,
      timeoutMs,
    })

    const result = await this.runProcess(environment, command, timeoutMs, sessionId, startTime)

    await auditExecutionComplete(this.audit, { sessionId, path: 'command', result })
    return result
  }

  private async runProcess(
    environment: EnvironmentHandle,
    command: string,
    timeoutMs: number,
    sessionId: string,
    startTime: number
  ): Promise<ExecutionResult> {
    const spawned: { handle?: ProcessHandle } = {}
    const maxLength = this.options.maxOutputSize
    const budget = Math.max(0, startTime + timeoutMs - Date.now())

    try {
      return await runWithTimeout(
        budget,
        () => new ExecutionTimeoutError(timeoutMs),
        async (signal) => {
          const handle = await environment.spawnProcess([this.options.shell, '-c', command], {
            timeoutMs: Math.max(1, budget),
          })
          spawned.handle = handle

          // Spawn outlived the budget: nobody is waiting for this process
          if (signal.aborted) {
            await this.kill(handle, sessionId)
            throw signal.reason
          }

          // Both streams drain concurrently so neither pipe fills up
          const [stdout, stderr] = await Promise.all([
            createLineReader(handle.stdout).readAll({ signal, maxLength }),
            createLineReader(handle.stderr).readAll({ signal, maxLength }),
          ])
          const exitCode = await abortable(handle.wait(), signal)

          return {
            kind: 'success' as const,
            success: exitCode === 0,
            stdout: stdout.text,
            stderr: stderr.text,
            exitCode,
            truncated: stdout.truncated || stderr.truncated,
            executionTime: Date.now() - startTime,
          }
        }
      )
    } catch (error) {
      if (error instanceof ExecutionTimeoutError) {
        if (spawned.handle) await this.kill(spawned.handle, sessionId)
        return timeoutResult(timeoutMs, startTime)
      }
      return failureResult(error, startTime)
    }
  }

  private async kill(handle: ProcessHandle, sessionId: string): Promise<void> {
    const kill = handle.kill
    if (!kill) return
    await attempt(this.audit, 'command_kill_failed', () => kill.call(handle), {
      category: 'sandbox',
      sessionId,
    })
  }
}
