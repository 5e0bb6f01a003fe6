import { randomUUID } from 'crypto'
import type { AuditLogger } from '../audit/index.js'
import type { AppConfig } from '../config/schema.js'
import type { SandboxPlatform } from '../platform/types.js'
import { SessionRegistry, type SessionEntry, type SessionSummary } from './registry.js'
import { CommandRunner } from './command.js'
import { failureResult, timeoutResult, type ExecutionResult } from './types.js'
import { emit } from './audit.js'
import { ExecutionTimeoutError, toErrorMessage } from './errors.js'
import { runWithTimeout } from '../stream/abort.js'

/**
 * Configuration for the sandbox executor.
 */
export interface SandboxExecutorConfig {
  defaultTimeoutMs: number
}

/**
 * Per-caller execution facade.
 *
 * Each caller id owns one environment, provisioned on first use, and one
 * interpreter session inside it. Every operation reports through an
 * ExecutionResult; nothing here throws to the caller.
 */
export class SandboxExecutor {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly runner: CommandRunner,
    private readonly config: SandboxExecutorConfig,
    private readonly audit: AuditLogger
  ) {}

  /**
   * Wire an executor from application config.
   */
  static fromConfig(config: AppConfig, platform: SandboxPlatform, audit: AuditLogger): SandboxExecutor {
    const { execution, interpreter, platform: platformConfig } = config

    const registry = new SessionRegistry(
      platform,
      {
        environment: {
          image: platformConfig.image,
          packages: platformConfig.packages,
          cpu: platformConfig.cpu,
          memoryMiB: platformConfig.memoryMiB,
          lifetimeMs: platformConfig.lifetimeMs,
        },
        volume: platformConfig.volume,
        interpreter: {
          command: interpreter.command,
          initCode: interpreter.initCode,
          startTimeoutMs: execution.startTimeoutMs,
          terminateGraceMs: execution.terminateGraceMs,
          maxOutputSize: execution.maxOutputSize,
          restartOnTimeout: execution.restartOnTimeout,
        },
      },
      audit
    )

    const runner = new CommandRunner(audit, {
      shell: execution.shell,
      maxOutputSize: execution.maxOutputSize,
    })

    return new SandboxExecutor(registry, runner, { defaultTimeoutMs: execution.defaultTimeoutMs }, audit)
  }

  /**
   * Run a snippet in the caller's persistent interpreter session.
   */
  async executeCode(callerId: string, code: string, timeoutMs?: number): Promise<ExecutionResult> {
    const startTime = Date.now()
    const timeout = this.resolveTimeout(timeoutMs)
    try {
      const entry = await this.acquireWithin(callerId, timeout)
      return await entry.interpreter.execute(code, timeout, startTime)
    } catch (error) {
      if (error instanceof ExecutionTimeoutError) return timeoutResult(timeout, startTime)
      return failureResult(error, startTime)
    }
  }

  /**
   * Run a one-shot shell command in the caller's environment. Does not
   * start the interpreter session.
   */
  async executeShell(callerId: string, command: string, timeoutMs?: number): Promise<ExecutionResult> {
    const startTime = Date.now()
    const timeout = this.resolveTimeout(timeoutMs)
    try {
      const entry = await this.acquireWithin(callerId, timeout)
      return await this.runner.run(entry.environment, command, timeout, callerId, startTime)
    } catch (error) {
      if (error instanceof ExecutionTimeoutError) return timeoutResult(timeout, startTime)
      return failureResult(error, startTime)
    }
  }

  /**
   * Tear down the caller's session and environment. Idempotent.
   */
  async releaseSession(callerId: string): Promise<void> {
    try {
      await this.registry.release(callerId)
    } catch (error) {
      await emit(this.audit, {
        category: 'sandbox',
        action: 'release_failed',
        severity: 'warning',
        sessionId: callerId,
        metadata: { errorMessage: toErrorMessage(error) },
      })
    }
  }

  /**
   * Run a snippet in a throwaway session released right after.
   */
  async runCode(code: string, timeoutMs?: number): Promise<ExecutionResult> {
    const callerId = `oneshot-${randomUUID()}`
    try {
      return await this.executeCode(callerId, code, timeoutMs)
    } finally {
      await this.releaseSession(callerId)
    }
  }

  /**
   * Run a command in a throwaway environment released right after.
   */
  async runShell(command: string, timeoutMs?: number): Promise<ExecutionResult> {
    const callerId = `oneshot-${randomUUID()}`
    try {
      return await this.executeShell(callerId, command, timeoutMs)
    } finally {
      await this.releaseSession(callerId)
    }
  }

  listSessions(): SessionSummary[] {
    return this.registry.list()
  }

  getSession(callerId: string): SessionSummary | undefined {
    return this.registry.list().find((session) => session.callerId === callerId)
  }

  /**
   * Release every session.
   */
  async shutdown(): Promise<void> {
    await this.registry.releaseAll()
  }

  /**
   * Provisioning counts against the call's timeout. When it runs out the
   * caller gets a timeout; provisioning carries on and the entry is kept
   * for the caller's next call.
   */
  private acquireWithin(callerId: string, timeoutMs: number): Promise<SessionEntry> {
    return runWithTimeout(
      timeoutMs,
      () => new ExecutionTimeoutError(timeoutMs),
      () => this.registry.acquire(callerId)
    )
  }

  private resolveTimeout(timeoutMs: number | undefined): number {
    if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      return this.config.defaultTimeoutMs
    }
    return timeoutMs
  }
}
