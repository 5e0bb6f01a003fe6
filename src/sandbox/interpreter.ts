import type { AuditLogger } from '../audit/index.js'
import type { EnvironmentHandle, ProcessHandle } from '../platform/types.js'
import type { LineReader, LineWriter } from '../stream/types.js'
import { createLineReader, createLineWriter } from '../stream/adapter.js'
import { runWithTimeout } from '../stream/abort.js'
import {
  decodeResponse,
  encodeRequest,
  TERMINATE_REQUEST,
  type ResponseRecord,
} from '../protocol/codec.js'
import { buildResidentArgv, loadResidentScript } from '../protocol/resident.js'
import {
  ExecutionTimeoutError,
  ProtocolError,
  ProvisioningError,
  SessionTerminatedError,
  TransportError,
} from './errors.js'
import {
  failureResult,
  timeoutResult,
  truncate,
  type ExecutionResult,
  type InterpreterOptions,
  type SessionState,
} from './types.js'
import { attempt } from './cleanup.js'
import { auditExecutionComplete, auditExecutionStart, auditSessionEvent } from './audit.js'

interface ResidentProcess {
  handle: ProcessHandle
  reader: LineReader
  writer: LineWriter
}

/**
 * A long-lived interpreter process inside one environment.
 *
 * Requests are serialized: at most one exchange is in flight. Bindings
 * made by one snippet are visible to the next until the process is
 * replaced. A transport failure marks the session failed; the next call
 * restarts it, and every call gets at most one restart.
 *
 * Each request carries an increasing id. A request that times out keeps
 * running in the process; its late answer is recognized by id and
 * dropped by whichever exchange reads it.
 */
export class InterpreterSession {
  private _state: SessionState = 'absent'
  private _restarts = 0
  private resident: ResidentProcess | null = null
  private lastFailure: unknown = null
  private nextRequestId = 1
  private queue: Promise<void> = Promise.resolve()
  private readonly cleanups = new Set<Promise<void>>()
  private terminating: Promise<void> | null = null
  private readonly shutdown = new AbortController()

  constructor(
    private readonly environment: EnvironmentHandle,
    private readonly options: InterpreterOptions,
    private readonly audit: AuditLogger,
    readonly sessionId: string
  ) {}

  get state(): SessionState {
    return this._state
  }

  /** Restarts performed after a failure, over the session's lifetime. */
  get restarts(): number {
    return this._restarts
  }

  /**
   * Start the resident process ahead of the first execution.
   * No-op when the session is already ready.
   */
  start(): Promise<void> {
    return this.serialize(async () => {
      if (this._state === 'terminated') throw new SessionTerminatedError()
      if (this._state === 'ready') return
      if (this._state === 'failed') {
        await this.restart(this.options.startTimeoutMs)
        return
      }
      await this.startResident(this.options.startTimeoutMs)
    })
  }

  /**
   * Run a snippet and report its output. Never rejects.
   *
   * `timeoutMs` bounds the whole call: spawning and initializing the
   * process when needed, then the exchange itself. `startTime` moves the
   * start of that budget back, for callers that already spent part of it.
   */
  execute(code: string, timeoutMs: number, startTime?: number): Promise<ExecutionResult> {
    return this.serialize(async () => {
      await auditExecutionStart(this.audit, {
        sessionId: this.sessionId,
        path: 'interpreter',
        payloadLength: code.length,
        timeoutMs,
      })

      const result = await this.executeExclusive(code, timeoutMs, startTime ?? Date.now())

      await auditExecutionComplete(this.audit, {
        sessionId: this.sessionId,
        path: 'interpreter',
        result,
      })
      return result
    })
  }

  /**
   * Shut the session down for good. Any in-flight exchange resolves as a
   * failure; queued and later calls fail without touching the process.
   */
  terminate(): Promise<void> {
    if (!this.terminating) {
      this._state = 'terminated'
      this.shutdown.abort(new SessionTerminatedError())
      this.terminating = this.finishTermination()
    }
    return this.terminating
  }

  private async finishTermination(): Promise<void> {
    const resident = this.resident
    this.resident = null
    if (resident) await this.stopResident(resident)
    // The in-flight task unwinds quickly once aborted and may hand off a late process
    await this.queue
    await Promise.all(this.cleanups)
    await auditSessionEvent(this.audit, {
      sessionId: this.sessionId,
      action: 'terminated',
      metadata: { restarts: this._restarts },
    })
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task)
    // The queue only orders tasks; each caller observes its own outcome
    this.queue = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  private async executeExclusive(
    code: string,
    timeoutMs: number,
    startTime: number
  ): Promise<ExecutionResult> {
    const deadline = startTime + timeoutMs
    const remaining = (): number => Math.max(0, deadline - Date.now())
    let restarted = false

    for (;;) {
      try {
        if (this.isTerminated()) throw new SessionTerminatedError()
        if (remaining() === 0) throw new ExecutionTimeoutError(timeoutMs)
        if (this._state === 'failed') {
          if (restarted) throw this.lastFailure
          restarted = true
          await this.restart(remaining())
        } else if (this._state === 'absent') {
          await this.startResident(remaining())
        }

        const response = await this.exchange(code, remaining())
        const stdout = truncate(response.stdout, this.options.maxOutputSize)
        const stderr = truncate(response.stderr, this.options.maxOutputSize)

        return {
          kind: 'success',
          success: response.ok,
          stdout: stdout.text,
          stderr: stderr.text,
          exitCode: null,
          truncated: stdout.truncated || stderr.truncated,
          executionTime: Date.now() - startTime,
        }
      } catch (error) {
        if (error instanceof ExecutionTimeoutError) {
          await this.onTimeout(error)
          return timeoutResult(timeoutMs, startTime)
        }
        if (error instanceof SessionTerminatedError || this.isTerminated()) {
          return failureResult(error, startTime)
        }
        if (error instanceof ProvisioningError) {
          return failureResult(error, startTime)
        }

        await this.markFailed(error)
        if (restarted) return failureResult(error, startTime)
      }
    }
  }

  /**
   * Spawn the resident process and run the init snippet, both within
   * `budgetMs`; the init snippet is further capped by startTimeoutMs.
   * A snippet that reports ok=false is logged and the session still
   * becomes ready; a transport error or timeout leaves it failed. A
   * process that arrives after the budget ran out is stopped.
   */
  private async startResident(budgetMs: number): Promise<void> {
    this._state = 'starting'
    const startedAt = Date.now()

    const spawning = this.spawnResident()
    let resident: ResidentProcess
    try {
      resident = await runWithTimeout(
        budgetMs,
        () => new ExecutionTimeoutError(budgetMs),
        () => spawning,
        this.shutdown.signal
      )
    } catch (error) {
      if (error instanceof ExecutionTimeoutError || error instanceof SessionTerminatedError) {
        this.discardLate(spawning)
      }
      await this.markFailed(error)
      throw error
    }

    // terminate() ran while the process was being spawned
    if (this.isTerminated()) {
      await this.stopResident(resident)
      throw new SessionTerminatedError()
    }
    this.resident = resident

    const left = Math.max(0, budgetMs - (Date.now() - startedAt))
    const initLimit = Math.min(this.options.startTimeoutMs, left)
    try {
      const response = await this.exchange(this.options.initCode, initLimit)
      if (!response.ok) {
        await auditSessionEvent(this.audit, {
          sessionId: this.sessionId,
          action: 'init_failed',
          metadata: { stderrLength: response.stderr.length },
        })
      }
    } catch (error) {
      // startTimeoutMs ran out before the caller's budget did
      const failure =
        error instanceof ExecutionTimeoutError && initLimit < left
          ? new TransportError(`Interpreter did not initialize within ${initLimit}ms`, {
              cause: error,
            })
          : error
      await this.markFailed(failure)
      throw failure
    }

    if (this.isTerminated()) throw new SessionTerminatedError()
    this._state = 'ready'
    await auditSessionEvent(this.audit, { sessionId: this.sessionId, action: 'started' })
  }

  private async spawnResident(): Promise<ResidentProcess> {
    let handle: ProcessHandle
    try {
      const script = await loadResidentScript()
      handle = await this.environment.spawnProcess(
        buildResidentArgv(this.options.command, script)
      )
    } catch (error) {
      if (error instanceof ProvisioningError) throw error
      throw new ProvisioningError('Failed to spawn interpreter process', false, { cause: error })
    }

    return {
      handle,
      reader: createLineReader(handle.stdout),
      writer: createLineWriter(handle.stdin),
    }
  }

  /**
   * Stop a process whose spawn outlived the call that asked for it.
   */
  private discardLate(spawning: Promise<ResidentProcess>): void {
    this.track(
      attempt(
        this.audit,
        'late_spawn_failed',
        async () => this.stopResident(await spawning),
        { sessionId: this.sessionId }
      )
    )
  }

  /**
   * Keep a background teardown step in view until it settles; terminate()
   * waits for all of them. Steps run through attempt() and never reject.
   */
  private track(cleanup: Promise<unknown>): void {
    const done = cleanup.then(() => undefined)
    this.cleanups.add(done)
    void done.then(() => this.cleanups.delete(done))
  }

  private async restart(budgetMs: number): Promise<void> {
    this._restarts++
    await auditSessionEvent(this.audit, {
      sessionId: this.sessionId,
      action: 'restarted',
      error: this.lastFailure ?? undefined,
      metadata: { restarts: this._restarts },
    })

    // The old process winds down on its own time, not the caller's
    const previous = this.resident
    this.resident = null
    if (previous) this.track(this.stopResident(previous))

    await this.startResident(budgetMs)
  }

  private async onTimeout(error: ExecutionTimeoutError): Promise<void> {
    // A session that never became ready cannot be reused
    if (this._state !== 'ready' || this.options.restartOnTimeout) {
      await this.markFailed(error)
    }
  }

  private async markFailed(error: unknown): Promise<void> {
    // Already recorded on the way out of startResident()
    if (this._state === 'failed' && this.lastFailure === error) return
    this.lastFailure = error
    if (this.isTerminated()) return
    this._state = 'failed'
    await auditSessionEvent(this.audit, { sessionId: this.sessionId, action: 'failed', error })
  }

  private isTerminated(): boolean {
    return this._state === 'terminated'
  }

  private exchange(code: string, timeoutMs: number): Promise<ResponseRecord> {
    const resident = this.resident
    if (!resident) {
      return Promise.reject(new TransportError('Interpreter process is not running'))
    }

    const id = this.nextRequestId++
    return runWithTimeout(
      timeoutMs,
      () => new ExecutionTimeoutError(timeoutMs),
      async (signal) => {
        await resident.writer.writeAndFlush(encodeRequest({ id, code }))
        return this.awaitResponse(resident, id, signal)
      },
      this.shutdown.signal
    )
  }

  private async awaitResponse(
    resident: ResidentProcess,
    id: number,
    signal: AbortSignal
  ): Promise<ResponseRecord> {
    for (;;) {
      const line = await resident.reader.readLine(signal)
      if (line === null) {
        throw new TransportError('Interpreter process closed its output stream')
      }

      // Blank lines and stray non-record output
      const record = decodeResponse(line)
      if (record === null) continue

      if (record.id !== undefined && record.id !== null) {
        // Late answer to a request that already timed out
        if (record.id < id) continue
        if (record.id > id) {
          throw new ProtocolError(`Response for request ${record.id} while awaiting ${id}`, line)
        }
      }
      return record
    }
  }

  /**
   * Ask the process to exit, then force-close it regardless. Each step is
   * bounded by the grace period and none of them throws.
   */
  private async stopResident(resident: ResidentProcess): Promise<void> {
    const grace = this.options.terminateGraceMs
    const context = { sessionId: this.sessionId }

    await attempt(
      this.audit,
      'graceful_stop_failed',
      () =>
        runWithTimeout(
          grace,
          () => new ExecutionTimeoutError(grace),
          async (signal) => {
            await resident.writer.writeAndFlush(encodeRequest(TERMINATE_REQUEST))
            await resident.reader.readLine(signal)
          }
        ),
      context
    )

    const kill = resident.handle.kill
    if (kill) {
      await attempt(this.audit, 'kill_failed', () => kill.call(resident.handle), context)
    }

    await attempt(
      this.audit,
      'exit_wait_failed',
      () => runWithTimeout(grace, () => new ExecutionTimeoutError(grace), () => resident.handle.wait()),
      context
    )
  }
}
