import type { AuditLogger } from '../audit/index.js'
import type {
  EnvironmentHandle,
  EnvironmentSpec,
  SandboxPlatform,
  VolumeMount,
} from '../platform/types.js'
import type { VolumeConfig } from '../config/schema.js'
import type { InterpreterOptions } from './types.js'
import { InterpreterSession } from './interpreter.js'
import { attempt } from './cleanup.js'
import { auditVolumeFallback, emit } from './audit.js'

/**
 * Everything a caller owns: one environment and its interpreter session.
 */
export interface SessionEntry {
  callerId: string
  environment: EnvironmentHandle
  interpreter: InterpreterSession
  volumeAttached: boolean
  createdAt: Date
}

export interface SessionSummary {
  callerId: string
  environmentId: string
  state: InterpreterSession['state']
  restarts: number
  volumeAttached: boolean
  createdAt: string
}

export interface SessionRegistryOptions {
  environment: Omit<EnvironmentSpec, 'volumes'>
  volume: VolumeConfig
  interpreter: InterpreterOptions
}

/**
 * Maps caller ids to their environment and interpreter session.
 *
 * Provisioning is deduplicated per caller: concurrent acquires for the
 * same id share one pending environment. A failed provisioning leaves no
 * entry behind, so the next acquire tries again.
 */
export class SessionRegistry {
  private readonly pending = new Map<string, Promise<SessionEntry>>()
  private readonly ready = new Map<string, SessionEntry>()

  constructor(
    private readonly platform: SandboxPlatform,
    private readonly options: SessionRegistryOptions,
    private readonly audit: AuditLogger
  ) {}

  /**
   * Return the caller's entry, provisioning it on first use.
   */
  acquire(callerId: string): Promise<SessionEntry> {
    const existing = this.pending.get(callerId)
    if (existing) return existing

    const provisioning = this.provision(callerId)
    this.pending.set(callerId, provisioning)

    void provisioning.then(
      (entry) => {
        if (this.pending.get(callerId) === provisioning) this.ready.set(callerId, entry)
      },
      () => {
        if (this.pending.get(callerId) === provisioning) this.pending.delete(callerId)
      }
    )

    return provisioning
  }

  /**
   * Entry for `callerId` if provisioning has completed.
   */
  peek(callerId: string): SessionEntry | undefined {
    return this.ready.get(callerId)
  }

  has(callerId: string): boolean {
    return this.pending.has(callerId)
  }

  list(): SessionSummary[] {
    return [...this.ready.values()].map((entry) => ({
      callerId: entry.callerId,
      environmentId: entry.environment.id,
      state: entry.interpreter.state,
      restarts: entry.interpreter.restarts,
      volumeAttached: entry.volumeAttached,
      createdAt: entry.createdAt.toISOString(),
    }))
  }

  /**
   * Terminate the caller's session and environment. Idempotent; teardown
   * failures are logged, never raised.
   */
  async release(callerId: string): Promise<void> {
    const provisioning = this.pending.get(callerId)
    if (!provisioning) return

    this.pending.delete(callerId)
    this.ready.delete(callerId)

    let entry: SessionEntry
    try {
      entry = await provisioning
    } catch {
      // Provisioning failed: its caller already saw the error, nothing to tear down
      return
    }

    await this.teardown(entry)
  }

  /**
   * Release every caller.
   */
  async releaseAll(): Promise<void> {
    await Promise.all([...this.pending.keys()].map((callerId) => this.release(callerId)))
  }

  private async provision(callerId: string): Promise<SessionEntry> {
    const volumes = await this.openVolumes(callerId)
    const environment = await this.platform.provision({
      ...this.options.environment,
      volumes,
    })

    await emit(this.audit, {
      category: 'platform',
      action: 'environment_provisioned',
      sessionId: callerId,
      metadata: {
        provider: this.platform.provider,
        environmentId: environment.id,
        image: this.options.environment.image,
        volumeAttached: volumes.length > 0,
      },
    })

    return {
      callerId,
      environment,
      interpreter: new InterpreterSession(
        environment,
        this.options.interpreter,
        this.audit,
        callerId
      ),
      volumeAttached: volumes.length > 0,
      createdAt: new Date(),
    }
  }

  /**
   * The tool-module volume is optional: when it cannot be opened the
   * environment is provisioned without it.
   */
  private async openVolumes(callerId: string): Promise<VolumeMount[]> {
    const { volume } = this.options
    if (!volume.enabled) return []

    try {
      const handle = await this.platform.openVolume(volume.name)
      return [{ mountPath: volume.mountPath, volume: handle }]
    } catch (error) {
      await auditVolumeFallback(this.audit, {
        sessionId: callerId,
        volumeName: volume.name,
        error,
      })
      return []
    }
  }

  private async teardown(entry: SessionEntry): Promise<void> {
    const context = {
      category: 'platform' as const,
      sessionId: entry.callerId,
      metadata: { environmentId: entry.environment.id },
    }

    await attempt(this.audit, 'session_terminate_failed', () => entry.interpreter.terminate(), context)
    const released = await attempt(
      this.audit,
      'environment_terminate_failed',
      () => entry.environment.terminate(),
      context
    )

    if (released) {
      await emit(this.audit, {
        category: 'platform',
        action: 'environment_released',
        sessionId: entry.callerId,
        metadata: { environmentId: entry.environment.id },
      })
    }
  }
}
