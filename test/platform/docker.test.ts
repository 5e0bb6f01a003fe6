import { describe, it, expect } from 'vitest'
import {
  buildExecArgs,
  buildKillArgs,
  buildRunArgs,
  DockerVolume,
  DEFAULT_DOCKER_OPTIONS,
} from '../../src/platform/docker.js'
import type { EnvironmentSpec } from '../../src/platform/types.js'
import { ProvisioningError } from '../../src/sandbox/errors.js'

const SPEC: EnvironmentSpec = {
  image: 'python:3.12-slim',
  packages: ['numpy'],
  cpu: 2,
  memoryMiB: 1024,
  lifetimeMs: 90500,
  volumes: [],
}

describe('buildRunArgs', () => {
  it('starts a hardened idle container', () => {
    expect(buildRunArgs('env-1', SPEC, DEFAULT_DOCKER_OPTIONS)).toEqual([
      'run',
      '-d',
      '--rm',
      '--name=env-1',
      '--network=none',
      '--cap-drop=ALL',
      '--security-opt=no-new-privileges',
      '--memory=1024m',
      '--cpus=2',
      '--pids-limit=64',
      'python:3.12-slim',
      'sleep',
      '91',
    ])
  })

  it('honours the network mode and pids limit', () => {
    const args = buildRunArgs('env-1', SPEC, { networkMode: 'bridge', pidsLimit: 16 })

    expect(args).toContain('--network=bridge')
    expect(args).toContain('--pids-limit=16')
  })

  it('mounts docker volumes read-only before the image', () => {
    const args = buildRunArgs(
      'env-1',
      { ...SPEC, volumes: [{ mountPath: '/mnt/servers', volume: new DockerVolume('tools') }] },
      DEFAULT_DOCKER_OPTIONS
    )

    const flag = args.indexOf('-v')
    expect(args[flag + 1]).toBe('tools:/mnt/servers:ro')
    expect(flag).toBeLessThan(args.indexOf('python:3.12-slim'))
  })

  it('rejects volumes opened elsewhere', () => {
    expect(() =>
      buildRunArgs(
        'env-1',
        { ...SPEC, volumes: [{ mountPath: '/mnt/servers', volume: { name: 'tools' } }] },
        DEFAULT_DOCKER_OPTIONS
      )
    ).toThrow(ProvisioningError)
  })
})

describe('buildExecArgs', () => {
  it('records the pid of a long-lived process', () => {
    expect(buildExecArgs('c-1', ['python3', '-u', '-c', 'loop'], '/tmp/p.pid')).toEqual([
      'exec',
      '-i',
      'c-1',
      'sh',
      '-c',
      'echo $$ > "$0" && exec "$@"',
      '/tmp/p.pid',
      'python3',
      '-u',
      '-c',
      'loop',
    ])
  })

  it('puts a timed command under an in-container deadline', () => {
    expect(buildExecArgs('c-1', ['bash', '-c', 'sleep 9'], '/tmp/p.pid', 1500)).toEqual([
      'exec',
      '-i',
      'c-1',
      'sh',
      '-c',
      'echo -$$ > "$0" && exec "$@"',
      '/tmp/p.pid',
      'timeout',
      '-s',
      'KILL',
      '2',
      'bash',
      '-c',
      'sleep 9',
    ])
  })
})

describe('buildKillArgs', () => {
  it('kills what the pid file names inside the container', () => {
    expect(buildKillArgs('c-1', '/tmp/p.pid')).toEqual([
      'exec',
      'c-1',
      'sh',
      '-c',
      'kill -s KILL -- $(cat "$0")',
      '/tmp/p.pid',
    ])
  })
})
