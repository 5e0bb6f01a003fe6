/**
 * sandbox-relay CLI - Main entry point
 */

import { parseArgs, toCLIArgs, integerFlag, type ParsedArgs } from './args.js'
import { createRuntime } from './runtime.js'
import { exitCodeFor, writeResult } from './output.js'
import { loadConfig } from '../config/loader.js'
import { startGateway } from '../gateway/index.js'
import type { ExecutionResult } from '../sandbox/types.js'

export const VERSION = '0.1.0'

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const { command, args, flags } = parseArgs(argv)

  if (flags.help) {
    printHelp()
    return
  }

  if (flags.version) {
    console.log(VERSION)
    return
  }

  switch (command) {
    case 'serve':
      await handleServe(flags)
      break
    case 'run-code':
      await handleRun('code', args, flags)
      break
    case 'run-shell':
      await handleRun('shell', args, flags)
      break
    default:
      if (command) console.error(`Unknown command: ${command}\n`)
      printHelp()
      process.exitCode = command ? 1 : 0
  }
}

async function handleServe(flags: ParsedArgs['flags']): Promise<void> {
  const config = await loadConfig(toCLIArgs(flags))
  const runtime = await createRuntime(config)

  const app = await startGateway(
    config.server,
    {
      executor: runtime.executor,
      auditLogger: runtime.auditLogger,
      provider: runtime.platform.provider,
      config: config.server,
      version: VERSION,
    },
    { logLevel: config.logging.level }
  )

  const stop = (signal: string): void => {
    console.log(`\nReceived ${signal}, releasing sessions...`)
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Shutdown failed:', error)
        process.exit(1)
      }
    )
  }
  process.once('SIGINT', () => stop('SIGINT'))
  process.once('SIGTERM', () => stop('SIGTERM'))
}

async function handleRun(
  kind: 'code' | 'shell',
  args: string[],
  flags: ParsedArgs['flags']
): Promise<void> {
  const payload = args.length === 1 && args[0] === '-' ? await readStdin() : args.join(' ')
  if (!payload) {
    console.error(`Usage: sandbox-relay run-${kind} <${kind === 'code' ? 'code' : 'command'}|-> [--timeout ms]`)
    process.exitCode = 1
    return
  }

  const timeoutMs = integerFlag(flags, 'timeout')
  const config = await loadConfig(toCLIArgs(flags))
  const { executor } = await createRuntime(config)

  let result: ExecutionResult
  try {
    result =
      kind === 'code'
        ? await executor.runCode(payload, timeoutMs)
        : await executor.runShell(payload, timeoutMs)
  } finally {
    await executor.shutdown()
  }

  writeResult(result, process)
  process.exitCode = exitCodeFor(result)
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf-8')
}

function printHelp(): void {
  console.log(`sandbox-relay - Remote code execution sessions

Usage:
  sandbox-relay serve [options]              Start the HTTP gateway
  sandbox-relay run-code <code|-> [options]  Run a snippet in a fresh session
  sandbox-relay run-shell <cmd|-> [options]  Run a shell command in a fresh environment

Options:
  -h, --help              Show this help message
  -v, --version           Show version
  --config <path>         Config file (default: ~/.sandbox-relay/config.json)
  --provider <name>       modal | docker | local
  --host <host>           Gateway bind address (serve)
  --port <port>           Gateway port (serve)
  --log-level <level>     debug | info | warn | error
  --timeout <ms>          Call timeout (run-code, run-shell)

Pass - to read the code or command from stdin.
`)
}
