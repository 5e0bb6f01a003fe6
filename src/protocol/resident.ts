import { readFile } from 'fs/promises'

const RESIDENT_SCRIPT_URL = new URL('../../resources/resident.py', import.meta.url)

let residentScript: Promise<string> | null = null

/**
 * Source of the resident loop that runs inside the environment.
 * Read once per process.
 */
export function loadResidentScript(): Promise<string> {
  if (!residentScript) {
    residentScript = readFile(RESIDENT_SCRIPT_URL, 'utf-8').catch((error: unknown) => {
      residentScript = null
      throw error
    })
  }
  return residentScript
}

/**
 * Argv that starts the resident loop with the given interpreter command,
 * e.g. `['python3', '-u']` -> `['python3', '-u', '-c', <script>]`.
 */
export function buildResidentArgv(command: readonly string[], script: string): string[] {
  return [...command, '-c', script]
}
