import { z } from 'zod'
import { ProtocolError } from '../sandbox/errors.js'

/**
 * Request sent to the resident process: run a snippet, or stop.
 */
export type RequestRecord =
  | { id: number; code: string }
  | { _terminate: true }

/**
 * Response record written by the resident process, one per request.
 * `id` echoes the request it answers; older residents may omit it.
 */
export const ResponseRecordSchema = z.object({
  id: z.number().int().nullish(),
  ok: z.boolean(),
  stdout: z.string(),
  stderr: z.string(),
})

export type ResponseRecord = z.infer<typeof ResponseRecordSchema>

export const TERMINATE_REQUEST: RequestRecord = { _terminate: true }

/**
 * Serialize a request as one newline-terminated JSON line.
 */
export function encodeRequest(record: RequestRecord): string {
  return JSON.stringify(record) + '\n'
}

/**
 * Decode one response line.
 *
 * Returns null for lines that are not JSON at all (blank lines, stray
 * output written straight to the process stdout) so the caller can skip
 * to the next newline. JSON that is not a response record is a protocol
 * error.
 */
export function decodeResponse(line: string): ResponseRecord | null {
  const trimmed = line.trim()
  if (trimmed.length === 0) return null

  let parsed: unknown
  try {
    parsed = JSON.parse(trimmed)
  } catch {
    return null
  }

  const result = ResponseRecordSchema.safeParse(parsed)
  if (!result.success) {
    throw new ProtocolError(
      `Malformed response record: ${result.error.issues.map((i) => i.path.join('.') || i.message).join(', ')}`,
      trimmed
    )
  }

  return result.data
}
