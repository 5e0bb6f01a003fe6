import type { Chunk } from './types.js'

const EMPTY = new Uint8Array(0)

/** Length of the sequence `lead` starts, or 0 when it cannot start one. */
function sequenceLength(lead: number): number {
  if (lead < 0x80) return 1
  if (lead >= 0xc2 && lead <= 0xdf) return 2
  if (lead >= 0xe0 && lead <= 0xef) return 3
  if (lead >= 0xf0 && lead <= 0xf4) return 4
  return 0
}

/** Whether `byte` may follow `lead` at `offset` within its sequence. */
function continues(lead: number, offset: number, byte: number): boolean {
  if (offset === 1) {
    // Overlong forms, surrogates and code points past U+10FFFF
    if (lead === 0xe0) return byte >= 0xa0 && byte <= 0xbf
    if (lead === 0xed) return byte >= 0x80 && byte <= 0x9f
    if (lead === 0xf0) return byte >= 0x90 && byte <= 0xbf
    if (lead === 0xf4) return byte >= 0x80 && byte <= 0x8f
  }
  return byte >= 0x80 && byte <= 0xbf
}

/**
 * Split `bytes` into well-formed UTF-8 and an incomplete sequence at the
 * end that the next chunk may finish. Ill-formed subsequences are left out.
 */
function wellFormed(bytes: Uint8Array): { valid: Uint8Array; rest: Uint8Array } {
  const valid = new Uint8Array(bytes.length)
  let length = 0
  let i = 0

  while (i < bytes.length) {
    const lead = bytes[i]
    const size = sequenceLength(lead)
    if (size === 0) {
      i++
      continue
    }

    let end = i + 1
    while (end < i + size && end < bytes.length && continues(lead, end - i, bytes[end])) end++

    if (end === i + size) {
      valid.set(bytes.subarray(i, end), length)
      length += size
    } else if (end === bytes.length) {
      return { valid: valid.subarray(0, length), rest: bytes.slice(i) }
    }
    i = end
  }

  return { valid: valid.subarray(0, length), rest: EMPTY }
}

/**
 * Streaming UTF-8 decoder.
 *
 * Multi-byte sequences split across chunks are reassembled; bytes that
 * cannot be decoded are dropped instead of raising. A U+FFFD the process
 * wrote itself is kept. Text chunks pass through untouched.
 */
export class Utf8Decoder {
  private readonly decoder = new TextDecoder('utf-8', { ignoreBOM: true })
  private pending: Uint8Array = EMPTY

  write(chunk: Chunk): string {
    if (typeof chunk === 'string') return chunk

    let bytes = chunk
    if (this.pending.length > 0) {
      bytes = new Uint8Array(this.pending.length + chunk.length)
      bytes.set(this.pending)
      bytes.set(chunk, this.pending.length)
    }

    const { valid, rest } = wellFormed(bytes)
    this.pending = rest
    return this.decoder.decode(valid)
  }

  /** Flush at end of stream; a sequence still incomplete is dropped. */
  end(): string {
    this.pending = EMPTY
    return ''
  }
}
