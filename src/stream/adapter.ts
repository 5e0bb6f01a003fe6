import type {
  BufferedSource,
  CallbackSink,
  Chunk,
  DrainResult,
  IterableSource,
  LineReader,
  LineSource,
  LineWriter,
  ReadableSource,
  TextSink,
  WritableSink,
} from './types.js'
import { Utf8Decoder } from './decode.js'
import { abortable } from './abort.js'
import { TransportError } from '../sandbox/errors.js'

/**
 * Shared buffering for every source shape.
 *
 * Subclasses only say how to pull the next chunk. At most one pull is in
 * flight; a reader that gives up (signal aborted) leaves whatever arrives
 * later in the buffer for the next reader.
 */
abstract class BufferedLineReader implements LineReader {
  private buffer = ''
  private ended = false
  private filling: Promise<void> | null = null
  private readonly decoder = new Utf8Decoder()

  /** Next chunk, or null at end of stream. */
  protected abstract pull(): Promise<Chunk | null>

  async readLine(signal?: AbortSignal): Promise<string | null> {
    for (;;) {
      signal?.throwIfAborted()

      const newline = this.buffer.indexOf('\n')
      if (newline !== -1) {
        const line = this.buffer.slice(0, newline)
        this.buffer = this.buffer.slice(newline + 1)
        return line.endsWith('\r') ? line.slice(0, -1) : line
      }

      if (this.ended) {
        if (this.buffer.length === 0) return null
        const rest = this.buffer
        this.buffer = ''
        return rest
      }

      await abortable(this.fill(), signal)
    }
  }

  async readAll(options: { signal?: AbortSignal; maxLength?: number } = {}): Promise<DrainResult> {
    const maxLength = options.maxLength ?? Number.POSITIVE_INFINITY
    let text = ''
    let truncated = false

    for (;;) {
      options.signal?.throwIfAborted()

      if (this.buffer.length > 0) {
        const remaining = maxLength - text.length
        if (this.buffer.length > remaining) {
          text += this.buffer.slice(0, Math.max(remaining, 0))
          truncated = true
        } else {
          text += this.buffer
        }
        this.buffer = ''
      }

      if (this.ended) return { text, truncated }

      await abortable(this.fill(), options.signal)
    }
  }

  private fill(): Promise<void> {
    if (!this.filling) {
      this.filling = this.pull()
        .then((chunk) => {
          if (chunk === null) {
            this.buffer += this.decoder.end()
            this.ended = true
          } else {
            this.buffer += this.decoder.write(chunk)
          }
        })
        .finally(() => {
          this.filling = null
        })
    }
    return this.filling
  }
}

/**
 * (a) Push-style async iterator over chunks.
 */
class IterableLineReader extends BufferedLineReader {
  private readonly iterator: AsyncIterator<Chunk>

  constructor(source: IterableSource) {
    super()
    this.iterator = source[Symbol.asyncIterator]()
  }

  protected async pull(): Promise<Chunk | null> {
    const next = await this.iterator.next()
    return next.done ? null : next.value
  }
}

/**
 * (b) Explicit "read one line" primitive. An empty read is end of stream.
 */
class ReadLineSourceReader extends BufferedLineReader {
  constructor(private readonly source: LineSource) {
    super()
  }

  protected async pull(): Promise<Chunk | null> {
    const chunk = await this.source.readLine()
    if (chunk === null || chunk.length === 0) return null
    return chunk
  }
}

/**
 * (c) Whole-buffer reader: the first read returns everything.
 */
class WholeBufferReader extends BufferedLineReader {
  private consumed = false

  constructor(private readonly source: BufferedSource) {
    super()
  }

  protected async pull(): Promise<Chunk | null> {
    if (this.consumed) return null
    this.consumed = true
    const chunk = await this.source.read()
    if (chunk === null || chunk.length === 0) return null
    return chunk
  }
}

/**
 * (d) No stream at all: every read ends immediately.
 */
class EmptyLineReader implements LineReader {
  async readLine(): Promise<string | null> {
    return null
  }

  async readAll(): Promise<DrainResult> {
    return { text: '', truncated: false }
  }
}

function isIterableSource(
  source: IterableSource | LineSource | BufferedSource
): source is IterableSource {
  return Symbol.asyncIterator in source
}

/**
 * Pick the adapter for a platform stream once, at construction.
 */
export function createLineReader(source: ReadableSource): LineReader {
  if (source === null) return new EmptyLineReader()
  if (isIterableSource(source)) return new IterableLineReader(source)
  if ('readLine' in source) return new ReadLineSourceReader(source)
  return new WholeBufferReader(source)
}

class TextSinkWriter implements LineWriter {
  constructor(private readonly sink: TextSink) {}

  async writeAndFlush(text: string): Promise<void> {
    try {
      await this.sink.writeText(text)
    } catch (error) {
      throw new TransportError('Failed to write to process stdin', { cause: error })
    }
  }
}

class CallbackSinkWriter implements LineWriter {
  constructor(private readonly sink: CallbackSink) {}

  writeAndFlush(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.sink.write(text, (error) => {
          if (error) {
            reject(new TransportError('Failed to write to process stdin', { cause: error }))
          } else {
            resolve()
          }
        })
      } catch (error) {
        reject(new TransportError('Failed to write to process stdin', { cause: error }))
      }
    })
  }
}

class MissingSinkWriter implements LineWriter {
  async writeAndFlush(): Promise<void> {
    throw new TransportError('Process stdin is unavailable')
  }
}

export function createLineWriter(sink: WritableSink): LineWriter {
  if (sink === null) return new MissingSinkWriter()
  if ('writeText' in sink) return new TextSinkWriter(sink)
  return new CallbackSinkWriter(sink)
}
