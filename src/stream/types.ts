/**
 * A chunk as platforms deliver it: text or raw bytes.
 */
export type Chunk = string | Uint8Array

/**
 * Push-style source: any async iterable of chunks (Node Readable,
 * async generator, web stream adapted by the platform).
 */
export type IterableSource = AsyncIterable<Chunk>

/**
 * Source exposing an explicit "read one line" primitive.
 * An empty result or null means end of stream.
 */
export interface LineSource {
  readLine(): Chunk | null | Promise<Chunk | null>
}

/**
 * Plain buffered reader: one read returns everything remaining.
 */
export interface BufferedSource {
  read(): Chunk | null | Promise<Chunk | null>
}

/**
 * Every readable shape a platform may hand back, including no stream at all.
 */
export type ReadableSource = IterableSource | LineSource | BufferedSource | null

/**
 * Sink with an asynchronous text write (remote platform clients).
 */
export interface TextSink {
  writeText(text: string): Promise<void>
}

/**
 * Node-style writable: callback-completed write.
 */
export interface CallbackSink {
  write(chunk: string, callback: (error?: Error | null) => void): boolean
}

export type WritableSink = TextSink | CallbackSink | null

/**
 * Result of draining a stream to its end.
 */
export interface DrainResult {
  text: string
  truncated: boolean
}

/**
 * Line-oriented read contract shared by every adapter.
 */
export interface LineReader {
  /**
   * Next line without its terminator; null once the stream has ended.
   * Aborting the signal rejects the call without consuming any line.
   */
  readLine(signal?: AbortSignal): Promise<string | null>

  /** Read everything until end of stream. */
  readAll(options?: { signal?: AbortSignal; maxLength?: number }): Promise<DrainResult>
}

export interface LineWriter {
  writeAndFlush(text: string): Promise<void>
}
