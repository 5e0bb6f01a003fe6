export type {
  Chunk,
  IterableSource,
  LineSource,
  BufferedSource,
  ReadableSource,
  TextSink,
  CallbackSink,
  WritableSink,
  DrainResult,
  LineReader,
  LineWriter,
} from './types.js'

export { createLineReader, createLineWriter } from './adapter.js'
export { Utf8Decoder } from './decode.js'
export { abortable, runWithTimeout } from './abort.js'
