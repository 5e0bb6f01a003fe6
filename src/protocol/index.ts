export {
  encodeRequest,
  decodeResponse,
  ResponseRecordSchema,
  TERMINATE_REQUEST,
  type RequestRecord,
  type ResponseRecord,
} from './codec.js'

export { loadResidentScript, buildResidentArgv } from './resident.js'
