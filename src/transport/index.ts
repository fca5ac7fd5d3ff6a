export { HttpTransport, deriveUploadUrl, API_KEY_HEADER, type HttpTransportOptions } from './httpTransport.js'
export type { Transport, PollResult, PollResultKind, FetchFn } from './types.js'
