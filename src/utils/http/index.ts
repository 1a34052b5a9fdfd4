/**
 * HTTP Module
 *
 * Headers, response-body helpers, SSE framing and error mapping.
 */

export { buildRequestHeaders, ORGANIZATION_HEADER, type RequestAuth, type RequestHeaderOptions } from './headerUtils.js';
export { formatSSEChunk, formatSSETerminator } from './sseUtils.js';
export { streamToBuffer, streamToString } from './streamUtils.js';
export {
  errorFromResponseBody,
  extractErrorMessage,
  isSuccessStatus,
  toTransportError,
} from './errorResponseHandler.js';
