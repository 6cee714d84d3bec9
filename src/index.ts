/**
 * mllp-send
 *
 * One-shot MLLP client: frame a message, send it over a single TCP
 * connection and return the deframed reply.
 */

export { exchange, ExchangeState, MLLP_CLIENT_COMPONENT } from './connectors/mllp/MllpExchange.js';
export type { ExchangeOptions, ExchangeStateListener } from './connectors/mllp/MllpExchange.js';
export { probe } from './connectors/mllp/MllpProbe.js';
export { MllpError, MllpErrorKind, isMllpError } from './connectors/mllp/MllpError.js';
export { MLLP_FRAME, frameMessage, unframeMessage, hasCompleteMessage } from './connectors/mllp/MllpFrame.js';
export {
  DEFAULT_HOST,
  DEFAULT_TIMEOUT_SECONDS,
  getDefaultMllpClientProperties,
  toExchangeRequest,
  validateEndpoint,
} from './connectors/mllp/MllpClientProperties.js';
export type { ExchangeRequest, MllpClientProperties } from './connectors/mllp/MllpClientProperties.js';
