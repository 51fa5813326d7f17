/**
 * Clients Exports
 *
 * Outbound transports for provider APIs
 */

export {
  HttpTransport,
  TransportError,
  type HttpTransportDependencies,
  type OutboundRequest,
  type RequestTransport,
} from './http-transport/index.js';
