/**
 * HTTP Transport Exports
 */

export {
  HttpTransport,
  TransportError,
  type OutboundRequest,
  type RequestTransport,
  type HttpTransportDependencies,
} from './http-transport.js';
