export { CookieTransportProvider, serializeCookies } from './cookie-provider.js';
export type { CookieTransportOptions } from './cookie-provider.js';
export { UndiciSession } from './session.js';
export type { UndiciSessionOptions } from './session.js';
export { renderEndpoint, validateEndpoints, isAbsoluteUrl, endpointOrigins } from './endpoints.js';
export type {
  EndpointTemplates,
  QueryParams,
  SessionRequestOptions,
  HttpResponse,
  HttpSession,
  TransportProvider,
  TransportTimeouts,
} from './types.js';
export { DEFAULT_TIMEOUTS, DEFAULT_USER_AGENT } from './types.js';
