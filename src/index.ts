export type { Dialer, DirectDialerOptions } from './dialer';
export { DirectDialer } from './dialer';
export type { LookupIPv4, Socks4DialerOptions, Socks4Scheme } from './socks4_dialer';
export { DEFAULT_IDENT, Socks4Dialer } from './socks4_dialer';
export type { Socks4ErrorCode } from './socks4_error';
export { isSocks4Error, Socks4Error } from './socks4_error';
export type { ConnectRequestOptions, Socks4Reply } from './socks4_protocol';
export { buildConnectRequest, parseReply, SOCKS4_ADDRESS_SENTINEL } from './socks4_protocol';
export { badGatewayStatusCodes, socks4ErrorToStatusCode, socks4ReplyCodes } from './statuses';
export type { DialerFactory, DialerFromUrlOptions } from './registry';
export { DEFAULT_SOCKS_PORT, fromUrl, isRegisteredProtocol, registerDialerType } from './registry';
export type { Socks4ProxyAgentOptions } from './agent';
export { Socks4ProxyAgent } from './agent';
export { redactUrl } from './utils/redact_url';
