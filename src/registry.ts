import { URL } from 'node:url';

import type { Dialer } from './dialer';
import { DirectDialer } from './dialer';
import type { LookupIPv4, Socks4Scheme } from './socks4_dialer';
import { Socks4Dialer } from './socks4_dialer';
import { redactUrl } from './utils/redact_url';

export const DEFAULT_SOCKS_PORT = 1080;

export interface DialerFromUrlOptions {
    /** Used when the URL carries no username. */
    ident?: string;
    resolveIPv4?: LookupIPv4;
    verbose?: boolean;
}

export type DialerFactory = (url: URL, upstream: Dialer, options: DialerFromUrlOptions) => Dialer;

const dialerFactories = new Map<string, DialerFactory>();

// Accepts both `socks4` and the `socks4:` form of `URL.protocol`.
const normalizeProtocol = (protocol: string): string => {
    const lowerCased = protocol.toLowerCase();
    return lowerCased.endsWith(':') ? lowerCased : `${lowerCased}:`;
};

const decodeUsername = (username: string): string => {
    try {
        return decodeURIComponent(username);
    } catch {
        return username;
    }
};

export const registerDialerType = (protocol: string, factory: DialerFactory): void => {
    dialerFactories.set(normalizeProtocol(protocol), factory);
};

export const isRegisteredProtocol = (protocol: string): boolean => dialerFactories.has(normalizeProtocol(protocol));

const socks4DialerFactory = (scheme: Socks4Scheme): DialerFactory => (url, upstream, options) => {
    if (!url.hostname) {
        throw new Error(`Missing hostname in proxy URL "${redactUrl(url)}"`);
    }

    const port = url.port ? Number(url.port) : DEFAULT_SOCKS_PORT;

    return new Socks4Dialer({
        scheme,
        proxyEndpoint: `${url.hostname}:${port}`,
        upstream,
        ident: url.username ? decodeUsername(url.username) : options.ident,
        resolveIPv4: options.resolveIPv4,
        verbose: options.verbose,
    });
};

registerDialerType('socks4', socks4DialerFactory('socks4'));
registerDialerType('socks4a', socks4DialerFactory('socks4a'));

/**
 * Creates a dialer for a proxy URL such as `socks4a://user@127.0.0.1:1080`.
 * The URL username, when present, becomes the SOCKS4 ident.
 * Pass another proxy's dialer as `upstream` to chain proxies.
 */
export const fromUrl = (
    url: string | URL,
    upstream: Dialer = new DirectDialer(),
    options: DialerFromUrlOptions = {},
): Dialer => {
    const parsed = typeof url === 'object' ? url : new URL(url);

    const factory = dialerFactories.get(parsed.protocol);
    if (!factory) {
        throw new Error(`Unsupported proxy protocol "${parsed.protocol}" (was "${redactUrl(parsed)}")`);
    }

    return factory(parsed, upstream, options);
};
