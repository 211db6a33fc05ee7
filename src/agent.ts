import type http from 'node:http';
import net from 'node:net';
import type { Duplex } from 'node:stream';
import tls from 'node:tls';
import { URL } from 'node:url';

import type { AgentConnectOpts } from 'agent-base';
import { Agent } from 'agent-base';

import type { Dialer } from './dialer';
import type { DialerFromUrlOptions } from './registry';
import { fromUrl } from './registry';

export type Socks4ProxyAgentOptions = http.AgentOptions & DialerFromUrlOptions;

/**
 * An `http.Agent` that opens every connection through a SOCKS4(a) dialer.
 *
 * ```
 * const agent = new Socks4ProxyAgent('socks4a://127.0.0.1:1080');
 * http.get('http://example.com', { agent });
 * ```
 */
export class Socks4ProxyAgent extends Agent {
    readonly dialer: Dialer;

    constructor(proxy: string | URL | Dialer, options: Socks4ProxyAgentOptions = {}) {
        super(options);

        this.dialer = typeof proxy === 'string' || proxy instanceof URL
            ? fromUrl(proxy, undefined, options)
            : proxy;
    }

    async connect(_request: http.ClientRequest, opts: AgentConnectOpts): Promise<Duplex> {
        const { host } = opts;
        if (!host) {
            throw new Error('No `host` defined!');
        }

        const port = opts.port ?? (opts.secureEndpoint ? 443 : 80);
        const address = net.isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;

        const socket = await this.dialer.dial('tcp', address);

        if (opts.secureEndpoint) {
            // host, port and path describe the target, TLS runs over the proxied socket
            const { host: _host, port: _port, path: _path, ...tlsOptions } = opts;
            const tlsSocket = tls.connect({
                ...tlsOptions,
                socket,
                // an IP address is not a valid SNI name
                servername: opts.servername ?? (net.isIP(host) ? undefined : host),
            });

            tlsSocket.once('error', () => {
                socket.destroy();
            });

            return tlsSocket;
        }

        return socket;
    }
}
