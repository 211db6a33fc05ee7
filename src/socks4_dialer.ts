import type { Buffer } from 'node:buffer';
import dns from 'node:dns';
import net from 'node:net';
import type { Duplex } from 'node:stream';

import type { Dialer } from './dialer';
import {
    connectionRejectedError,
    dialFailedError,
    hostUnknownError,
    identRequiredError,
    invalidResponseError,
    ioError,
    wrongAddressError,
    wrongNetworkError,
} from './socks4_error';
import { buildConnectRequest, parseReply, SOCKS4_ADDRESS_SENTINEL } from './socks4_protocol';
import { REPLY_LENGTH, socks4ReplyCodes } from './statuses';
import { readExactly } from './utils/read_exactly';
import type { HostPort } from './utils/split_host_port';
import { splitHostPort } from './utils/split_host_port';

export const DEFAULT_IDENT = 'nobody@0.0.0.0';

export type Socks4Scheme = 'socks4' | 'socks4a';

/**
 * Resolves a hostname to a single dotted IPv4 address.
 */
export type LookupIPv4 = (hostname: string) => Promise<string>;

const lookupIPv4: LookupIPv4 = async (hostname) => {
    const { address } = await dns.promises.lookup(hostname, { family: 4 });
    return address;
};

export interface Socks4DialerOptions {
    scheme: Socks4Scheme;
    /** `host:port` of the SOCKS server itself. */
    proxyEndpoint: string;
    /** Opens the connection to the SOCKS server. */
    upstream: Dialer;
    /** USERID sent with every request. By default `nobody@0.0.0.0`. */
    ident?: string;
    /** Only used by `socks4`, `socks4a` leaves resolving to the proxy. */
    resolveIPv4?: LookupIPv4;
    verbose?: boolean;
}

/**
 * Dials targets through a SOCKS4 or SOCKS4a proxy.
 *
 * The instance holds no per-connection state, so one dialer can serve any number
 * of concurrent `dial()` calls. Being a `Dialer` itself, it can also be the
 * upstream of another dialer to chain proxies.
 */
export class Socks4Dialer implements Dialer {
    readonly scheme: Socks4Scheme;

    readonly proxyEndpoint: string;

    readonly upstream: Dialer;

    readonly ident: string;

    readonly resolveIPv4: LookupIPv4;

    readonly verbose: boolean;

    constructor(options: Socks4DialerOptions) {
        if (options.scheme !== 'socks4' && options.scheme !== 'socks4a') {
            throw new Error(`Unsupported SOCKS4 scheme: ${String(options.scheme)}`);
        }

        const ident = options.ident ?? DEFAULT_IDENT;
        if (ident.includes('\0')) {
            throw new Error('The ident must not contain NUL characters');
        }

        this.scheme = options.scheme;
        this.proxyEndpoint = options.proxyEndpoint;
        this.upstream = options.upstream;
        this.ident = ident;
        this.resolveIPv4 = options.resolveIPv4 ?? lookupIPv4;
        this.verbose = !!options.verbose;
    }

    get isSocks4a(): boolean {
        return this.scheme === 'socks4a';
    }

    log(str: string): void {
        if (this.verbose) {
            // eslint-disable-next-line no-console
            console.log(`Socks4Dialer[${this.proxyEndpoint}]: ${str}`);
        }
    }

    /**
     * Connects to `address` (`host:port`) through the proxy.
     * Resolves with the open stream once the proxy granted the request,
     * otherwise rejects with a `Socks4Error` and the stream is already destroyed.
     */
    async dial(network: string, address: string): Promise<Duplex> {
        if (network !== 'tcp' && network !== 'tcp4') {
            throw wrongNetworkError();
        }

        const target = this.parseTarget(address);

        let socket: Duplex;
        try {
            socket = await this.upstream.dial(network, this.proxyEndpoint);
        } catch (error) {
            this.log(`Failed to connect to proxy: ${String(error)}`);
            throw dialFailedError(error);
        }

        // Failures reach us through the write callback and readExactly().
        const onSocketError = (error: Error) => {
            this.log(`Proxy socket error: ${error.message}`);
        };
        socket.on('error', onSocketError);

        try {
            const request = await this.prepareRequest(target);
            await this.writeRequest(socket, request);

            const reply = await this.readReply(socket);
            this.checkReply(reply);

            this.log(`Connected to ${address}`);

            return socket;
        } catch (error) {
            this.log(`Handshake for ${address} failed: ${String(error)}`);
            socket.destroy();
            throw error;
        } finally {
            socket.off('error', onSocketError);
        }
    }

    private parseTarget(address: string): HostPort {
        let target: HostPort;
        try {
            target = splitHostPort(address);
        } catch (error) {
            throw wrongAddressError(address, error);
        }

        if (target.host.includes('\0')) {
            throw wrongAddressError(address);
        }

        return target;
    }

    private async prepareRequest({ host, port }: HostPort): Promise<Buffer> {
        if (this.isSocks4a) {
            return buildConnectRequest({
                port,
                address: SOCKS4_ADDRESS_SENTINEL,
                ident: this.ident,
                hostname: host,
            });
        }

        let address: string;
        try {
            address = await this.resolveIPv4(host);
        } catch (error) {
            throw hostUnknownError(host, error);
        }

        if (!net.isIPv4(address)) {
            throw hostUnknownError(host, new Error(`Lookup returned a non-IPv4 address ${address}`));
        }

        return buildConnectRequest({ port, address, ident: this.ident });
    }

    private async writeRequest(socket: Duplex, request: Buffer): Promise<void> {
        return new Promise((resolve, reject) => {
            socket.write(request, (error) => {
                if (error) {
                    reject(ioError(error));
                    return;
                }

                resolve();
            });
        });
    }

    private async readReply(socket: Duplex): Promise<Buffer> {
        try {
            return await readExactly(socket, REPLY_LENGTH);
        } catch (error) {
            throw ioError(error);
        }
    }

    private checkReply(reply: Buffer): void {
        const { status } = parseReply(reply);

        switch (status) {
            case socks4ReplyCodes.GRANTED:
                return;
            case socks4ReplyCodes.IDENT_REQUIRED:
            case socks4ReplyCodes.IDENT_FAILED:
                throw identRequiredError(status);
            case socks4ReplyCodes.REJECTED:
                throw connectionRejectedError(status);
            default:
                throw invalidResponseError(status);
        }
    }
}
