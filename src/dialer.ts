import type dns from 'node:dns';
import net from 'node:net';
import type { Duplex } from 'node:stream';

import { splitHostPort } from './utils/split_host_port';

/**
 * Opens a byte stream to `address` (`host:port`) over `network` (`tcp`, `tcp4`, ...).
 * The stream is handed over open and the caller owns it from then on.
 */
export interface Dialer {
    dial(network: string, address: string): Promise<Duplex>;
}

export interface DirectDialerOptions {
    localAddress?: string;
    dnsLookup?: typeof dns['lookup'];
}

const networkToFamily = (network: string): number | undefined => {
    switch (network) {
        case 'tcp':
            return undefined;
        case 'tcp4':
            return 4;
        case 'tcp6':
            return 6;
        default:
            throw new Error(`Unsupported network: ${network}`);
    }
};

/**
 * Connects straight to the address with `net.createConnection`.
 */
export class DirectDialer implements Dialer {
    readonly localAddress?: string;

    readonly dnsLookup?: typeof dns['lookup'];

    constructor(options: DirectDialerOptions = {}) {
        this.localAddress = options.localAddress;
        this.dnsLookup = options.dnsLookup;
    }

    async dial(network: string, address: string): Promise<Duplex> {
        const family = networkToFamily(network);
        const { host, port } = splitHostPort(address);

        return new Promise((resolve, reject) => {
            const socket = net.createConnection({
                host,
                port,
                family,
                localAddress: this.localAddress,
                lookup: this.dnsLookup,
            });

            socket.once('error', reject);
            socket.once('connect', () => {
                socket.off('error', reject);
                resolve(socket);
            });
        });
    }
}
