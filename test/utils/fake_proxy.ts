import { Buffer } from 'node:buffer';
import { Duplex } from 'node:stream';

import type { Dialer } from '../../src/dialer';

interface FakeProxyStreamOptions {
    /** Sent back once the request has been written, `null` sends nothing. */
    reply: Buffer | null;
    /** End the readable side right after the reply. */
    endAfterReply?: boolean;
    writeError?: Error;
}

/**
 * Plays the proxy side of a single SOCKS4 handshake in memory.
 */
export class FakeProxyStream extends Duplex {
    readonly received: Buffer[] = [];

    writeCount = 0;

    constructor(private readonly options: FakeProxyStreamOptions) {
        super();
    }

    get request(): Buffer {
        return Buffer.concat(this.received);
    }

    _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.writeCount++;

        if (this.options.writeError) {
            callback(this.options.writeError);
            return;
        }

        this.received.push(chunk);

        if (this.options.reply !== null) {
            this.push(this.options.reply);
        }

        if (this.options.endAfterReply) {
            this.push(null);
        }

        callback();
    }

    _read(): void {
        // Data is pushed from _write().
    }
}

export const reply = (status: number, extra = ''): Buffer => {
    return Buffer.concat([Buffer.from([0x00, status, 0, 0, 0, 0, 0, 0]), Buffer.from(extra)]);
};

/**
 * Hands out prepared streams and records what it was asked to dial.
 */
export class FakeDialer implements Dialer {
    readonly calls: { network: string, address: string }[] = [];

    constructor(private readonly next: () => Duplex) {}

    async dial(network: string, address: string): Promise<Duplex> {
        this.calls.push({ network, address });
        return this.next();
    }
}
