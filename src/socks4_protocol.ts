import { Buffer } from 'node:buffer';
import net from 'node:net';

import { REPLY_LENGTH, SOCKS4_VERSION, socks4Commands } from './statuses';

/**
 * SOCKS4a marks "resolve the hostname for me" with an address of 0.0.0.x, x != 0.
 */
export const SOCKS4_ADDRESS_SENTINEL = '0.0.0.1';

export interface ConnectRequestOptions {
    port: number;
    /** Dotted IPv4 address of the target, or the SOCKS4a sentinel. */
    address: string;
    ident: string;
    /** Only set for SOCKS4a. */
    hostname?: string;
}

export interface Socks4Reply {
    version: number;
    status: number;
    port: number;
    address: string;
}

const ipv4ToBytes = (address: string): Buffer => {
    if (!net.isIPv4(address)) {
        throw new Error(`Not an IPv4 address: ${address}`);
    }

    return Buffer.from(address.split('.').map(Number));
};

/**
 * ```
 * +----+----+----+----+----+----+----+----+----+----+....+----+....+----+
 * | VN | CD | DSTPORT |      DSTIP        | USERID       |NULL| HOST |NULL|
 * +----+----+----+----+----+----+----+----+----+----+....+----+....+----+
 * ```
 * HOST is only present for SOCKS4a.
 */
export const buildConnectRequest = ({ port, address, ident, hostname }: ConnectRequestOptions): Buffer => {
    const header = Buffer.alloc(8);
    header.writeUInt8(SOCKS4_VERSION, 0);
    header.writeUInt8(socks4Commands.CONNECT, 1);
    header.writeUInt16BE(port, 2);
    ipv4ToBytes(address).copy(header, 4);

    const parts = [header, Buffer.from(ident), Buffer.alloc(1)];

    if (hostname !== undefined) {
        parts.push(Buffer.from(hostname), Buffer.alloc(1));
    }

    return Buffer.concat(parts);
};

export const parseReply = (reply: Buffer): Socks4Reply => {
    if (reply.length < REPLY_LENGTH) {
        throw new Error(`SOCKS4 reply must be ${REPLY_LENGTH} bytes long, got ${reply.length}`);
    }

    return {
        version: reply.readUInt8(0),
        status: reply.readUInt8(1),
        port: reply.readUInt16BE(2),
        address: [...reply.subarray(4, 8)].join('.'),
    };
};
