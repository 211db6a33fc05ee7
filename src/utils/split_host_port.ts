export interface HostPort {
    host: string;
    port: number;
}

/**
 * Splits `host:port` or `[host]:port` into its parts.
 * The port must be a decimal number in the 1-65535 range.
 */
export const splitHostPort = (address: string): HostPort => {
    let host: string;
    let rawPort: string;

    if (address.startsWith('[')) {
        const end = address.indexOf(']');
        if (end === -1) {
            throw new Error('missing \']\' in address');
        }

        if (address[end + 1] !== ':') {
            throw new Error('missing port in address');
        }

        host = address.slice(1, end);
        rawPort = address.slice(end + 2);
    } else {
        const colon = address.lastIndexOf(':');
        if (colon === -1) {
            throw new Error('missing port in address');
        }

        host = address.slice(0, colon);
        rawPort = address.slice(colon + 1);

        if (host.includes(':')) {
            throw new Error('too many colons in address');
        }
    }

    if (!host) {
        throw new Error('missing host in address');
    }

    if (!/^[0-9]+$/.test(rawPort)) {
        throw new Error(`invalid port "${rawPort}"`);
    }

    const port = Number(rawPort);
    if (port < 1 || port > 65535) {
        throw new Error(`port ${port} out of range`);
    }

    return { host, port };
};
