import util from 'node:util';

export type Socks4ErrorCode =
    | 'WRONG_NETWORK'
    | 'WRONG_ADDRESS'
    | 'DIAL_FAILED'
    | 'HOST_UNKNOWN'
    | 'IO_ERROR'
    | 'IDENT_REQUIRED'
    | 'CONNECTION_REJECTED'
    | 'INVALID_RESPONSE';

interface Socks4ErrorOptions {
    cause?: unknown;
    replyCode?: number;
}

/**
 * Represents a failed SOCKS4 handshake.
 * The `code` tells which step failed and `cause` carries the underlying
 * transport or DNS error, where there is one.
 */
export class Socks4Error extends Error {
    readonly code: Socks4ErrorCode;

    /**
     * Raw status byte of the proxy reply, set whenever the reply was read but not granted.
     */
    readonly replyCode?: number;

    constructor(code: Socks4ErrorCode, message: string, options: Socks4ErrorOptions = {}) {
        const { cause, replyCode } = options;
        super(util.types.isNativeError(cause) ? `${message}: ${cause.message}` : message, { cause });
        this.name = Socks4Error.name;
        this.code = code;
        this.replyCode = replyCode;

        Error.captureStackTrace(this, Socks4Error);
    }
}

export const isSocks4Error = (value: unknown, code?: Socks4ErrorCode): value is Socks4Error => {
    return value instanceof Socks4Error && (code === undefined || value.code === code);
};

export const wrongNetworkError = (): Socks4Error => new Socks4Error('WRONG_NETWORK', 'network should be tcp or tcp4');

export const wrongAddressError = (address: string, cause?: unknown): Socks4Error => {
    return new Socks4Error('WRONG_ADDRESS', `wrong addr: ${address}`, { cause });
};

export const dialFailedError = (cause: unknown): Socks4Error => new Socks4Error('DIAL_FAILED', 'socks4 dial', { cause });

export const hostUnknownError = (host: string, cause: unknown): Socks4Error => {
    return new Socks4Error('HOST_UNKNOWN', `unable to find IP address of host ${host}`, { cause });
};

export const ioError = (cause: unknown): Socks4Error => new Socks4Error('IO_ERROR', 'i/o error', { cause });

export const identRequiredError = (replyCode: number): Socks4Error => {
    return new Socks4Error('IDENT_REQUIRED', 'valid ident required', { replyCode });
};

export const connectionRejectedError = (replyCode: number): Socks4Error => {
    return new Socks4Error('CONNECTION_REJECTED', 'connection to remote host was rejected', { replyCode });
};

export const invalidResponseError = (replyCode: number): Socks4Error => {
    return new Socks4Error('INVALID_RESPONSE', `unknown socks4 server response ${replyCode}`, { replyCode });
};
