import util from 'node:util';

import type { Socks4Error } from './socks4_error';

type HttpStatusCode = number;

export const SOCKS4_VERSION = 0x04;

export const socks4Commands = {
    CONNECT: 0x01,
    /**
     * Listed for completeness, this client never sends BIND.
     */
    BIND: 0x02,
} as const;

export const socks4ReplyCodes = {
    /**
     * Request granted.
     */
    GRANTED: 0x5a,
    /**
     * Request rejected or failed.
     */
    REJECTED: 0x5b,
    /**
     * The proxy cannot connect to identd on the client.
     */
    IDENT_REQUIRED: 0x5c,
    /**
     * identd reported a different user-id than the one in the request.
     */
    IDENT_FAILED: 0x5d,
} as const;

export const REPLY_LENGTH = 8;

export const badGatewayStatusCodes = {
    /**
     * Upstream has timed out.
     */
    TIMEOUT: 504,
    /**
     * DNS lookup failed - EAI_NODATA or EAI_NONAME.
     */
    NOT_FOUND: 593,
    /**
     * Upstream refused connection.
     */
    CONNECTION_REFUSED: 594,
    /**
     * Connection reset due to loss of connection or timeout.
     */
    CONNECTION_RESET: 595,
    /**
     * Trying to write on a closed socket.
     */
    BROKEN_PIPE: 596,
    /**
     * Proxy demanded an ident we could not provide.
     */
    AUTH_FAILED: 597,
    /**
     * Generic upstream error.
     */
    GENERIC_ERROR: 599,
} as const;

// https://nodejs.org/api/errors.html#common-system-errors
export const errorCodeToStatusCode: {[errorCode: string]: HttpStatusCode | undefined} = {
    ENOTFOUND: badGatewayStatusCodes.NOT_FOUND,
    ECONNREFUSED: badGatewayStatusCodes.CONNECTION_REFUSED,
    ECONNRESET: badGatewayStatusCodes.CONNECTION_RESET,
    EPIPE: badGatewayStatusCodes.BROKEN_PIPE,
    ETIMEDOUT: badGatewayStatusCodes.TIMEOUT,
} as const;

export const socks4ErrorToStatusCode = (error: Socks4Error): HttpStatusCode => {
    switch (error.code) {
        case 'HOST_UNKNOWN':
            return badGatewayStatusCodes.NOT_FOUND;
        case 'CONNECTION_REJECTED':
            return badGatewayStatusCodes.CONNECTION_REFUSED;
        case 'IDENT_REQUIRED':
            return badGatewayStatusCodes.AUTH_FAILED;
        case 'DIAL_FAILED':
        case 'IO_ERROR': {
            const { cause } = error;
            if (util.types.isNativeError(cause) && 'code' in cause && typeof cause.code === 'string') {
                return errorCodeToStatusCode[cause.code] ?? badGatewayStatusCodes.GENERIC_ERROR;
            }

            return badGatewayStatusCodes.GENERIC_ERROR;
        }
        default:
            return badGatewayStatusCodes.GENERIC_ERROR;
    }
};
