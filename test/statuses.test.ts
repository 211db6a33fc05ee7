import http from 'node:http';

import { Socks4Error } from '../src/socks4_error';
import { badGatewayStatusCodes, socks4ErrorToStatusCode } from '../src/statuses';

const errnoError = (code: string): NodeJS.ErrnoException => Object.assign(new Error(code), { code });

describe('socks4ErrorToStatusCode', () => {
    test.each([
        [new Socks4Error('HOST_UNKNOWN', 'x'), badGatewayStatusCodes.NOT_FOUND],
        [new Socks4Error('CONNECTION_REJECTED', 'x'), badGatewayStatusCodes.CONNECTION_REFUSED],
        [new Socks4Error('IDENT_REQUIRED', 'x'), badGatewayStatusCodes.AUTH_FAILED],
        [new Socks4Error('INVALID_RESPONSE', 'x'), badGatewayStatusCodes.GENERIC_ERROR],
        [new Socks4Error('WRONG_ADDRESS', 'x'), badGatewayStatusCodes.GENERIC_ERROR],
        [new Socks4Error('DIAL_FAILED', 'x', { cause: errnoError('ECONNREFUSED') }), badGatewayStatusCodes.CONNECTION_REFUSED],
        [new Socks4Error('DIAL_FAILED', 'x', { cause: errnoError('ETIMEDOUT') }), badGatewayStatusCodes.TIMEOUT],
        [new Socks4Error('IO_ERROR', 'x', { cause: errnoError('ECONNRESET') }), badGatewayStatusCodes.CONNECTION_RESET],
        [new Socks4Error('IO_ERROR', 'x', { cause: new Error('unexpected end of stream') }), badGatewayStatusCodes.GENERIC_ERROR],
    ])('maps %s', (error, statusCode) => {
        expect(socks4ErrorToStatusCode(error)).toBe(statusCode);
    });
});

describe('statuses', () => {
    test('leaves the global HTTP status table alone', () => {
        expect(http.STATUS_CODES['593']).toBeUndefined();
        expect(http.STATUS_CODES['597']).toBeUndefined();
        expect(http.STATUS_CODES['599']).toBeUndefined();
    });
});

describe('Socks4Error', () => {
    test('carries name, code and cause', () => {
        const cause = new Error('boom');
        const error = new Socks4Error('IO_ERROR', 'i/o error', { cause });

        expect(error.name).toBe('Socks4Error');
        expect(error.code).toBe('IO_ERROR');
        expect(error.message).toBe('i/o error: boom');
        expect(error.cause).toBe(cause);
        expect(error).toBeInstanceOf(Error);
    });
});
