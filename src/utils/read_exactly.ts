import { Buffer } from 'node:buffer';
import type { Duplex } from 'node:stream';

/**
 * Reads exactly `size` bytes from a paused stream.
 * Anything the peer sent past those bytes stays buffered in the stream.
 */
export const readExactly = async (stream: Duplex, size: number): Promise<Buffer> => new Promise((resolve, reject) => {
    if (stream.destroyed || stream.readableEnded) {
        reject(new Error('unexpected end of stream'));
        return;
    }

    const onReadable = () => {
        const chunk: unknown = stream.read(size);
        if (chunk === null) {
            return;
        }

        cleanup();

        // An ended stream hands out whatever is left, even if it is short.
        if (!Buffer.isBuffer(chunk) || chunk.length < size) {
            reject(new Error('unexpected end of stream'));
            return;
        }

        resolve(chunk);
    };

    const onEnd = () => {
        cleanup();
        reject(new Error('unexpected end of stream'));
    };

    const onError = (error: Error) => {
        cleanup();
        reject(error);
    };

    const cleanup = () => {
        stream.off('readable', onReadable);
        stream.off('end', onEnd);
        stream.off('close', onEnd);
        stream.off('error', onError);
    };

    stream.on('readable', onReadable);
    stream.once('end', onEnd);
    stream.once('close', onEnd);
    stream.once('error', onError);
});
