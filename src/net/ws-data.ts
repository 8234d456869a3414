import type { RawData } from 'ws';

/**
 * Normalize a `ws` message payload: text frames to string, binary to bytes.
 */
export function fromRawData(data: RawData, isBinary: boolean): string | Uint8Array {
    let bytes: Uint8Array;
    if (Array.isArray(data)) {
        bytes = new Uint8Array(Buffer.concat(data));
    } else if (Buffer.isBuffer(data)) {
        bytes = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    } else {
        bytes = new Uint8Array(data);
    }

    return isBinary ? bytes : new TextDecoder().decode(bytes);
}
