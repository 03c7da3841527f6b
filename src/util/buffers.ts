import { ByteBuffer } from '@runejs/common';


export const toByteBuffer = (data: ByteBuffer | Uint8Array): ByteBuffer =>
    data instanceof ByteBuffer ? data : new ByteBuffer(Buffer.from(data));


/**
 * Copies `length` bytes starting at `offset` into a new buffer. Goes through the underlying
 * ArrayBuffer so that no typed array subclass constructor is invoked.
 */
export const copyBytes = (data: Uint8Array, offset: number, length: number): ByteBuffer =>
    new ByteBuffer(Buffer.from(Buffer.from(data.buffer, data.byteOffset + offset, length)));
