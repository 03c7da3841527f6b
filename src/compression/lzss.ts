import { ByteBuffer } from '@runejs/common';
import { AssetError } from '../asset-error';


export const LZSS_INDEX_BIT_COUNT = 13;
export const LZSS_LENGTH_BIT_COUNT = 4;
export const LZSS_WINDOW_SIZE = 1 << LZSS_INDEX_BIT_COUNT;
export const LZSS_BREAK_EVEN = Math.floor((1 + LZSS_INDEX_BIT_COUNT + LZSS_LENGTH_BIT_COUNT) / 9);
export const LZSS_END_OF_STREAM = 0;


/**
 * Reads single bits and fixed-width fields, most significant bit first, from a byte array.
 * A new byte is pulled into the rack each time the previous eight bits have been consumed.
 */
class BitReader {

    private readonly data: Uint8Array;
    private position: number;
    private mask = 0x80;
    private rack = 0;

    public constructor(data: Uint8Array, position: number) {
        this.data = data;
        this.position = position;
    }

    public readBit(): number {
        if(this.mask === 0x80) {
            if(this.position >= this.data.length) {
                throw new AssetError('TruncatedStream',
                    `Compressed stream ended at byte ${this.position} before the end-of-stream marker`);
            }

            this.rack = this.data[this.position++];
        }

        const bit = (this.rack & this.mask) !== 0 ? 1 : 0;

        this.mask >>= 1;
        if(this.mask === 0) {
            this.mask = 0x80;
        }

        return bit;
    }

    public readBits(bitCount: number): number {
        let value = 0;
        for(let bitMask = 1 << (bitCount - 1); bitMask !== 0; bitMask >>= 1) {
            if(this.readBit()) {
                value |= bitMask;
            }
        }

        return value;
    }

}


/**
 * Growable output for the decoder, since the stream itself does not declare its decoded length.
 */
class OutputBuffer {

    private bytes: Buffer;
    private _length = 0;

    public constructor(initialCapacity: number) {
        this.bytes = Buffer.alloc(Math.max(initialCapacity, LZSS_WINDOW_SIZE));
    }

    public push(value: number): void {
        if(this._length === this.bytes.length) {
            const grown = Buffer.alloc(this.bytes.length * 2);
            this.bytes.copy(grown, 0, 0, this._length);
            this.bytes = grown;
        }

        this.bytes[this._length++] = value;
    }

    public toByteBuffer(): ByteBuffer {
        return new ByteBuffer(Buffer.from(this.bytes.subarray(0, this._length)));
    }

    public get length(): number {
        return this._length;
    }

}


/**
 * Decodes the LZSS bitstream found in compressed texture archives.
 *
 * The window and bit reader only live for the duration of one call, so independent
 * archives can be decoded concurrently.
 *
 * @param archiveBytes The full archive contents.
 * @param headerOffset Offset of the first byte of the bitstream, directly after the archive header.
 * @throws AssetError `TruncatedStream` if input runs out before the end-of-stream marker.
 */
export const decompress = (archiveBytes: Uint8Array, headerOffset: number): ByteBuffer => {
    const window = new Uint8Array(LZSS_WINDOW_SIZE);
    const reader = new BitReader(archiveBytes, headerOffset);
    const output = new OutputBuffer((archiveBytes.length - headerOffset) * 4);
    const windowMask = LZSS_WINDOW_SIZE - 1;

    // position 0 is never written so that a match position of 0 can mark the end of the stream
    let currentPosition = 1;

    for(;;) {
        if(reader.readBit()) {
            const value = reader.readBits(8);
            output.push(value);
            window[currentPosition] = value;
            currentPosition = (currentPosition + 1) & windowMask;
            continue;
        }

        const matchPosition = reader.readBits(LZSS_INDEX_BIT_COUNT);
        if(matchPosition === LZSS_END_OF_STREAM) {
            break;
        }

        const matchLength = reader.readBits(LZSS_LENGTH_BIT_COUNT) + LZSS_BREAK_EVEN;

        for(let i = 0; i <= matchLength; i++) {
            const value = window[(matchPosition + i) & windowMask];
            output.push(value);
            window[currentPosition] = value;
            currentPosition = (currentPosition + 1) & windowMask;
        }
    }

    return output.toByteBuffer();
};
