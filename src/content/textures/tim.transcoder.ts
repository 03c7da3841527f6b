import { existsSync, readFileSync } from 'graceful-fs';
import { ByteBuffer, logger } from '@runejs/common';
import { AssetError } from '../../asset-error';
import { toByteBuffer } from '../../util/buffers';
import { DecodedImage, isPaletted, pixelsPerWord, tim16BitToRgba, TimColorType } from './tim-image';


const PALETTE_SIZE = 256;
const BLOCK_HEADER_LENGTH = 12;


export interface TimHeader {
    magic: number;
    colorType: TimColorType;
}


const ensureReadable = (buffer: ByteBuffer, length: number, what: string): void => {
    if(length < 0 || buffer.readerIndex + length > buffer.length) {
        throw new AssetError('MalformedHeader',
            `Image ${what} needs ${length} bytes at offset ${buffer.readerIndex}, ` +
            `but the record is ${buffer.length} bytes long`);
    }
};


const readHeader = (buffer: ByteBuffer): TimHeader => {
    ensureReadable(buffer, 8, 'header');

    const magic = buffer.get('int', 'unsigned', 'le');
    const colorType = buffer.get('int', 'unsigned', 'le');

    if(colorType !== TimColorType.TRUE_COLOR_16BPP &&
        colorType !== TimColorType.PALETTED_4BPP &&
        colorType !== TimColorType.PALETTED_8BPP) {
        throw new AssetError('UnsupportedColorType', `Unsupported image color type 0x${colorType.toString(16)}`);
    }

    return { magic, colorType };
};


/**
 * Reads the color lookup block into a 256 entry RGBA palette. Entries past the declared
 * color count stay zeroed (transparent black). Only the first palette of the block is used.
 */
const readPalette = (buffer: ByteBuffer, transparencyMode: boolean): Uint8Array => {
    ensureReadable(buffer, BLOCK_HEADER_LENGTH, 'palette block header');

    buffer.get('int', 'unsigned', 'le'); // block length
    buffer.get('short', 'signed', 'le'); // palette x
    buffer.get('short', 'signed', 'le'); // palette y
    const colorCount = buffer.get('short', 'signed', 'le');
    const paletteCount = buffer.get('short', 'signed', 'le');

    if(colorCount < 0 || paletteCount < 0) {
        throw new AssetError('MalformedHeader',
            `Image palette declares ${colorCount} colors across ${paletteCount} palettes`);
    }

    ensureReadable(buffer, colorCount * 2, 'palette');

    const palette = new Uint8Array(PALETTE_SIZE * 4);
    for(let i = 0; i < colorCount; i++) {
        const color = buffer.get('short', 'unsigned', 'le');
        if(i < PALETTE_SIZE) {
            palette.set(tim16BitToRgba(color, transparencyMode), i * 4);
        }
    }

    if(paletteCount > 1) {
        const extraPaletteLength = colorCount * (paletteCount - 1) * 2;
        ensureReadable(buffer, extraPaletteLength, 'additional palettes');
        buffer.readerIndex = buffer.readerIndex + extraPaletteLength;
    }

    return palette;
};


/**
 * Decodes a single raw image record into RGBA pixels.
 *
 * @param data The image record, straight from disk or sliced out of a compressed archive.
 * @param transparencyMode Treat colors with only the semi-transparency bit set as transparent.
 * @throws AssetError `UnsupportedColorType` or `MalformedHeader`.
 */
export const decodeTim = (data: ByteBuffer | Uint8Array, transparencyMode: boolean = false): DecodedImage => {
    const buffer = toByteBuffer(data);
    buffer.readerIndex = 0;

    const { colorType } = readHeader(buffer);
    const palette = isPaletted(colorType) ?
        readPalette(buffer, transparencyMode) : new Uint8Array(PALETTE_SIZE * 4);

    ensureReadable(buffer, BLOCK_HEADER_LENGTH, 'pixel block header');

    buffer.get('int', 'unsigned', 'le'); // block length
    buffer.get('short', 'signed', 'le'); // skip x
    buffer.get('short', 'signed', 'le'); // skip y
    const entriesPerRow = buffer.get('short', 'signed', 'le');
    const rows = buffer.get('short', 'signed', 'le');

    if(entriesPerRow < 0 || rows < 0) {
        throw new AssetError('MalformedHeader', `Image declares ${entriesPerRow} entries per row and ${rows} rows`);
    }

    const entries = entriesPerRow * rows;
    ensureReadable(buffer, entries * 2, 'pixel data');

    const width = entriesPerRow * pixelsPerWord(colorType);
    const height = rows;
    const pixels = new Uint8Array(width * height * 4);
    let pixelPos = 0;

    const putPaletteColor = (paletteIndex: number): void => {
        pixels.set(palette.subarray(paletteIndex * 4, paletteIndex * 4 + 4), pixelPos);
        pixelPos += 4;
    };

    for(let i = 0; i < entries; i++) {
        const word = buffer.get('short', 'unsigned', 'le');

        if(colorType === TimColorType.TRUE_COLOR_16BPP) {
            pixels.set(tim16BitToRgba(word, transparencyMode), pixelPos);
            pixelPos += 4;
        } else if(colorType === TimColorType.PALETTED_8BPP) {
            putPaletteColor(word & 0xff);
            putPaletteColor((word >> 8) & 0xff);
        } else {
            for(let j = 0; j < 4; j++) {
                putPaletteColor((word >> (j * 4)) & 0xf);
            }
        }
    }

    return { width, height, pixels };
};


export const readTimFile = (filePath: string, transparencyMode: boolean = false): DecodedImage => {
    if(!existsSync(filePath)) {
        throw new AssetError('NotFound', `Image file not found`, filePath);
    }

    const data = new ByteBuffer(readFileSync(filePath));
    logger.info(`Decoding image ${filePath} (${data.length} bytes).`);

    try {
        return decodeTim(data, transparencyMode);
    } catch(error) {
        throw error instanceof AssetError ? error.withPath(filePath) : error;
    }
};
