import { ByteBuffer, logger } from '@runejs/common';
import { AssetError } from '../asset-error';
import { decompress } from './lzss';
import { copyBytes, toByteBuffer } from '../util/buffers';


export interface CompressedArchiveHeader {
    imageCount: number;
    imageSizes: number[];
    // offset of the LZSS bitstream that follows the header
    dataOffset: number;
}


export const readArchiveHeader = (data: ByteBuffer | Uint8Array): CompressedArchiveHeader => {
    const buffer = toByteBuffer(data);
    buffer.readerIndex = 0;

    if(buffer.length < 4) {
        throw new AssetError('MalformedHeader', `Archive is ${buffer.length} bytes, too short for an image count`);
    }

    const imageCount = buffer.get('int', 'unsigned', 'le');
    if(buffer.length < 4 + imageCount * 4) {
        throw new AssetError('MalformedHeader',
            `Archive declares ${imageCount} images but is only ${buffer.length} bytes long`);
    }

    const imageSizes: number[] = new Array(imageCount);
    for(let i = 0; i < imageCount; i++) {
        imageSizes[i] = buffer.get('int', 'unsigned', 'le');
    }

    return { imageCount, imageSizes, dataOffset: buffer.readerIndex };
};


/**
 * Decompresses an archive and splits the result into its individual images, in archive order.
 * @throws AssetError `SizeMismatch` when the declared image sizes do not account for exactly
 * the decompressed bytes.
 */
export const unpackArchive = (data: ByteBuffer | Uint8Array): ByteBuffer[] => {
    const { imageCount, imageSizes, dataOffset } = readArchiveHeader(data);
    const decompressed = decompress(data, dataOffset);

    const expectedLength = imageSizes.reduce((total, size) => total + size, 0);
    if(decompressed.length !== expectedLength) {
        throw new AssetError('SizeMismatch',
            `Archive images declare ${expectedLength} bytes but ${decompressed.length} were decompressed`);
    }

    const images: ByteBuffer[] = new Array(imageCount);
    let offset = 0;

    for(let i = 0; i < imageCount; i++) {
        images[i] = copyBytes(decompressed, offset, imageSizes[i]);
        offset += imageSizes[i];
    }

    logger.info(`Unpacked ${imageCount} images (${expectedLength} bytes) from compressed archive.`);

    return images;
};
