import { describe, expect, it } from 'vitest';
import { readArchiveHeader, unpackArchive } from '../compressed-archive';
import { buildArchive, LzssWriter } from '../../__tests__/helpers/lzss-writer';
import { catchAssetError } from '../../__tests__/helpers/errors';


const filledImage = (length: number, seed: number): number[] =>
    Array.from({ length }, (_, i) => (seed + i * 3) & 0xff);


describe('compressed archive', () => {

    it('reads the image count and sizes from the little-endian header', () => {
        const archive = buildArchive([ [ 1, 2 ], [ 3, 4, 5 ] ]);

        expect(readArchiveHeader(archive)).toEqual({
            imageCount: 2,
            imageSizes: [ 2, 3 ],
            dataOffset: 12
        });
    });

    it('splits the decompressed stream into images of the declared sizes', () => {
        const images = [ filledImage(100, 1), filledImage(150, 50), filledImage(200, 99) ];
        const unpacked = unpackArchive(buildArchive(images));

        expect(unpacked.map(image => image.length)).toEqual([ 100, 150, 200 ]);
        expect(unpacked.reduce((total, image) => total + image.length, 0)).toBe(450);
        unpacked.forEach((image, i) => expect(Array.from(image)).toEqual(images[i]));
    });

    it('keeps back references that span two images', () => {
        const header = Buffer.from([ 2, 0, 0, 0, 3, 0, 0, 0, 3, 0, 0, 0 ]);
        const stream = new LzssWriter().literals([ 5, 6, 7 ]).match(1, 1).end().toBuffer();

        const unpacked = unpackArchive(Buffer.concat([ header, stream ]));

        expect(Array.from(unpacked[0])).toEqual([ 5, 6, 7 ]);
        expect(Array.from(unpacked[1])).toEqual([ 5, 6, 7 ]);
    });

    it('returns no images for an empty archive', () => {
        expect(unpackArchive(buildArchive([]))).toEqual([]);
    });

    it('fails with SizeMismatch when the declared sizes do not add up', () => {
        const archive = buildArchive([ [ 1, 2, 3 ] ], [ 2 ]);

        const error = catchAssetError(() => unpackArchive(archive), 'SizeMismatch');
        expect(error.message).toBe('Archive images declare 2 bytes but 3 were decompressed');
    });

    it('fails with MalformedHeader when the file cannot hold an image count', () => {
        catchAssetError(() => readArchiveHeader(Buffer.from([ 1, 0 ])), 'MalformedHeader');
    });

    it('fails with MalformedHeader when the size table overruns the file', () => {
        const archive = Buffer.from([ 3, 0, 0, 0, 10, 0, 0, 0 ]);

        const error = catchAssetError(() => unpackArchive(archive), 'MalformedHeader');
        expect(error.message).toBe('Archive declares 3 images but is only 8 bytes long');
    });

    it('propagates a truncated stream', () => {
        const header = Buffer.from([ 1, 0, 0, 0, 2, 0, 0, 0 ]);
        const stream = new LzssWriter().literals([ 1, 2 ]).toBuffer();

        catchAssetError(() => unpackArchive(Buffer.concat([ header, stream ])), 'TruncatedStream');
    });

});
