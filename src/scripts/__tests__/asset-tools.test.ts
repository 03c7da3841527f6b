import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { beforeEach, describe, expect, it } from 'vitest';
import { extractImages, inspectObject, listObjects } from '../asset-tools';
import { PrimitiveFlags } from '../../content/models/primitive';
import { TimColorType } from '../../content/textures/tim-image';
import { decodePng } from '../../util/png';
import { buildArchive } from '../../__tests__/helpers/lzss-writer';
import { buildTim, rgb555 } from '../../__tests__/helpers/tim-builder';
import { buildPrm, f3, ft3, gt4, squareVertices } from '../../__tests__/helpers/prm-builder';
import { catchAssetError } from '../../__tests__/helpers/errors';


const WHITE = 0xffffff00;

const image = (words: number[]): Buffer => buildTim({
    colorType: TimColorType.TRUE_COLOR_16BPP,
    entriesPerRow: words.length,
    rows: 1,
    words
});


describe('asset tools', () => {

    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'asset-tools-'));
    });

    it('lists the objects of a model file', () => {
        const modelPath = join(dir, 'scene.prm');
        writeFileSync(modelPath, buildPrm([
            { name: 'tower', vertices: squareVertices(), primitives: [ f3([ 0, 1, 2 ], WHITE) ] },
            { name: 'sign', vertices: squareVertices().slice(0, 3), normals: [ { x: 0, y: 1, z: 0 } ], primitives: [] }
        ]));

        expect(listObjects({ file: modelPath })).toEqual([
            { index: 0, name: 'tower', vertexCount: 4, normalCount: 0, primitiveCount: 1 },
            { index: 1, name: 'sign', vertexCount: 3, normalCount: 1, primitiveCount: 0 }
        ]);
    });

    it('fails to list a missing model file', () => {
        catchAssetError(() => listObjects({ file: join(dir, 'missing.prm') }), 'NotFound');
    });

    it('summarizes an object loaded with its textures', () => {
        const modelPath = join(dir, 'scene.prm');
        writeFileSync(modelPath, buildPrm([ {
            name: 'tower',
            vertices: squareVertices(),
            primitives: [
                f3([ 0, 1, 2 ], WHITE),
                ft3([ 0, 1, 2 ], 0, [ { u: 0, v: 0 }, { u: 1, v: 0 }, { u: 0, v: 0 } ], WHITE),
                gt4([ 0, 1, 2, 3 ], 3, [ { u: 0, v: 0 }, { u: 0, v: 0 }, { u: 0, v: 0 }, { u: 0, v: 0 } ], [ 0, 0, 0, 0 ],
                    PrimitiveFlags.SHIP_ENGINE)
            ]
        } ]));
        writeFileSync(join(dir, 'scene.cmp'), buildArchive([ image([ rgb555(1, 2, 3), rgb555(3, 2, 1) ]) ]));

        expect(inspectObject({ file: modelPath, object: 0 })).toEqual({
            name: 'tower',
            vertexCount: 4,
            primitiveCounts: { F3: 1, FT3: 1, GT3: 2 },
            enginePrimitiveCount: 2,
            textureCount: 1,
            textureAlphaModes: [ 'opaque' ],
            boundTextureCount: 1
        });
    });

    it('writes every archive image as a PNG', () => {
        const archivePath = join(dir, 'track.cmp');
        writeFileSync(archivePath, buildArchive([ image([ rgb555(31, 0, 0) ]), image([ 0x8000, rgb555(0, 0, 31) ]) ]));
        const out = join(dir, 'out');

        const written = extractImages({ file: archivePath, out, transparent: true });

        expect(written).toEqual([ join(out, 'track_0.png'), join(out, 'track_1.png') ]);

        const second = decodePng(readFileSync(written[1]));
        expect(second.width).toBe(2);
        expect(second.height).toBe(1);
        expect(Array.from(second.pixels)).toEqual([ 0, 0, 0, 0, 0, 0, 248, 255 ]);
    });

    it('writes a single image file as a PNG', () => {
        mkdirSync(join(dir, 'textures'));
        const imagePath = join(dir, 'textures', 'shad1.tim');
        writeFileSync(imagePath, image([ rgb555(0, 31, 0) ]));

        const written = extractImages({ file: imagePath, out: join(dir, 'png'), transparent: false });

        expect(written).toEqual([ join(dir, 'png', 'shad1.png') ]);
        expect(Array.from(decodePng(readFileSync(written[0])).pixels)).toEqual([ 0, 248, 0, 255 ]);
    });

});
