import { describe, expect, it } from 'vitest';
import { bindTextures, normalizeUvs } from '../texture-binding';
import { decodeModel } from '../prm-model.transcoder';
import { isTextured } from '../primitive';
import { createTransparentImage } from '../../textures/tim-image';
import { buildPrm, f3, ft3, gt4, squareVertices } from '../../../__tests__/helpers/prm-builder';


const rawUvs = [ { u: 128, v: 128 }, { u: 0, v: 0 }, { u: 64, v: 32 } ];

const texturedMesh = () => decodeModel(buildPrm([ {
    name: 'wing',
    vertices: squareVertices(),
    primitives: [
        ft3([ 0, 1, 2 ], 0, rawUvs, 0xffffff00),
        f3([ 1, 2, 3 ], 0xffffff00),
        ft3([ 0, 1, 3 ], 5, rawUvs, 0xffffff00)
    ]
} ]), 0);


describe('texture binding', () => {

    it('divides texel coordinates by the image dimensions', () => {
        expect(normalizeUvs([ { u: 128, v: 128 } ], createTransparentImage(256, 256))).toEqual([ { u: 0.5, v: 0.5 } ]);
        expect(normalizeUvs([ { u: 64, v: 32 } ], createTransparentImage(128, 64))).toEqual([ { u: 0.5, v: 0.5 } ]);
    });

    it('binds textured primitives whose texture id resolves', () => {
        const mesh = texturedMesh();
        const bound = bindTextures(mesh, [ createTransparentImage(256, 256) ]);

        expect(bound).toBe(1);

        const [ first, , last ] = mesh.primitives;
        expect(first.type === 'FT3' && first.normalizedUvs).toEqual([
            { u: 0.5, v: 0.5 },
            { u: 0, v: 0 },
            { u: 0.25, v: 0.125 }
        ]);
        expect(last.type === 'FT3' && last.normalizedUvs).toBeNull();
    });

    it('leaves the raw texel coordinates untouched', () => {
        const mesh = texturedMesh();
        bindTextures(mesh, [ createTransparentImage(256, 256) ]);

        const textured = mesh.primitives.filter(isTextured);
        expect(textured.map(primitive => primitive.uvs)).toEqual([ rawUvs, rawUvs ]);
    });

    it('replaces earlier results when bound to another table', () => {
        const mesh = texturedMesh();
        bindTextures(mesh, [ createTransparentImage(256, 256) ]);
        bindTextures(mesh, [ createTransparentImage(128, 256) ]);

        const [ first ] = mesh.primitives.filter(isTextured);
        expect(first.normalizedUvs).toEqual([
            { u: 1, v: 0.5 },
            { u: 0, v: 0 },
            { u: 0.5, v: 0.125 }
        ]);
    });

    it('clears results when the table no longer holds the image', () => {
        const mesh = texturedMesh();
        bindTextures(mesh, [ createTransparentImage(256, 256) ]);

        expect(bindTextures(mesh, [])).toBe(0);
        expect(mesh.primitives.filter(isTextured).map(primitive => primitive.normalizedUvs)).toEqual([ null, null ]);
    });

    it('does not bind to an image without pixels', () => {
        const mesh = texturedMesh();

        expect(bindTextures(mesh, [ createTransparentImage(0, 0) ])).toBe(0);
    });

    it('binds both halves of a split quad', () => {
        const mesh = decodeModel(buildPrm([ {
            name: 'fin',
            vertices: squareVertices(),
            primitives: [ gt4([ 0, 1, 2, 3 ], 0, [
                { u: 0, v: 0 }, { u: 32, v: 0 }, { u: 0, v: 32 }, { u: 32, v: 32 }
            ], [ 0, 0, 0, 0 ]) ]
        } ]), 0);

        expect(bindTextures(mesh, [ createTransparentImage(64, 64) ])).toBe(2);
        expect(mesh.primitives.filter(isTextured).map(primitive => primitive.normalizedUvs)).toEqual([
            [ { u: 0, v: 0.5 }, { u: 0.5, v: 0 }, { u: 0, v: 0 } ],
            [ { u: 0, v: 0.5 }, { u: 0.5, v: 0.5 }, { u: 0.5, v: 0 } ]
        ]);
    });

});
