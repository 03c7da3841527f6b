import { Rgba } from './model-color';


/**
 * Primitive type codes as stored in model files. Codes above `GT4` are recognized so that
 * they can be skipped or folded into the plain shapes, but never surface as primitives.
 */
export enum PrimitiveTag {
    F3 = 1,
    FT3 = 2,
    F4 = 3,
    FT4 = 4,
    G3 = 5,
    GT3 = 6,
    G4 = 7,
    GT4 = 8,
    LF2 = 9,
    TSPR = 10,
    BSPR = 11,
    LSF3 = 12,
    LSFT3 = 13,
    LSF4 = 14,
    LSFT4 = 15,
    LSG3 = 16,
    LSGT3 = 17,
    LSG4 = 18,
    LSGT4 = 19,
    SPLINE = 20,
    INFINITE_LIGHT = 21,
    POINT_LIGHT = 22,
    SPOT_LIGHT = 23
}


export const PrimitiveFlags = {
    /**
     * Meant to enable back-face culling. Never enforced by the game renderer, so
     * consumers should keep drawing every primitive double-sided.
     */
    SINGLE_SIDED: 0x0001,

    /**
     * Part of a ship's engine exhaust, whose vertex colors are overridden by the glow effect.
     */
    SHIP_ENGINE: 0x0002,

    TRANSLUCENT: 0x0004
} as const;


export interface Uv {
    u: number;
    v: number;
}


interface BasePrimitive {
    flags: number;
    coordIndices: number[];
}


interface TexturedPrimitive {
    textureId: number;
    // raw texel coordinates, as stored in the model file
    uvs: Uv[];
    // filled in once the primitive is bound to a decoded texture
    normalizedUvs: Uv[] | null;
}


export interface F3 extends BasePrimitive {
    type: 'F3';
    color: Rgba;
}

export interface F4 extends BasePrimitive {
    type: 'F4';
    color: Rgba;
}

export interface FT3 extends BasePrimitive, TexturedPrimitive {
    type: 'FT3';
    color: Rgba;
}

export interface FT4 extends BasePrimitive, TexturedPrimitive {
    type: 'FT4';
    color: Rgba;
}

export interface G3 extends BasePrimitive {
    type: 'G3';
    colors: Rgba[];
}

export interface G4 extends BasePrimitive {
    type: 'G4';
    colors: Rgba[];
}

export interface GT3 extends BasePrimitive, TexturedPrimitive {
    type: 'GT3';
    colors: Rgba[];
}


export type Primitive = F3 | F4 | FT3 | FT4 | G3 | G4 | GT3;

export type PrimitiveType = Primitive['type'];

export type TexturedPrimitiveShape = FT3 | FT4 | GT3;


export const isTextured = (primitive: Primitive): primitive is TexturedPrimitiveShape =>
    primitive.type === 'FT3' || primitive.type === 'FT4' || primitive.type === 'GT3';


export const hasFlag = (primitive: Primitive, flag: number): boolean => (primitive.flags & flag) !== 0;


export interface GouraudTexturedQuad {
    flags: number;
    coordIndices: number[];
    textureId: number;
    uvs: Uv[];
    colors: Rgba[];
}


/**
 * Splits a Gouraud textured quad into two triangles sharing quad vertices 1 and 2,
 * wound `(v2, v1, v0)` and `(v2, v3, v1)`. Colors and UVs follow their vertices.
 */
export const splitGouraudTexturedQuad = (quad: GouraudTexturedQuad): [ GT3, GT3 ] => {
    const triangle = (order: [ number, number, number ]): GT3 => ({
        type: 'GT3',
        flags: quad.flags,
        coordIndices: order.map(i => quad.coordIndices[i]),
        textureId: quad.textureId,
        uvs: order.map(i => ({ ...quad.uvs[i] })),
        normalizedUvs: null,
        colors: order.map(i => ({ ...quad.colors[i] }))
    });

    return [ triangle([ 2, 1, 0 ]), triangle([ 2, 3, 1 ]) ];
};
