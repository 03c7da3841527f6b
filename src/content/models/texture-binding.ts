import { DecodedImage } from '../textures/tim-image';
import { Mesh } from './prm-model';
import { isTextured, TexturedPrimitiveShape, Uv } from './primitive';


export type TextureHandleTable = readonly DecodedImage[];


export const normalizeUvs = (uvs: readonly Uv[], image: DecodedImage): Uv[] =>
    uvs.map(({ u, v }) => ({ u: u / image.width, v: v / image.height }));


export const resolveTexture = (primitive: TexturedPrimitiveShape, textures: TextureHandleTable): DecodedImage | null =>
    primitive.textureId >= 0 && primitive.textureId < textures.length ? textures[primitive.textureId] : null;


/**
 * Binds every textured primitive of the mesh to its image in the table, dividing the raw
 * texel coordinates by that image's real dimensions. The raw `uvs` are left untouched so the
 * mesh can later be bound to a different table.
 *
 * @returns The number of primitives that resolved to an image.
 */
export const bindTextures = (mesh: Mesh, textures: TextureHandleTable): number => {
    let boundCount = 0;

    for(const primitive of mesh.primitives) {
        if(!isTextured(primitive)) {
            continue;
        }

        const image = resolveTexture(primitive, textures);
        if(!image || image.width === 0 || image.height === 0) {
            primitive.normalizedUvs = null;
            continue;
        }

        primitive.normalizedUvs = normalizeUvs(primitive.uvs, image);
        boundCount++;
    }

    return boundCount;
};
