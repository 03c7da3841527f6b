import { existsSync, readFileSync } from 'graceful-fs';
import { ByteBuffer, logger } from '@runejs/common';
import { AssetError } from '../../asset-error';
import { toByteBuffer } from '../../util/buffers';
import { Mesh, ModelObjectInfo, Vector3, Vertex } from './prm-model';
import { ModelColor, Rgba } from './model-color';
import { PrimitiveTag, Primitive, splitGouraudTexturedQuad, Uv } from './primitive';


const OBJECT_HEADER_LENGTH = 144;
const OBJECT_NAME_LENGTH = 16;
const MAX_ELEMENT_COUNT = 10000;


/**
 * Payload length of each primitive record, excluding its 4 byte type and flags prefix.
 */
const PRIMITIVE_PAYLOAD_LENGTHS: { [tag in PrimitiveTag]: number } = {
    [PrimitiveTag.F3]: 12,
    [PrimitiveTag.FT3]: 24,
    [PrimitiveTag.F4]: 12,
    [PrimitiveTag.FT4]: 28,
    [PrimitiveTag.G3]: 20,
    [PrimitiveTag.GT3]: 32,
    [PrimitiveTag.G4]: 24,
    [PrimitiveTag.GT4]: 40,
    [PrimitiveTag.LF2]: 12,
    [PrimitiveTag.TSPR]: 12,
    [PrimitiveTag.BSPR]: 12,
    [PrimitiveTag.LSF3]: 12,
    [PrimitiveTag.LSFT3]: 24,
    [PrimitiveTag.LSF4]: 16,
    [PrimitiveTag.LSFT4]: 30,
    [PrimitiveTag.LSG3]: 24,
    [PrimitiveTag.LSGT3]: 36,
    [PrimitiveTag.LSG4]: 32,
    [PrimitiveTag.LSGT4]: 46,
    [PrimitiveTag.SPLINE]: 52,
    [PrimitiveTag.INFINITE_LIGHT]: 12,
    [PrimitiveTag.POINT_LIGHT]: 24,
    [PrimitiveTag.SPOT_LIGHT]: 36
};


interface PrmObjectHeader {
    name: string;
    vertexCount: number;
    normalCount: number;
    primitiveCount: number;
    flags: number;
    origin: Vector3;
}


const isPrimitiveTag = (value: number): value is PrimitiveTag =>
    Number.isInteger(value) && value >= PrimitiveTag.F3 && value <= PrimitiveTag.SPOT_LIGHT;


/**
 * Decodes the objects packed one after the other into a model file.
 *
 * Model files are big-endian. Each object is a fixed size header followed by its vertex
 * pool, its normals and its primitive records. Texture coordinates are kept as raw texels;
 * they can only be normalized once the texture they refer to has been decoded.
 */
export class PrmModelTranscoder {

    public readonly data: ByteBuffer;

    public constructor(data: ByteBuffer | Uint8Array) {
        this.data = toByteBuffer(data);
    }

    public static fromFile(filePath: string): PrmModelTranscoder {
        if(!existsSync(filePath)) {
            throw new AssetError('NotFound', `Model file not found`, filePath);
        }

        const data = new ByteBuffer(readFileSync(filePath));
        logger.info(`Loading model ${filePath} (${data.length} bytes).`);
        return new PrmModelTranscoder(data);
    }

    /**
     * Lists every object holding geometry, without decoding the primitives. Objects with an
     * empty vertex pool still occupy an index but are left out of the listing.
     */
    public listObjects(): ModelObjectInfo[] {
        const objects: ModelObjectInfo[] = [];

        this.data.readerIndex = 0;
        for(let index = 0; this.hasObjectHeader(); index++) {
            const header = this.readObjectHeader(index);
            if(header.vertexCount > 0) {
                const { name, vertexCount, normalCount, primitiveCount } = header;
                objects.push({ index, name, vertexCount, normalCount, primitiveCount });
            }

            this.skipObject(header);
        }

        return objects;
    }

    /**
     * @throws AssetError `ObjectIndexOutOfRange` when the file has no object at `objectIndex`,
     * or only an empty one.
     */
    public decodeObject(objectIndex: number): Mesh {
        if(!Number.isInteger(objectIndex) || objectIndex < 0) {
            throw new AssetError('ObjectIndexOutOfRange', `Invalid object index ${objectIndex}`);
        }

        this.data.readerIndex = 0;
        for(let index = 0; this.hasObjectHeader(); index++) {
            const header = this.readObjectHeader(index);

            if(index < objectIndex) {
                this.skipObject(header);
                continue;
            }

            if(header.vertexCount === 0) {
                throw new AssetError('ObjectIndexOutOfRange', `Object ${objectIndex} ('${header.name}') is empty`);
            }

            const mesh = this.readMesh(header);
            logger.info(`Decoded object ${objectIndex} '${mesh.name}': ` +
                `${mesh.vertices.length} vertices, ${mesh.primitives.length} primitives.`);
            return mesh;
        }

        throw new AssetError('ObjectIndexOutOfRange', `Object ${objectIndex} does not exist in the model file`);
    }

    public decodeAll(): Mesh[] {
        const meshes: Mesh[] = [];

        this.data.readerIndex = 0;
        for(let index = 0; this.hasObjectHeader(); index++) {
            const header = this.readObjectHeader(index);
            if(header.vertexCount === 0) {
                this.skipObject(header);
                continue;
            }

            meshes.push(this.readMesh(header));
        }

        logger.info(`Decoded ${meshes.length} objects from model file.`);
        return meshes;
    }

    private hasObjectHeader(): boolean {
        return this.data.readerIndex + OBJECT_HEADER_LENGTH <= this.data.length;
    }

    private ensureReadable(length: number, what: string): void {
        if(this.data.readerIndex + length > this.data.length) {
            throw new AssetError('MalformedHeader',
                `Model ${what} needs ${length} bytes at offset ${this.data.readerIndex}, ` +
                `but the file is ${this.data.length} bytes long`);
        }
    }

    private skip(length: number): void {
        this.data.readerIndex = this.data.readerIndex + length;
    }

    private readObjectHeader(index: number): PrmObjectHeader {
        const buffer = this.data;

        const nameBytes = Buffer.alloc(OBJECT_NAME_LENGTH);
        for(let i = 0; i < OBJECT_NAME_LENGTH; i++) {
            nameBytes[i] = buffer.get('byte', 'unsigned');
        }

        const nameEnd = nameBytes.indexOf(0);
        const name = nameBytes.toString('latin1', 0, nameEnd === -1 ? OBJECT_NAME_LENGTH : nameEnd);

        const vertexCount = buffer.get('short');
        this.skip(2 + 4); // padding, vertex pointer
        const normalCount = buffer.get('short');
        this.skip(2 + 4); // padding, normal pointer
        const primitiveCount = buffer.get('short');
        this.skip(2 + 4); // padding, primitive pointer
        this.skip(3 * 4); // two unused pointers and the skeleton reference
        buffer.get('int'); // extent
        const flags = buffer.get('short');
        this.skip(2 + 4); // padding, next object pointer
        this.skip(3 * 3 * 2 + 2); // relative rotation matrix, padding

        const origin: Vector3 = {
            x: buffer.get('int'),
            y: buffer.get('int'),
            z: buffer.get('int')
        };

        this.skip(3 * 3 * 2 + 2); // absolute rotation matrix, padding
        this.skip(3 * 4); // absolute translation
        this.skip(2 + 2); // skeleton update flag, padding
        this.skip(3 * 4); // skeleton super, sub and next pointers

        if(vertexCount < 0 || normalCount < 0 || primitiveCount < 0 ||
            vertexCount > MAX_ELEMENT_COUNT || normalCount > MAX_ELEMENT_COUNT || primitiveCount > MAX_ELEMENT_COUNT) {
            throw new AssetError('MalformedHeader', `Object ${index} ('${name}') declares ${vertexCount} vertices, ` +
                `${normalCount} normals and ${primitiveCount} primitives`);
        }

        return { name, vertexCount, normalCount, primitiveCount, flags, origin };
    }

    private skipObject(header: PrmObjectHeader): void {
        this.ensureReadable((header.vertexCount + header.normalCount) * 8, 'vertex data');
        this.skip((header.vertexCount + header.normalCount) * 8);

        for(let i = 0; i < header.primitiveCount; i++) {
            this.ensureReadable(4, 'primitive header');
            const tag = this.data.get('short');
            this.skip(2); // flags
            this.skip(this.payloadLength(tag));
        }
    }

    private payloadLength(tag: number): number {
        if(!isPrimitiveTag(tag)) {
            throw new AssetError('UnknownPrimitiveTag',
                `Unknown primitive type ${tag} at offset ${this.data.readerIndex - 4}`);
        }

        const length = PRIMITIVE_PAYLOAD_LENGTHS[tag];
        this.ensureReadable(length, `primitive type ${tag}`);
        return length;
    }

    private readMesh(header: PrmObjectHeader): Mesh {
        const mesh = new Mesh(header.name);
        mesh.flags = header.flags;
        mesh.origin = header.origin;

        this.ensureReadable(header.vertexCount * 8, 'vertices');
        for(let i = 0; i < header.vertexCount; i++) {
            const vertex: Vertex = this.readVector();
            mesh.vertices.push(vertex);
            mesh.radius = Math.max(mesh.radius, Math.abs(vertex.x), Math.abs(vertex.y), Math.abs(vertex.z));
        }

        this.ensureReadable(header.normalCount * 8, 'normals');
        for(let i = 0; i < header.normalCount; i++) {
            mesh.normals.push(this.readVector());
        }

        if(mesh.normals.length === mesh.vertices.length) {
            mesh.vertices.forEach((vertex, i) => {
                vertex.normal = mesh.normals[i];
            });
        }

        for(let i = 0; i < header.primitiveCount; i++) {
            this.ensureReadable(4, 'primitive header');
            const tag = this.data.get('short');
            const flags = this.data.get('short', 'unsigned');
            this.payloadLength(tag);

            for(const primitive of this.readPrimitive(tag, flags)) {
                this.validateIndices(primitive, mesh);
                mesh.primitives.push(primitive);
            }
        }

        return mesh;
    }

    private validateIndices(primitive: Primitive, mesh: Mesh): void {
        for(const index of primitive.coordIndices) {
            if(index < 0 || index >= mesh.vertices.length) {
                throw new AssetError('MalformedHeader', `${primitive.type} primitive in '${mesh.name}' ` +
                    `references vertex ${index} of ${mesh.vertices.length}`);
            }
        }
    }

    private readPrimitive(tag: number, flags: number): Primitive[] {
        switch(tag) {
            case PrimitiveTag.F3: {
                const coordIndices = this.readShorts(3);
                this.skip(2); // padding
                return [ { type: 'F3', flags, coordIndices, color: this.readColor() } ];
            }
            case PrimitiveTag.F4:
                return [ { type: 'F4', flags, coordIndices: this.readShorts(4), color: this.readColor() } ];
            case PrimitiveTag.FT3: {
                const coordIndices = this.readShorts(3);
                const textureId = this.readTextureId();
                const uvs = this.readUvs(3);
                this.skip(2); // padding
                return [ { type: 'FT3', flags, coordIndices, textureId, uvs, normalizedUvs: null, color: this.readColor() } ];
            }
            case PrimitiveTag.FT4: {
                const coordIndices = this.readShorts(4);
                const textureId = this.readTextureId();
                const uvs = this.readUvs(4);
                this.skip(2); // padding
                return [ { type: 'FT4', flags, coordIndices, textureId, uvs, normalizedUvs: null, color: this.readColor() } ];
            }
            case PrimitiveTag.G3: {
                const coordIndices = this.readShorts(3);
                this.skip(2); // padding
                return [ { type: 'G3', flags, coordIndices, colors: this.readColors(3) } ];
            }
            case PrimitiveTag.G4:
                return [ { type: 'G4', flags, coordIndices: this.readShorts(4), colors: this.readColors(4) } ];
            case PrimitiveTag.GT3: {
                const coordIndices = this.readShorts(3);
                const textureId = this.readTextureId();
                const uvs = this.readUvs(3);
                this.skip(2); // padding
                return [ { type: 'GT3', flags, coordIndices, textureId, uvs, normalizedUvs: null, colors: this.readColors(3) } ];
            }
            case PrimitiveTag.GT4: {
                const coordIndices = this.readShorts(4);
                const textureId = this.readTextureId();
                const uvs = this.readUvs(4);
                this.skip(2); // padding
                return splitGouraudTexturedQuad({ flags, coordIndices, textureId, uvs, colors: this.readColors(4) });
            }
            case PrimitiveTag.LSF3: {
                const coordIndices = this.readShorts(3);
                this.skip(2); // light source
                return [ { type: 'F3', flags, coordIndices, color: this.readColor() } ];
            }
            case PrimitiveTag.LSFT3: {
                const coordIndices = this.readShorts(3);
                this.skip(2); // light source
                const textureId = this.readTextureId();
                const uvs = this.readUvs(3);
                return [ { type: 'FT3', flags, coordIndices, textureId, uvs, normalizedUvs: null, color: this.readColor() } ];
            }
            default:
                // lines, sprites, the remaining light source shapes, splines and lights carry no geometry
                this.skip(this.payloadLength(tag));
                return [];
        }
    }

    private readVector(): Vector3 {
        const vector = {
            x: this.data.get('short'),
            y: this.data.get('short'),
            z: this.data.get('short')
        };
        this.skip(2); // padding
        return vector;
    }

    private readShorts(count: number): number[] {
        const values: number[] = new Array(count);
        for(let i = 0; i < count; i++) {
            values[i] = this.data.get('short');
        }

        return values;
    }

    private readTextureId(): number {
        const textureId = this.data.get('short');
        this.skip(4); // cba, tsb
        return textureId;
    }

    private readUvs(count: number): Uv[] {
        const uvs: Uv[] = new Array(count);
        for(let i = 0; i < count; i++) {
            uvs[i] = { u: this.data.get('byte', 'unsigned'), v: this.data.get('byte', 'unsigned') };
        }

        return uvs;
    }

    private readColor(): Rgba {
        return ModelColor.fromU32(this.data.get('int', 'unsigned'));
    }

    private readColors(count: number): Rgba[] {
        const colors: Rgba[] = new Array(count);
        for(let i = 0; i < count; i++) {
            colors[i] = this.readColor();
        }

        return colors;
    }

}


/**
 * Decodes one object of a model file.
 * @throws AssetError `ObjectIndexOutOfRange`, `UnknownPrimitiveTag` or `MalformedHeader`.
 */
export const decodeModel = (data: ByteBuffer | Uint8Array, objectIndex: number = 0): Mesh =>
    new PrmModelTranscoder(data).decodeObject(objectIndex);


export const listModelObjects = (data: ByteBuffer | Uint8Array): ModelObjectInfo[] =>
    new PrmModelTranscoder(data).listObjects();


export const decodeAllModels = (data: ByteBuffer | Uint8Array): Mesh[] =>
    new PrmModelTranscoder(data).decodeAll();
