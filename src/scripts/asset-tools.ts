import { basename, extname, join } from 'path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'graceful-fs';
import { logger } from '@runejs/common';
import { AssetError } from '../asset-error';
import { AssetConfig } from '../config/asset-config';
import { AssetPipeline } from '../content/asset-pipeline';
import { listModelObjects } from '../content/models/prm-model.transcoder';
import { ModelObjectInfo } from '../content/models/prm-model';
import { hasFlag, PrimitiveFlags, PrimitiveType } from '../content/models/primitive';
import { DecodedImage, detectAlphaMode, TextureAlphaMode } from '../content/textures/tim-image';
import { readTimFile } from '../content/textures/tim.transcoder';
import { encodePng } from '../util/png';


export interface ObjectsOptions {
    file: string;
}


export interface InspectOptions {
    file: string;
    object: number;
    config?: string;
}


export interface ExtractOptions {
    file: string;
    out: string;
    transparent: boolean;
    config?: string;
}


export interface ObjectSummary {
    name: string;
    vertexCount: number;
    primitiveCounts: { [type in PrimitiveType]?: number };
    // primitives whose vertex colors are replaced by the engine glow
    enginePrimitiveCount: number;
    textureCount: number;
    textureAlphaModes: TextureAlphaMode[];
    boundTextureCount: number;
}


const loadConfig = (configDir?: string): AssetConfig =>
    configDir ? AssetConfig.load(configDir) : new AssetConfig();


export const listObjects = (options: ObjectsOptions): ModelObjectInfo[] => {
    if(!existsSync(options.file)) {
        throw new AssetError('NotFound', `Model file not found`, options.file);
    }

    const objects = listModelObjects(readFileSync(options.file));
    for(const { index, name, vertexCount, normalCount, primitiveCount } of objects) {
        logger.info(`[${index}] ${name}: ${vertexCount} vertices, ${normalCount} normals, ${primitiveCount} primitives`);
    }

    return objects;
};


export const inspectObject = (options: InspectOptions): ObjectSummary => {
    const pipeline = new AssetPipeline(loadConfig(options.config));
    const { mesh, textures, boundTextureCount } = pipeline.loadObject(options.file, options.object);

    const primitiveCounts: { [type in PrimitiveType]?: number } = {};
    for(const [ type, count ] of mesh.countPrimitives()) {
        primitiveCounts[type] = count;
        logger.info(`${type}: ${count}`);
    }

    return {
        name: mesh.name,
        vertexCount: mesh.vertices.length,
        primitiveCounts,
        enginePrimitiveCount: mesh.primitives.filter(primitive => hasFlag(primitive, PrimitiveFlags.SHIP_ENGINE)).length,
        textureCount: textures.length,
        textureAlphaModes: textures.map(detectAlphaMode),
        boundTextureCount
    };
};


/**
 * Decodes a compressed texture archive or a single image file and writes every image as a PNG.
 * @returns The paths of the files written.
 */
export const extractImages = (options: ExtractOptions): string[] => {
    const { file, out, transparent } = options;
    const extension = extname(file).toLowerCase();
    const baseName = basename(file, extname(file));

    let images: DecodedImage[];
    if(extension === '.tim') {
        images = [ readTimFile(file, transparent) ];
    } else {
        const pipeline = new AssetPipeline(loadConfig(options.config));
        images = pipeline.loadArchiveTextures(file, transparent);
    }

    if(!existsSync(out)) {
        mkdirSync(out, { recursive: true });
    }

    const written: string[] = [];
    images.forEach((image, index) => {
        if(image.width === 0 || image.height === 0) {
            logger.warn(`Image ${index} of ${file} is empty and was not written.`);
            return;
        }

        const fileName = extension === '.tim' ? `${baseName}.png` : `${baseName}_${index}.png`;
        const outputPath = join(out, fileName);
        writeFileSync(outputPath, encodePng(image));
        written.push(outputPath);
    });

    logger.info(`Wrote ${written.length} of ${images.length} images to ${out}.`);
    return written;
};
