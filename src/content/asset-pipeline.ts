import { basename, dirname, extname, join } from 'path';
import { existsSync, readFileSync } from 'graceful-fs';
import { ByteBuffer, logger } from '@runejs/common';
import { AssetError } from '../asset-error';
import { AssetConfig } from '../config/asset-config';
import { unpackArchive } from '../compression';
import { PrmModelTranscoder } from './models/prm-model.transcoder';
import { Mesh } from './models/prm-model';
import { bindTextures, TextureHandleTable } from './models/texture-binding';
import { createTransparentImage, DecodedImage } from './textures/tim-image';
import { decodeTim, readTimFile } from './textures/tim.transcoder';


export interface LoadedObject {
    mesh: Mesh;
    textures: TextureHandleTable;
    // textured primitives that resolved to an image of the table
    boundTextureCount: number;
}


export interface LoadedShip extends LoadedObject {
    shipIndex: number;
    shadow: DecodedImage | null;
}


/**
 * Shadow textures are shared by pairs of ships, `shad1.tim` through `shad4.tim`.
 */
export const shadowTextureIndex = (shipIndex: number): number => (shipIndex >> 1) + 1;


const withPath = (error: unknown, path: string): unknown =>
    error instanceof AssetError ? error.withPath(path) : error;


/**
 * Loads model objects together with the textures of their companion archive, and binds
 * the two so that every textured primitive carries coordinates normalized to its image.
 *
 * Nothing is cached between calls; each load reads and decodes its files again.
 */
export class AssetPipeline {

    public readonly config: AssetConfig;

    public constructor(config: AssetConfig = new AssetConfig()) {
        this.config = config;
    }

    public companionArchivePath(modelPath: string): string {
        const baseName = basename(modelPath, extname(modelPath));
        return join(dirname(modelPath), baseName + this.config.archiveExtension);
    }

    public shadowTexturePath(modelPath: string, shipIndex: number): string {
        this.validateShipIndex(shipIndex);
        return join(dirname(modelPath), this.config.shadowTextureDir, `shad${shadowTextureIndex(shipIndex)}.tim`);
    }

    /**
     * Decodes every image of a compressed archive in archive order, by default without
     * transparency mode. Images listed as known duplicates are replaced by a transparent
     * 1x1 placeholder.
     * @throws AssetError `NotFound` when the archive does not exist, or whichever decode failure
     * the archive or one of its images produces.
     */
    public loadArchiveTextures(archivePath: string, transparencyMode: boolean = false): DecodedImage[] {
        if(!existsSync(archivePath)) {
            throw new AssetError('NotFound', `Texture archive not found`, archivePath);
        }

        const archiveName = basename(archivePath);

        try {
            const images = unpackArchive(new ByteBuffer(readFileSync(archivePath)));

            return images.map((imageData, index) => {
                if(this.config.isDuplicateTexture(archiveName, index)) {
                    logger.warn(`Replacing duplicate image ${index} of ${archiveName} with a transparent placeholder.`);
                    return createTransparentImage();
                }

                return decodeTim(imageData, transparencyMode);
            });
        } catch(error) {
            throw withPath(error, archivePath);
        }
    }

    /**
     * Loads a single object of a model file and binds it to its companion archive. A missing
     * archive leaves the mesh untextured; any other failure aborts the load.
     */
    public loadObject(modelPath: string, objectIndex: number): LoadedObject {
        try {
            const mesh = this.decodeMesh(modelPath, objectIndex);
            const textures = this.loadCompanionTextures(modelPath);
            const boundTextureCount = bindTextures(mesh, textures);

            logger.info(`Loaded object ${objectIndex} '${mesh.name}' with ${textures.length} textures, ` +
                `${boundTextureCount} primitives bound.`);

            return { mesh, textures, boundTextureCount };
        } catch(error) {
            logger.error(`Failed to load object ${objectIndex} of ${modelPath}:`, error);
            throw error;
        }
    }

    /**
     * @returns The decoded shadow texture of the given ship, or `null` when its file is absent.
     */
    public loadShadowTexture(modelPath: string, shipIndex: number): DecodedImage | null {
        const shadowPath = this.shadowTexturePath(modelPath, shipIndex);
        if(!existsSync(shadowPath)) {
            logger.warn(`Shadow texture ${shadowPath} for ship ${shipIndex} was not found.`);
            return null;
        }

        return readTimFile(shadowPath, true);
    }

    public loadShip(shipIndex: number): LoadedShip {
        this.validateShipIndex(shipIndex);

        const modelPath = join(this.config.assetRoot, this.config.shipModel);
        const loaded = this.loadObject(modelPath, shipIndex);
        const shadow = this.loadShadowTexture(modelPath, shipIndex);

        return { ...loaded, shipIndex, shadow };
    }

    private decodeMesh(modelPath: string, objectIndex: number): Mesh {
        const transcoder = PrmModelTranscoder.fromFile(modelPath);

        try {
            return transcoder.decodeObject(objectIndex);
        } catch(error) {
            throw withPath(error, modelPath);
        }
    }

    private loadCompanionTextures(modelPath: string): DecodedImage[] {
        const archivePath = this.companionArchivePath(modelPath);
        if(!existsSync(archivePath)) {
            logger.info(`No texture archive found for ${modelPath}, the object will be untextured.`);
            return [];
        }

        return this.loadArchiveTextures(archivePath);
    }

    private validateShipIndex(shipIndex: number): void {
        if(!Number.isInteger(shipIndex) || shipIndex < 0 || shipIndex >= this.config.shipCount) {
            throw new AssetError('ObjectIndexOutOfRange',
                `Ship index ${shipIndex} is outside of 0..${this.config.shipCount - 1}`);
        }
    }

}


/**
 * Loads one object of a model file with the default configuration.
 */
export const loadObject = (modelPath: string, objectIndex: number): LoadedObject =>
    new AssetPipeline().loadObject(modelPath, objectIndex);
