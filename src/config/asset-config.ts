import { join } from 'path';
import { existsSync, readFileSync } from 'graceful-fs';
import JSON5 from 'json5';
import { logger } from '@runejs/common';


export interface DuplicateTextureEntry {
    // file name of the compressed archive, compared case-insensitively
    archive: string;
    index: number;
}


export interface AssetConfigOptions {
    assetRoot: string;
    archiveExtension: string;
    shipModel: string;
    shipCount: number;
    shadowTextureDir: string;
    duplicateTextures: DuplicateTextureEntry[];
}


export const DEFAULT_ASSET_CONFIG: Readonly<AssetConfigOptions> = {
    assetRoot: './assets',
    archiveExtension: '.cmp',
    shipModel: join('common', 'allsh.prm'),
    shipCount: 8,
    shadowTextureDir: join('..', 'textures'),
    // image 11 of the ship archive duplicates image 10 and overlaps the wing texture when drawn
    duplicateTextures: [ { archive: 'allsh.cmp', index: 11 } ]
};


const isRecord = (value: unknown): value is { [key: string]: unknown } =>
    typeof value === 'object' && value !== null && !Array.isArray(value);


const readString = (source: { [key: string]: unknown }, key: string, fallback: string): string => {
    const value = source[key];
    if(value === undefined) {
        return fallback;
    }
    if(typeof value !== 'string') {
        throw new Error(`Asset config value '${key}' must be a string.`);
    }
    return value;
};


const readNumber = (source: { [key: string]: unknown }, key: string, fallback: number): number => {
    const value = source[key];
    if(value === undefined) {
        return fallback;
    }
    if(typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new Error(`Asset config value '${key}' must be a non-negative integer.`);
    }
    return value;
};


const readDuplicateTextures = (value: unknown, fallback: DuplicateTextureEntry[]): DuplicateTextureEntry[] => {
    if(value === undefined) {
        return fallback;
    }
    if(!Array.isArray(value)) {
        throw new Error(`Asset config value 'duplicateTextures' must be an array.`);
    }

    return value.map((entry: unknown) => {
        if(!isRecord(entry) || typeof entry.archive !== 'string' || typeof entry.index !== 'number') {
            throw new Error(`Asset config 'duplicateTextures' entries need an 'archive' name and an 'index'.`);
        }
        return { archive: entry.archive, index: entry.index };
    });
};


export class AssetConfig implements AssetConfigOptions {

    public readonly assetRoot: string;
    public readonly archiveExtension: string;
    public readonly shipModel: string;
    public readonly shipCount: number;
    public readonly shadowTextureDir: string;
    public readonly duplicateTextures: DuplicateTextureEntry[];

    public constructor(options: Partial<AssetConfigOptions> = {}) {
        const merged = { ...DEFAULT_ASSET_CONFIG, ...options };
        this.assetRoot = merged.assetRoot;
        this.archiveExtension = merged.archiveExtension;
        this.shipModel = merged.shipModel;
        this.shipCount = merged.shipCount;
        this.shadowTextureDir = merged.shadowTextureDir;
        this.duplicateTextures = merged.duplicateTextures.map(entry => ({ ...entry }));
    }

    /**
     * Loads `assets.json5` from the given config directory, falling back to the defaults for
     * anything it leaves out. A missing file keeps every default.
     */
    public static load(configDir: string = join('.', 'config')): AssetConfig {
        const configPath = join(configDir, 'assets.json5');
        if(!existsSync(configPath)) {
            logger.warn(`Asset config ${configPath} was not found, using defaults.`);
            return new AssetConfig();
        }

        let parsed: unknown;
        try {
            parsed = JSON5.parse(readFileSync(configPath, 'utf-8'));
        } catch(error) {
            logger.error(`Error loading asset config ${configPath}:`, error);
            throw error;
        }

        return AssetConfig.fromObject(parsed);
    }

    public static fromObject(source: unknown): AssetConfig {
        if(!isRecord(source)) {
            throw new Error(`Asset config must be an object.`);
        }

        const defaults = DEFAULT_ASSET_CONFIG;
        return new AssetConfig({
            assetRoot: readString(source, 'assetRoot', defaults.assetRoot),
            archiveExtension: readString(source, 'archiveExtension', defaults.archiveExtension),
            shipModel: readString(source, 'shipModel', defaults.shipModel),
            shipCount: readNumber(source, 'shipCount', defaults.shipCount),
            shadowTextureDir: readString(source, 'shadowTextureDir', defaults.shadowTextureDir),
            duplicateTextures: readDuplicateTextures(source.duplicateTextures, defaults.duplicateTextures)
        });
    }

    public isDuplicateTexture(archiveFileName: string, index: number): boolean {
        const name = archiveFileName.toLowerCase();
        return this.duplicateTextures.some(entry => entry.archive.toLowerCase() === name && entry.index === index);
    }

}
