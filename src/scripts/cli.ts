#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import yargs from 'yargs/yargs';
import { ArgumentsCamelCase, Options } from 'yargs';
import { logger } from '@runejs/common';
import { isAssetError } from '../asset-error';
import { extractImages, ExtractOptions, inspectObject, InspectOptions, listObjects, ObjectsOptions } from './asset-tools';


function cmd<T>(
    name: string,
    desc: string,
    options: { [key: string]: Options },
    executor: (argv: ArgumentsCamelCase<T>) => void,
): void {
    yargs(hideBin(process.argv))
        .command<T>(name, desc, (yargs) => yargs, (argv) => {
            try {
                executor(argv);
            } catch(error) {
                if(isAssetError(error)) {
                    logger.error(`The ${name} command failed with ${error.kind}: ${error.message}`);
                } else {
                    logger.error(`The ${name} command failed:`, error);
                }
                process.exitCode = 1;
            }
        })
        .options(options)
        .parse();
}


const configOption: Options = {
    alias: 'c', type: 'string',
    description: `Directory holding assets.json5. The built-in defaults are used when omitted.`
};


cmd<ObjectsOptions>('objects', 'list the objects stored within a model file', {
    file: {
        alias: 'f', type: 'string', demandOption: true,
        description: `The model file to list.`
    }
}, (argv) => {
    listObjects(argv);
});


cmd<InspectOptions>('inspect', 'load a model object with its textures and summarize it', {
    file: {
        alias: 'f', type: 'string', demandOption: true,
        description: `The model file holding the object.`
    },
    object: {
        alias: 'o', type: 'number', default: 0,
        description: `Index of the object within the model file. Defaults to 0.`
    },
    config: configOption
}, (argv) => {
    const summary = inspectObject(argv);
    logger.info(`'${summary.name}': ${summary.vertexCount} vertices, ` +
        `${summary.boundTextureCount} primitives bound to ${summary.textureCount} textures, ` +
        `${summary.enginePrimitiveCount} engine primitives.`);
    summary.textureAlphaModes.forEach((mode, index) => logger.info(`Texture ${index}: ${mode}`));
});


cmd<ExtractOptions>('extract', 'decode a texture archive or image file and write its images as PNG', {
    file: {
        alias: 'f', type: 'string', demandOption: true,
        description: `The compressed texture archive or single image file to decode.`
    },
    out: {
        alias: 'o', type: 'string', default: './output',
        description: `The directory to write images to. Defaults to './output'.`
    },
    transparent: {
        alias: 't', type: 'boolean', default: false,
        description: `Treat colors with only the semi-transparency bit set as transparent. Defaults to 'false'.`
    },
    config: configOption
}, (argv) => {
    extractImages(argv);
});
