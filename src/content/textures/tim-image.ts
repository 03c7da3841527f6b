export enum TimColorType {
    TRUE_COLOR_16BPP = 0x02,
    PALETTED_4BPP = 0x08,
    PALETTED_8BPP = 0x09
}


export type TextureAlphaMode = 'opaque' | 'cutout' | 'translucent';


/**
 * A fully decoded image, `pixels` holding `width * height` RGBA8 entries in row-major order.
 */
export interface DecodedImage {
    width: number;
    height: number;
    pixels: Uint8Array;
}


/**
 * Pixels stored in each 16-bit word of the pixel block, per color type.
 */
export const pixelsPerWord = (colorType: TimColorType): number => {
    switch(colorType) {
        case TimColorType.PALETTED_4BPP: return 4;
        case TimColorType.PALETTED_8BPP: return 2;
        default: return 1;
    }
};


export const isPaletted = (colorType: TimColorType): boolean =>
    colorType === TimColorType.PALETTED_4BPP || colorType === TimColorType.PALETTED_8BPP;


/**
 * Expands a packed 5:5:5 color with its semi-transparency bit into RGBA.
 *
 * Pure black (`0x0000`) is always transparent. A color with only the semi-transparency
 * bit set (`0x8000`) is transparent only when `transparencyMode` is on.
 */
export const tim16BitToRgba = (color: number, transparencyMode: boolean): [ number, number, number, number ] => {
    const r = ((color >> 0) & 0x1f) << 3;
    const g = ((color >> 5) & 0x1f) << 3;
    const b = ((color >> 10) & 0x1f) << 3;

    let a = 0xff;
    if(color === 0) {
        a = 0x00;
    } else if(transparencyMode && (color & 0x7fff) === 0) {
        a = 0x00;
    }

    return [ r, g, b, a ];
};


export const createTransparentImage = (width: number = 1, height: number = 1): DecodedImage => ({
    width,
    height,
    pixels: new Uint8Array(width * height * 4)
});


export const detectAlphaMode = (image: DecodedImage): TextureAlphaMode => {
    let mode: TextureAlphaMode = 'opaque';

    for(let i = 3; i < image.pixels.length; i += 4) {
        const alpha = image.pixels[i];
        if(alpha === 0xff) {
            continue;
        }

        if(alpha !== 0x00) {
            return 'translucent';
        }

        mode = 'cutout';
    }

    return mode;
};
