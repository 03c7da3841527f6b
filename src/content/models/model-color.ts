export interface Rgba {
    r: number;
    g: number;
    b: number;
    a: number;
}


export class ModelColor {

    /**
     * Unpacks a model color word. The low byte is unused and alpha is always opaque.
     */
    public static fromU32(value: number): Rgba {
        return {
            r: (value >>> 24) & 0xff,
            g: (value >>> 16) & 0xff,
            b: (value >>> 8) & 0xff,
            a: 0xff
        };
    }

}
