export type Endian = 'le' | 'be';


/**
 * Growable byte sink used to build binary fixtures.
 */
export class ByteWriter {

    private readonly endian: Endian;
    private bytes: number[] = [];

    public constructor(endian: Endian) {
        this.endian = endian;
    }

    public u8(value: number): this {
        this.bytes.push(value & 0xff);
        return this;
    }

    public u16(value: number): this {
        return this.write(value & 0xffff, 2);
    }

    public i16(value: number): this {
        return this.write(value & 0xffff, 2);
    }

    public u32(value: number): this {
        return this.write(value >>> 0, 4);
    }

    public i32(value: number): this {
        return this.write(value >>> 0, 4);
    }

    public zeros(count: number): this {
        for(let i = 0; i < count; i++) {
            this.bytes.push(0);
        }
        return this;
    }

    public raw(data: ArrayLike<number>): this {
        for(let i = 0; i < data.length; i++) {
            this.bytes.push(data[i] & 0xff);
        }
        return this;
    }

    public get length(): number {
        return this.bytes.length;
    }

    public toBuffer(): Buffer {
        return Buffer.from(this.bytes);
    }

    private write(value: number, byteCount: number): this {
        const ordered: number[] = [];
        for(let i = 0; i < byteCount; i++) {
            ordered.push(Math.floor(value / 2 ** (8 * i)) & 0xff);
        }

        if(this.endian === 'be') {
            ordered.reverse();
        }

        this.bytes.push(...ordered);
        return this;
    }

}
