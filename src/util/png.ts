import { PNG } from 'pngjs';
import { DecodedImage } from '../content/textures/tim-image';


export const imageToPng = (image: DecodedImage): PNG => {
    const png = new PNG({ width: image.width, height: image.height, filterType: -1 });
    png.data = Buffer.from(image.pixels);
    return png;
};


export const encodePng = (image: DecodedImage): Buffer => PNG.sync.write(imageToPng(image));


export const decodePng = (data: Buffer): DecodedImage => {
    const png = PNG.sync.read(data);
    return { width: png.width, height: png.height, pixels: new Uint8Array(png.data) };
};
