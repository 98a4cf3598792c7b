import fs from "fs";
import path from "path";
import sharp from "sharp";
import { TextDocument } from "./document";

export type ImageFormat = "webp" | "png";

export interface PlacedImage {
    file: string;
    /** path relative to the document */
    src: string;
    width: number;
    height: number;
}

export const IMAGES_DIR = "images";

/**
 * Moves a downloaded image into the images directory beside the document,
 * converting it on the way, and removes the download.
 */
export async function placeImage(
    downloaded: string,
    doc: TextDocument,
    format: ImageFormat = "webp"
): Promise<PlacedImage> {
    const documentDir = path.dirname(doc.path);
    const imagesDir = path.join(documentDir, IMAGES_DIR);
    await fs.promises.mkdir(imagesDir, { recursive: true });

    const name = path.parse(downloaded).name;
    const file = path.join(imagesDir, `${name}.${format}`);
    const info = await sharp(downloaded).toFormat(format).toFile(file);
    await fs.promises.unlink(downloaded);

    return {
        file,
        src: path.relative(documentDir, file),
        width: info.width,
        height: info.height,
    };
}

export async function readSourceImage(file: string): Promise<string> {
    const data = await sharp(file).webp().toBuffer();
    return data.toString("base64");
}
