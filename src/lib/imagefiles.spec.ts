import fs from "fs";
import os from "os";
import path from "path";
import sharp from "sharp";
import { TextDocument } from "./document";
import { placeImage, readSourceImage } from "./imagefiles";

jest.setTimeout(20000);

describe("imagefiles", () => {
    let dir: string;
    let downloaded: string;
    let doc: TextDocument;

    beforeEach(async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "horde-images-"));
        downloaded = path.join(dir, "download", "job-1.webp");
        fs.mkdirSync(path.dirname(downloaded));
        await sharp({
            create: { width: 8, height: 4, channels: 3, background: { r: 200, g: 40, b: 40 } },
        })
            .webp()
            .toFile(downloaded);
        doc = { path: path.join(dir, "notes.md"), kind: "markdown", text: "", created: true };
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe("placeImage", () => {
        it("should convert the download beside the document", async () => {
            const placed = await placeImage(downloaded, doc, "png");
            expect(placed).toEqual({
                file: path.join(dir, "images", "job-1.png"),
                src: path.join("images", "job-1.png"),
                width: 8,
                height: 4,
            });
            const metadata = await sharp(placed.file).metadata();
            expect(metadata.format).toBe("png");
        });

        it("should remove the download", async () => {
            await placeImage(downloaded, doc);
            expect(fs.existsSync(downloaded)).toBe(false);
            expect(fs.existsSync(path.join(dir, "images", "job-1.webp"))).toBe(true);
        });
    });

    describe("readSourceImage", () => {
        it("should encode the image as base64 webp", async () => {
            const encoded = await readSourceImage(downloaded);
            const data = Buffer.from(encoded, "base64");
            expect(data.subarray(0, 4).toString()).toBe("RIFF");
            expect(data.subarray(8, 12).toString()).toBe("WEBP");
        });
    });
});
