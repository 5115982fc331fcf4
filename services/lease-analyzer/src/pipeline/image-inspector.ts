import { extname } from "node:path";

import { Injectable } from "@nestjs/common";
import { loadImage } from "@napi-rs/canvas";
import sharp from "sharp";

import { TransformError } from "../errors.js";
import type { ImageAsset, SourceDocument } from "../types.js";

const BMP_MIN_HEADER_BYTES = 26;

/** sharp has no BMP decoder; its headers say how long the file must be. */
async function checkBitmap(bytes: Buffer): Promise<void> {
  if (bytes.length < BMP_MIN_HEADER_BYTES || bytes.toString("latin1", 0, 2) !== "BM") {
    throw new Error("not a BMP image");
  }
  const declaredSize = bytes.readUInt32LE(2);
  const pixelOffset = bytes.readUInt32LE(10);
  if (declaredSize > bytes.length || pixelOffset >= bytes.length) {
    throw new Error("image data is truncated");
  }
  const image = await loadImage(bytes);
  if (image.width === 0 || image.height === 0) {
    throw new Error("image has no pixels");
  }
}

async function checkRaster(bytes: Buffer): Promise<void> {
  const { info } = await sharp(bytes, { failOn: "truncated" }).raw().toBuffer({ resolveWithObject: true });
  if (info.width === 0 || info.height === 0) {
    throw new Error("image has no pixels");
  }
}

@Injectable()
export class ImageInspector {
  /** Decodes the bytes fully; truncated or unreadable images are rejected. */
  async toAsset(document: SourceDocument): Promise<ImageAsset> {
    if (document.bytes.length === 0) {
      throw new TransformError(document.filename, new Error("file is empty"));
    }
    try {
      if (extname(document.filename).toLowerCase() === ".bmp") {
        await checkBitmap(document.bytes);
      } else {
        await checkRaster(document.bytes);
      }
    } catch (error) {
      throw new TransformError(document.filename, error);
    }
    return {
      kind: "image",
      documentIndex: document.index,
      filename: document.filename,
      bytes: document.bytes,
    };
  }
}
