import * as pngjs from "pngjs";
import type { RgbaImage } from "./rgbaImage.js";

const { PNG } = pngjs;

export function writePngRgba(img: RgbaImage): Buffer {
  const png = new PNG({ width: img.width, height: img.height });
  png.data = Buffer.from(img.data);
  return PNG.sync.write(png);
}
