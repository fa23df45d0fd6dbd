// src/world/render/rgbaImage.ts
export type Rgba = readonly [number, number, number, number];

export type RgbaImage = {
  width: number;
  height: number;
  data: Uint8Array; // length = width*height*4 (RGBA)
};

export function createImage(width: number, height: number, fill: Rgba = [0, 0, 0, 0]): RgbaImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid image size ${width}x${height}`);
  }
  const img = { width, height, data: new Uint8Array(width * height * 4) };
  fillRect(img, 0, 0, width, height, fill);
  return img;
}

/** Fills [left, right) x [top, bottom), clipped to the image. */
export function fillRect(
  img: RgbaImage,
  left: number,
  top: number,
  right: number,
  bottom: number,
  colour: Rgba,
): void {
  const [r, g, b, a] = colour;
  const x0 = Math.max(0, left);
  const y0 = Math.max(0, top);
  const x1 = Math.min(img.width, right);
  const y1 = Math.min(img.height, bottom);

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const o = (y * img.width + x) * 4;
      img.data[o + 0] = r;
      img.data[o + 1] = g;
      img.data[o + 2] = b;
      img.data[o + 3] = a;
    }
  }
}

export function getPixel(img: RgbaImage, x: number, y: number): Rgba {
  if (x < 0 || y < 0 || x >= img.width || y >= img.height) {
    throw new Error(`Pixel (${x},${y}) outside ${img.width}x${img.height}`);
  }
  const o = (y * img.width + x) * 4;
  return [img.data[o + 0]!, img.data[o + 1]!, img.data[o + 2]!, img.data[o + 3]!];
}
