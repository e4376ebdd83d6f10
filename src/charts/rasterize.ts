// ---------------------------------------------------------------------------
// SVG → PNG rasterisation for embedding charts in PDF reports.
// ---------------------------------------------------------------------------

import sharp from "sharp";

/**
 * Render an SVG document to PNG bytes. `scale` multiplies the SVG's own
 * pixel size, so 2 yields a raster twice as wide as the viewBox.
 */
export async function rasterizeSvg(svg: string, scale = 2): Promise<Buffer> {
  return sharp(Buffer.from(svg), { density: 72 * scale }).png().toBuffer();
}
