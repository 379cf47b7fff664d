import { Resvg } from '@resvg/resvg-js';

/** CSS pixels per inch; SVG user units are rendered at this density */
const SVG_DPI = 96;

export interface RasterImage {
  png: Buffer;
  width: number;
  height: number;
}

/**
 * Rasterize an SVG onto a white background at the given resolution
 *
 * KiCad plots text as strokes, so no system fonts are loaded.
 */
export function rasterizeSvg(svg: string | Buffer, dpi: number): RasterImage {
  const resvg = new Resvg(svg, {
    background: 'white',
    fitTo: { mode: 'zoom', value: dpi / SVG_DPI },
    font: { loadSystemFonts: false },
  });
  const rendered = resvg.render();
  return { png: rendered.asPng(), width: rendered.width, height: rendered.height };
}
