import { readFileSync } from "node:fs";
import { PNG } from "pngjs";
import { z } from "zod";
import { ganttGridEntries, ganttInfoLine } from "./ascii.js";
import type { GridLine } from "./ascii.js";
import { colorFor } from "../render/status-table.js";
import type { CellMark, GanttTree } from "../render/types.js";

export const BACKGROUND = "#111827";
export const FOREGROUND = "#E2E8F0";

const fontSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive().max(8),
  glyphs: z.record(z.string(), z.string().regex(/^(?:[0-9a-f]{2})+$/)),
});

export type BitmapFont = z.infer<typeof fontSchema>;

let cachedFont: BitmapFont | undefined;

/** The 5x7 column-bitmap font in assets/ (one hex byte per column, LSB at the top). */
export function loadFont(): BitmapFont {
  if (!cachedFont) {
    const raw = readFileSync(new URL("../../assets/font5x7.json", import.meta.url), "utf-8");
    cachedFont = fontSchema.parse(JSON.parse(raw));
  }
  return cachedFont;
}

export interface RasterOptions {
  /** Pixel multiplier for every glyph and cell. Default 2. */
  scale?: number;
  /** Border around the content in unscaled pixels. Default 4. */
  padding?: number;
}

type Rgb = [number, number, number];

export function hexToRgb(hex: string): Rgb {
  const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!match) throw new Error(`Invalid color: ${hex}`);
  return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)];
}

class Canvas {
  readonly png: PNG;

  constructor(width: number, height: number, background: Rgb) {
    this.png = new PNG({ width, height });
    this.fillRect(0, 0, width, height, background);
  }

  fillRect(x: number, y: number, w: number, h: number, [r, g, b]: Rgb): void {
    const { width, height, data } = this.png;
    for (let py = Math.max(0, y); py < Math.min(height, y + h); py++) {
      for (let px = Math.max(0, x); px < Math.min(width, x + w); px++) {
        const i = (py * width + px) * 4;
        data[i] = r;
        data[i + 1] = g;
        data[i + 2] = b;
        data[i + 3] = 255;
      }
    }
  }
}

/**
 * Draw the expanded timeline as a PNG. Geometry follows the text grid: one
 * character cell per column, timeline cells filled with their status color.
 */
export function renderGanttPng(tree: GanttTree, options: RasterOptions = {}): Buffer {
  const font = loadFont();
  const scale = options.scale ?? 2;
  const padding = (options.padding ?? 4) * scale;
  const cellW = (font.width + 1) * scale;
  const glyphH = font.height * scale;
  const lineH = (font.height + 3) * scale;
  const fallback = font.glyphs["?"] ?? "";

  const lines: GridLine[] = [
    { text: tree.title },
    { text: ganttInfoLine(tree) },
    { text: "" },
    ...ganttGridEntries(tree),
  ];
  const widest = Math.max(1, ...lines.map((line) => Array.from(line.text).length));
  const canvas = new Canvas(
    padding * 2 + widest * cellW,
    padding * 2 + lines.length * lineH,
    hexToRgb(BACKGROUND),
  );
  const foreground = hexToRgb(FOREGROUND);

  const drawGlyph = (char: string, x: number, y: number): void => {
    const bits = font.glyphs[char] ?? fallback;
    for (let col = 0; col < bits.length / 2; col++) {
      const byte = parseInt(bits.slice(col * 2, col * 2 + 2), 16);
      for (let row = 0; row < font.height; row++) {
        if ((byte >> row) & 1) {
          canvas.fillRect(x + col * scale, y + row * scale, scale, scale, foreground);
        }
      }
    }
  };

  const drawCell = (mark: CellMark, x: number, y: number): void => {
    const color = hexToRgb(colorFor(mark));
    if (mark.type === "link") {
      canvas.fillRect(x, y + Math.floor(glyphH / 2), cellW, scale, color);
    } else {
      canvas.fillRect(x, y, cellW, glyphH, color);
    }
  };

  const cellStart = tree.labelWidth + 1;
  lines.forEach((line, index) => {
    const y = padding + index * lineH;
    Array.from(line.text).forEach((char, column) => {
      const x = padding + column * cellW;
      const cell = line.cells ? column - cellStart : -1;
      if (line.cells && cell >= 0 && cell < line.cells.length) {
        const mark = line.cells[cell];
        if (mark) drawCell(mark, x, y);
        return;
      }
      if (char !== " ") drawGlyph(char, x, y);
    });
  });

  return PNG.sync.write(canvas.png);
}
