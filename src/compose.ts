import { pathToFileURL } from "url";
import { type StrokeConfig, loadConfig } from "./config.js";
import { type GlyphSource, parseGlyph } from "./glyph_parse.js";
import { type Canvas, type PanelPosition, canvasSize, panelPositions } from "./layout.js";
import { translatePath } from "./path_shift.js";
import { renderDiagram } from "./render_svg.js";
import { translateTransform } from "./transform_shift.js";
import { MalformedGlyphStructure, readText, writeText } from "./util.js";

export type StrokeCopy = {
  id: string;
  stroke: number;
  d: string;
};

export type PanelLabel = {
  transform: string;
  text: string;
};

export type Marker = {
  cx: number;
  cy: number;
};

export type Panel = PanelPosition & {
  strokes: StrokeCopy[];
  labels: PanelLabel[];
  marker: Marker;
};

export type StrokeDiagram = {
  baseId: string;
  panels: Panel[];
  canvas: Canvas;
};

export type GlyphStrokes = Pick<GlyphSource, "baseId" | "strokes" | "labels">;

/**
 * Lays out one panel per stroke. Panel i redraws strokes 0..i from the source
 * paths; no copy is derived from another panel's output.
 */
export function composeDiagram(glyph: GlyphStrokes, config: StrokeConfig): StrokeDiagram {
  const { baseId, strokes, labels } = glyph;
  if (strokes.length === 0) throw new MalformedGlyphStructure(`${baseId} has no strokes`);
  if (strokes.length !== labels.length) {
    throw new MalformedGlyphStructure(`${baseId} has ${strokes.length} strokes but ${labels.length} stroke numbers`);
  }
  const { cell } = config;

  const panels = panelPositions(strokes.length, config.boxesPerLine).map((pos): Panel => {
    const dx = pos.col * cell.width;
    const dy = pos.row * cell.height;
    const copies = strokes.slice(0, pos.index + 1).map((d, j) => ({ j, ...translatePath(d, dx, dy) }));
    const newest = copies[copies.length - 1];
    return {
      ...pos,
      strokes: copies.map((c) => ({ id: `${baseId}-s${c.j}-${pos.row}-${pos.col}`, stroke: c.j, d: c.d })),
      labels: labels.slice(0, pos.index + 1).map((l, j) => ({
        transform: translateTransform(l.transform, pos.col, pos.row, cell),
        text: String(j + config.labelStart),
      })),
      marker: { cx: newest.start.x, cy: newest.start.y },
    };
  });

  return { baseId, panels, canvas: canvasSize(strokes.length, config.boxesPerLine, cell) };
}

/** Reads one KanjiVG document and returns the stroke progression document as text. */
export function composeDocument(text: string, config: StrokeConfig): string {
  const glyph = parseGlyph(text);
  return renderDiagram(glyph, composeDiagram(glyph, config), config);
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const [input, output, rulesPath] = process.argv.slice(2);
  const config = loadConfig(rulesPath);
  writeText(output, composeDocument(readText(input), config));
  console.error(`compose: ${input} -> ${output}`);
}
