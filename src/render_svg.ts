import type { Marker, StrokeDiagram } from "./compose.js";
import type { MarkerStyle, StrokeConfig } from "./config.js";
import type { GlyphSource } from "./glyph_parse.js";
import { type XmlElement, type XmlNode, buildXml, element } from "./xml_tree.js";

const XML_DECLARATION = `<?xml version="1.0" encoding="UTF-8"?>`;

function markerElement(m: Marker, style: MarkerStyle): XmlElement {
  return element("circle", {
    cx: String(m.cx),
    cy: String(m.cy),
    r: String(style.radius),
    "stroke-width": String(style.strokeWidth),
    fill: style.fill,
  });
}

function strokeElements(diagram: StrokeDiagram, style: MarkerStyle): XmlNode[] {
  return diagram.panels.flatMap((p) => [
    ...p.strokes.map((s) => element("path", { id: s.id, d: s.d })),
    markerElement(p.marker, style),
  ]);
}

function labelElements(diagram: StrokeDiagram): XmlNode[] {
  return diagram.panels.flatMap((p) =>
    p.labels.map((l) => element("text", { transform: l.transform }, [{ type: "text", text: l.text }])),
  );
}

/** Copies `el`, swapping in `replace`'s children for any element it maps. */
function rebuild(el: XmlElement, replace: Map<XmlElement, XmlNode[]>): XmlElement {
  const swapped = replace.get(el);
  return {
    ...el,
    attrs: { ...el.attrs },
    children:
      swapped ??
      el.children.map((c): XmlNode => (c.type === "element" ? rebuild(c, replace) : { ...c })),
  };
}

export function renderDiagramRoot(glyph: GlyphSource, diagram: StrokeDiagram, config: StrokeConfig): XmlElement {
  const replace = new Map<XmlElement, XmlNode[]>([
    [glyph.strokeGroup, strokeElements(diagram, config.marker)],
    [glyph.labelGroup, labelElements(diagram)],
  ]);
  const root = rebuild(glyph.root, replace);
  const { width, height, viewBox } = diagram.canvas;
  return {
    ...root,
    attrs: { ...root.attrs, width: String(width), height: String(height), viewBox },
    children: [{ type: "comment", text: `\n${config.license}\n` }, ...root.children],
  };
}

export function renderDiagram(glyph: GlyphSource, diagram: StrokeDiagram, config: StrokeConfig): string {
  const parts = [XML_DECLARATION];
  for (const node of glyph.document) {
    if (node === glyph.root) {
      if (glyph.doctype) parts.push(glyph.doctype);
      parts.push(buildXml([renderDiagramRoot(glyph, diagram, config)]));
    } else {
      parts.push(buildXml([node]));
    }
  }
  return `${parts.join("\n")}\n`;
}
