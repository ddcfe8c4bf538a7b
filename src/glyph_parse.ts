import { MalformedGlyphStructure } from "./util.js";
import { type XmlElement, type XmlNode, descendants, elementChildren, parseXml, textContent } from "./xml_tree.js";

export type StrokeLabel = {
  transform: string;
  text: string;
};

export type GlyphSource = {
  /** Top-level nodes of the input, root included. */
  document: XmlNode[];
  doctype?: string;
  root: XmlElement;
  strokeGroup: XmlElement;
  labelGroup: XmlElement;
  baseId: string;
  strokes: string[];
  labels: StrokeLabel[];
};

const DOCTYPE_RE = /<!DOCTYPE[^[>]*(?:\[[\s\S]*?\])?\s*>/;

function rootElement(document: XmlNode[]): XmlElement {
  const root = document.find((n): n is XmlElement => n.type === "element");
  if (!root) throw new MalformedGlyphStructure("Document has no root element");
  return root;
}

/** Inner group holding the stroke paths: first child of the root's first group. */
export function strokeGroup(root: XmlElement): XmlElement {
  const outer = elementChildren(root)[0];
  if (!outer) throw new MalformedGlyphStructure(`<${root.name}> has no stroke path group`);
  const inner = elementChildren(outer)[0];
  if (!inner) throw new MalformedGlyphStructure(`<${outer.name}> stroke path group is empty`);
  return inner;
}

/** Group holding the stroke number labels: the root's second group. */
export function labelGroup(root: XmlElement): XmlElement {
  const group = elementChildren(root)[1];
  if (!group) throw new MalformedGlyphStructure(`<${root.name}> has no stroke number group`);
  return group;
}

export function parseGlyph(text: string): GlyphSource {
  const document = parseXml(text);
  const root = rootElement(document);
  const strokes = strokeGroup(root);
  const numbers = labelGroup(root);

  const baseId = strokes.attrs.id;
  if (!baseId) throw new MalformedGlyphStructure("Stroke group has no id");

  const paths = descendants(strokes, "path").map((p, i) => {
    const d = p.attrs.d;
    if (!d) throw new MalformedGlyphStructure(`Stroke ${i} of ${baseId} has no path data`);
    return d;
  });
  const labels = descendants(numbers, "text").map((t, i) => {
    const transform = t.attrs.transform;
    if (!transform) throw new MalformedGlyphStructure(`Stroke number ${i} of ${baseId} has no transform`);
    return { transform, text: textContent(t) };
  });

  if (paths.length === 0) throw new MalformedGlyphStructure(`${baseId} has no strokes`);
  if (paths.length !== labels.length) {
    throw new MalformedGlyphStructure(`${baseId} has ${paths.length} strokes but ${labels.length} stroke numbers`);
  }

  return {
    document,
    doctype: DOCTYPE_RE.exec(text)?.[0],
    root,
    strokeGroup: strokes,
    labelGroup: numbers,
    baseId,
    strokes: paths,
    labels,
  };
}
