import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedGlyphStructure, errorMessage, isRecord } from "./util.js";

export type XmlElement = {
  type: "element";
  name: string;
  attrs: Record<string, string>;
  children: XmlNode[];
};

export type XmlText = { type: "text"; text: string };

export type XmlComment = { type: "comment"; text: string };

export type XmlNode = XmlElement | XmlText | XmlComment;

const ATTR_PREFIX = "@_";
const ATTRS_KEY = ":@";
const TEXT_KEY = "#text";
const COMMENT_KEY = "#comment";

function readAttrs(raw: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) return attrs;
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(ATTR_PREFIX)) attrs[key.slice(ATTR_PREFIX.length)] = String(value);
  }
  return attrs;
}

function commentText(raw: unknown): string {
  if (!Array.isArray(raw)) return "";
  return raw
    .map((part) => (isRecord(part) && part[TEXT_KEY] !== undefined ? String(part[TEXT_KEY]) : ""))
    .join("");
}

function fromOrdered(raw: unknown): XmlNode[] {
  if (!Array.isArray(raw)) return [];
  const out: XmlNode[] = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    for (const [key, value] of Object.entries(item)) {
      if (key === ATTRS_KEY || key.startsWith("?")) continue;
      if (key === TEXT_KEY) {
        out.push({ type: "text", text: String(value) });
      } else if (key === COMMENT_KEY) {
        out.push({ type: "comment", text: commentText(value) });
      } else {
        out.push({ type: "element", name: key, attrs: readAttrs(item[ATTRS_KEY]), children: fromOrdered(value) });
      }
    }
  }
  return out;
}

function toOrdered(nodes: XmlNode[]): Record<string, unknown>[] {
  return nodes.map((n) => {
    switch (n.type) {
      case "text":
        return { [TEXT_KEY]: n.text };
      case "comment":
        return { [COMMENT_KEY]: [{ [TEXT_KEY]: n.text }] };
      case "element": {
        const out: Record<string, unknown> = { [n.name]: toOrdered(n.children) };
        const attrEntries = Object.entries(n.attrs);
        if (attrEntries.length > 0) {
          out[ATTRS_KEY] = Object.fromEntries(attrEntries.map(([k, v]) => [`${ATTR_PREFIX}${k}`, v]));
        }
        return out;
      }
    }
  });
}

/** Parses a document into its top-level nodes; blank text between tags is dropped. */
export function parseXml(text: string): XmlNode[] {
  const source = text.trimStart();
  const valid = XMLValidator.validate(source);
  if (valid !== true) {
    throw new MalformedGlyphStructure(`Invalid XML at line ${valid.err.line}: ${valid.err.msg}`);
  }
  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    commentPropName: COMMENT_KEY,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
  });
  let ordered: unknown;
  try {
    ordered = parser.parse(source);
  } catch (e) {
    throw new MalformedGlyphStructure(`Invalid XML: ${errorMessage(e)}`);
  }
  return fromOrdered(ordered);
}

export function buildXml(nodes: XmlNode[]): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    commentPropName: COMMENT_KEY,
    format: true,
    indentBy: "  ",
    suppressEmptyNode: true,
  });
  return builder.build(toOrdered(nodes)).trim();
}

export function element(name: string, attrs: Record<string, string>, children: XmlNode[] = []): XmlElement {
  return { type: "element", name, attrs, children };
}

export function localName(name: string): string {
  const i = name.indexOf(":");
  return i < 0 ? name : name.slice(i + 1);
}

export function elementChildren(el: XmlElement): XmlElement[] {
  return el.children.filter((c): c is XmlElement => c.type === "element");
}

/** Every element below `el` with the given local name, in document order. */
export function descendants(el: XmlElement, name: string): XmlElement[] {
  const out: XmlElement[] = [];
  for (const child of elementChildren(el)) {
    if (localName(child.name) === name) out.push(child);
    out.push(...descendants(child, name));
  }
  return out;
}

export function textContent(el: XmlElement): string {
  return el.children
    .map((c) => (c.type === "text" ? c.text : c.type === "element" ? textContent(c) : ""))
    .join("");
}
