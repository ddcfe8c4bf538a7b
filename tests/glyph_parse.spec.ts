import { describe, it, expect } from "vitest";
import { labelGroup, parseGlyph, strokeGroup } from "../src/glyph_parse.js";
import { MalformedGlyphStructure } from "../src/util.js";
import { parseXml } from "../src/xml_tree.js";
import { KVG_DOCTYPE, glyphSvg, threeStrokes } from "./helpers/glyphs.js";

function withDoctype(doctype: string): string {
  return glyphSvg("04e09", threeStrokes).replace("<!-- Test glyph -->", `<!-- Test glyph -->\n${doctype}`);
}

describe("parseGlyph", () => {
  it("reads strokes and stroke numbers in order", () => {
    const glyph = parseGlyph(glyphSvg("test", threeStrokes));
    expect(glyph.baseId).toBe("kvg:test");
    expect(glyph.strokes).toEqual(threeStrokes.map((s) => s.d));
    expect(glyph.labels).toEqual([
      { transform: "matrix(1 0 0 1 12.5 27.13)", text: "1" },
      { transform: "matrix(1 0 0 1 17.25 52)", text: "2" },
      { transform: "matrix(1 0 0 1 8 87.5)", text: "3" },
    ]);
    expect(glyph.root.name).toBe("svg");
    expect(glyph.strokeGroup.attrs["kvg:element"]).toBe("三");
    expect(glyph.labelGroup.attrs.id).toBe("kvg:StrokeNumbers_test");
    expect(glyph.doctype).toBeUndefined();
  });

  it("keeps the document type declaration", () => {
    const glyph = parseGlyph(glyphSvg("test", threeStrokes, { doctype: true }));
    expect(glyph.doctype).toBe(KVG_DOCTYPE);
    expect(glyph.strokes).toHaveLength(3);
  });

  it("collects paths from nested component groups", () => {
    const text = `<svg>
<g><g id="kvg:nested">
  <g><path d="M1,1"/><g><path d="M2,2"/></g></g>
  <path d="M3,3"/>
</g></g>
<g><text transform="matrix(1 0 0 1 0 0)">1</text><text transform="matrix(1 0 0 1 0 0)">2</text><text transform="matrix(1 0 0 1 0 0)">3</text></g>
</svg>`;
    expect(parseGlyph(text).strokes).toEqual(["M1,1", "M2,2", "M3,3"]);
  });

  it.each([
    ["no root", "<!-- empty -->"],
    ["no groups", "<svg/>"],
    ["empty stroke group", `<svg><g/><g/></svg>`],
    ["no stroke number group", `<svg><g><g id="a"><path d="M1,1"/></g></g></svg>`],
    ["stroke group without id", `<svg><g><g><path d="M1,1"/></g></g><g><text transform="matrix(1 0 0 1 0 0)">1</text></g></svg>`],
    ["path without data", `<svg><g><g id="a"><path/></g></g><g><text transform="matrix(1 0 0 1 0 0)">1</text></g></svg>`],
    ["label without transform", `<svg><g><g id="a"><path d="M1,1"/></g></g><g><text>1</text></g></svg>`],
    ["no strokes", `<svg><g><g id="a"/></g><g/></svg>`],
    ["count mismatch", `<svg><g><g id="a"><path d="M1,1"/><path d="M2,2"/></g></g><g><text transform="matrix(1 0 0 1 0 0)">1</text></g></svg>`],
    ["broken XML", `<svg><g></svg>`],
    ["external entity", withDoctype(`<!DOCTYPE svg [ <!ENTITY x SYSTEM "foo"> ]>`)],
    ["bad entity name", withDoctype(`<!DOCTYPE svg [ <!ENTITY a&b "foo"> ]>`)],
  ])("rejects a document with %s", (_, text) => {
    expect(() => parseGlyph(text)).toThrow(MalformedGlyphStructure);
  });

  it("reports DOCTYPE errors as invalid XML", () => {
    const text = withDoctype(`<!DOCTYPE svg [ <!ENTITY x SYSTEM "foo"> ]>`);
    expect(() => parseXml(text)).toThrow(/^Invalid XML: /);
  });
});

describe("group accessors", () => {
  it("find the stroke and number groups by position", () => {
    const [root] = parseXml(`<svg><g id="outer"><g id="inner"/></g><g id="numbers"/></svg>`);
    if (root.type !== "element") throw new Error(`expected <svg>, got ${root.type}`);
    expect(strokeGroup(root).attrs.id).toBe("inner");
    expect(labelGroup(root).attrs.id).toBe("numbers");
  });
});
