import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { generateStrokes, outputName } from "../src/batch.js";
import { defaultConfig, type StrokeConfig } from "../src/config.js";
import { EnvironmentError } from "../src/util.js";
import { glyphSvg, threeStrokes } from "./helpers/glyphs.js";

let tmp: string;
let config: StrokeConfig;
let lines: string[];
const log = (msg: string) => {
  lines.push(msg);
};

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "stroke-diagrams-"));
  const inputDir = path.join(tmp, "kanji");
  fs.mkdirSync(inputDir);
  fs.writeFileSync(path.join(inputDir, "04e09.svg"), glyphSvg("04e09", threeStrokes));
  fs.writeFileSync(
    path.join(inputDir, "bad.svg"),
    glyphSvg("bad", [{ d: "M10,10Z", transform: "matrix(1 0 0 1 0 0)" }]),
  );
  fs.writeFileSync(path.join(inputDir, "notes.txt"), "not a glyph");
  config = { ...defaultConfig, inputDir, outputDir: path.join(tmp, "out", "strokes"), progressEvery: 2 };
  lines = [];
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe("generateStrokes", () => {
  it("writes a diagram per glyph and skips broken ones", () => {
    const report = generateStrokes(config, log);
    expect(report).toEqual({
      seen: 3,
      generated: 1,
      failures: [{ file: "bad.svg", reason: "Unsupported path command 'Z': M10,10Z" }],
    });
    expect(fs.readdirSync(config.outputDir)).toEqual(["04e09-strokes.svg"]);
    expect(lines).toEqual([
      "Processed 2...",
      "Error in parsing bad.svg: Unsupported path command 'Z': M10,10Z",
      "Generated 1 stroke documents (1 failed).",
    ]);
  });

  it("writes the composed document", () => {
    generateStrokes(config, log);
    const out = fs.readFileSync(path.join(config.outputDir, "04e09-strokes.svg"), "utf8");
    expect(out).toContain(`viewBox="0 0 327 109"`);
    expect(out).toContain(`id="kvg:04e09-s2-0-2"`);
  });

  it("skips a glyph whose DOCTYPE cannot be parsed", () => {
    const broken = glyphSvg("entity", threeStrokes).replace(
      "<!-- Test glyph -->",
      `<!-- Test glyph -->\n<!DOCTYPE svg [ <!ENTITY x SYSTEM "foo"> ]>`,
    );
    fs.writeFileSync(path.join(config.inputDir, "entity.svg"), broken);
    const report = generateStrokes(config, log);
    expect(report.seen).toBe(4);
    expect(report.generated).toBe(1);
    expect(report.failures.map((f) => f.file)).toEqual(["bad.svg", "entity.svg"]);
    expect(report.failures[1].reason).toMatch(/^Invalid XML: /);
    expect(fs.readdirSync(config.outputDir)).toEqual(["04e09-strokes.svg"]);
  });

  it("refuses a missing input directory", () => {
    const missing = { ...config, inputDir: path.join(tmp, "missing") };
    expect(() => generateStrokes(missing, log)).toThrow(EnvironmentError);
    expect(fs.existsSync(config.outputDir)).toBe(false);
  });
});

describe("outputName", () => {
  it("swaps the extension for the suffix", () => {
    expect(outputName("04e09.svg", defaultConfig)).toBe("04e09-strokes.svg");
    expect(outputName("04e09-Kaisho.svg", defaultConfig)).toBe("04e09-Kaisho-strokes.svg");
  });
});
