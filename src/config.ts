import fs from "fs";
import yaml from "js-yaml";
import { type CellSize, ConfigError, asNum, errorMessage, isRecord } from "./util.js";

export type MarkerStyle = {
  radius: number;
  strokeWidth: number;
  fill: string;
};

export type StrokeConfig = {
  inputDir: string;
  outputDir: string;
  inputExtension: string;
  outputSuffix: string;
  boxesPerLine: number;
  cell: CellSize;
  marker: MarkerStyle;
  labelStart: number;
  progressEvery: number;
  license: string;
};

const defaultLicense = `This work is distributed under the conditions of the Creative Commons
Attribution-Share Alike 3.0 License.

See http://creativecommons.org/licenses/by-sa/3.0/ for more details.

This work is based upon KanjiVG (http://kanjivg.tagaini.net/).`;

export const defaultConfig: StrokeConfig = {
  inputDir: "kanjivg/kanji",
  outputDir: "strokes",
  inputExtension: ".svg",
  outputSuffix: "-strokes.svg",
  boxesPerLine: 6,
  cell: { width: 109, height: 109 },
  marker: { radius: 3, strokeWidth: 0, fill: "red" },
  labelStart: 0,
  progressEvery: 200,
  license: defaultLicense,
};

function positive(v: unknown, fallback: number): number {
  const n = asNum(v);
  return n !== undefined && n > 0 ? n : fallback;
}

/** Whole count of at least one; fractions are floored before the check. */
function count(v: unknown, fallback: number): number {
  const n = asNum(v);
  return n !== undefined && Math.floor(n) >= 1 ? Math.floor(n) : fallback;
}

function str(v: unknown, fallback: string): string {
  return typeof v === "string" && v.length > 0 ? v : fallback;
}

export function mergeConfig(rules: unknown): StrokeConfig {
  if (rules === undefined || rules === null) return defaultConfig;
  if (!isRecord(rules)) throw new ConfigError("Rules must be a YAML mapping");
  const cell: Record<string, unknown> = isRecord(rules.cell) ? rules.cell : {};
  const marker: Record<string, unknown> = isRecord(rules.marker) ? rules.marker : {};
  return {
    inputDir: str(rules.input_dir, defaultConfig.inputDir),
    outputDir: str(rules.output_dir, defaultConfig.outputDir),
    inputExtension: str(rules.input_extension, defaultConfig.inputExtension),
    outputSuffix: str(rules.output_suffix, defaultConfig.outputSuffix),
    boxesPerLine: count(rules.boxes_per_line, defaultConfig.boxesPerLine),
    cell: {
      width: positive(cell.width, defaultConfig.cell.width),
      height: positive(cell.height, defaultConfig.cell.height),
    },
    marker: {
      radius: positive(marker.radius, defaultConfig.marker.radius),
      strokeWidth: asNum(marker.stroke_width) ?? defaultConfig.marker.strokeWidth,
      fill: str(marker.fill, defaultConfig.marker.fill),
    },
    labelStart: asNum(rules.label_start) ?? defaultConfig.labelStart,
    progressEvery: count(rules.progress_every, defaultConfig.progressEvery),
    license: str(rules.license, defaultConfig.license).trimEnd(),
  };
}

export function loadConfig(rulesPath?: string): StrokeConfig {
  if (!rulesPath) return defaultConfig;
  let rules: unknown;
  try {
    rules = yaml.load(fs.readFileSync(rulesPath, "utf8"));
  } catch (e) {
    throw new ConfigError(`Cannot read rules ${rulesPath}: ${errorMessage(e)}`);
  }
  return mergeConfig(rules);
}
