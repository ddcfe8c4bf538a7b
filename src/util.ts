import fs from "fs";

export type Point = {
  x: number;
  y: number;
};

export type CellSize = {
  width: number;
  height: number;
};

/** Base class for failures that only affect one glyph; the batch driver skips the file. */
export class GlyphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedPath extends GlyphError {}

export class MalformedTransform extends GlyphError {}

export class MalformedGlyphStructure extends GlyphError {}

export class EnvironmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnvironmentError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
