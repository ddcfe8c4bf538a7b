import { pathToFileURL } from "url";
import { MalformedPath, type Point } from "./util.js";

export type MoveTo = { type: "M"; point: Point };

export type CubicCurve = { c1: Point; c2: Point; end: Point };
export type CubicBezier = { type: "C"; curves: CubicCurve[] };

export type SmoothCurve = { c2: Point; end: Point };
export type SmoothCubicBezier = { type: "S"; curves: SmoothCurve[] };

/** Lowercase run; offsets from the current point, so translation leaves it alone. */
export type RelativeRun = { type: "relative"; command: string; args: string };

export type PathSegment = MoveTo | CubicBezier | SmoothCubicBezier | RelativeRun;

export type TranslatedPath = {
  d: string;
  start: Point;
};

const RUN_RE = /([MmZzLlHhVvCcSsQqTtAa])([^MmZzLlHhVvCcSsQqTtAa]*)/g;

function parseNumbers(payload: string, d: string): number[] {
  const numberRe = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/y;
  const out: number[] = [];
  let i = 0;
  while (i < payload.length) {
    const ch = payload[i];
    if (ch === "," || /\s/.test(ch)) {
      i += 1;
      continue;
    }
    numberRe.lastIndex = i;
    const m = numberRe.exec(payload);
    if (!m) throw new MalformedPath(`Unexpected '${ch}' in path: ${d}`);
    out.push(Number(m[0]));
    i = numberRe.lastIndex;
  }
  return out;
}

function at(nums: number[], i: number): Point {
  return { x: nums[i], y: nums[i + 1] };
}

function parseRun(command: string, payload: string, d: string): PathSegment {
  if (command === "M") {
    const nums = parseNumbers(payload, d);
    if (nums.length !== 2) {
      throw new MalformedPath(`MoveTo expects one coordinate pair, got ${nums.length} numbers: ${d}`);
    }
    return { type: "M", point: at(nums, 0) };
  }
  if (command === "C") {
    const nums = parseNumbers(payload, d);
    if (nums.length === 0 || nums.length % 6 !== 0) {
      throw new MalformedPath(`Cubic Bezier expects a multiple of 6 numbers, got ${nums.length}: ${d}`);
    }
    const curves: CubicCurve[] = [];
    for (let i = 0; i < nums.length; i += 6) {
      curves.push({ c1: at(nums, i), c2: at(nums, i + 2), end: at(nums, i + 4) });
    }
    return { type: "C", curves };
  }
  if (command === "S") {
    const nums = parseNumbers(payload, d);
    if (nums.length === 0 || nums.length % 4 !== 0) {
      throw new MalformedPath(`Smooth cubic Bezier expects a multiple of 4 numbers, got ${nums.length}: ${d}`);
    }
    const curves: SmoothCurve[] = [];
    for (let i = 0; i < nums.length; i += 4) {
      curves.push({ c2: at(nums, i), end: at(nums, i + 2) });
    }
    return { type: "S", curves };
  }
  if (command === command.toLowerCase()) {
    return { type: "relative", command, args: payload };
  }
  throw new MalformedPath(`Unsupported path command '${command}': ${d}`);
}

export function parsePath(d: string): PathSegment[] {
  const first = d.search(/[MmZzLlHhVvCcSsQqTtAa]/);
  if (first < 0 || d.slice(0, first).trim().length > 0) {
    throw new MalformedPath(`Path must begin with a command: ${d}`);
  }
  const segments: PathSegment[] = [];
  for (const m of d.slice(first).matchAll(RUN_RE)) {
    segments.push(parseRun(m[1], m[2], d));
  }
  if (segments.length === 0 || segments[0].type !== "M") {
    throw new MalformedPath(`Path must start with an absolute MoveTo: ${d}`);
  }
  return segments;
}

function shift(p: Point, dx: number, dy: number): Point {
  return { x: p.x + dx, y: p.y + dy };
}

export function shiftSegments(segments: PathSegment[], dx: number, dy: number): PathSegment[] {
  return segments.map((seg): PathSegment => {
    switch (seg.type) {
      case "M":
        return { type: "M", point: shift(seg.point, dx, dy) };
      case "C":
        return {
          type: "C",
          curves: seg.curves.map((c) => ({
            c1: shift(c.c1, dx, dy),
            c2: shift(c.c2, dx, dy),
            end: shift(c.end, dx, dy),
          })),
        };
      case "S":
        return {
          type: "S",
          curves: seg.curves.map((c) => ({ c2: shift(c.c2, dx, dy), end: shift(c.end, dx, dy) })),
        };
      case "relative":
        return seg;
      default: {
        const exhaustive: never = seg;
        throw new MalformedPath(`Unhandled segment: ${JSON.stringify(exhaustive)}`);
      }
    }
  });
}

function fixed2(n: number): string {
  return n.toFixed(2);
}

export function serializePath(segments: PathSegment[]): string {
  return segments
    .map((seg) => {
      switch (seg.type) {
        case "M":
          return `M${seg.point.x},${seg.point.y}`;
        case "C":
          return `C${seg.curves
            .flatMap((c) => [c.c1.x, c.c1.y, c.c2.x, c.c2.y, c.end.x, c.end.y])
            .map(fixed2)
            .join(",")}`;
        case "S":
          // end y is written with three decimals
          return `S${seg.curves
            .map((c) => [fixed2(c.c2.x), fixed2(c.c2.y), fixed2(c.end.x), c.end.y.toFixed(3)].join(","))
            .join(",")}`;
        case "relative":
          return `${seg.command}${seg.args}`;
        default: {
          const exhaustive: never = seg;
          throw new MalformedPath(`Unhandled segment: ${JSON.stringify(exhaustive)}`);
        }
      }
    })
    .join("");
}

export function translatePath(d: string, dx: number, dy: number): TranslatedPath {
  const segments = shiftSegments(parsePath(d), dx, dy);
  const move = segments.find((s): s is MoveTo => s.type === "M");
  if (!move) throw new MalformedPath(`Path has no MoveTo: ${d}`);
  return { d: serializePath(segments), start: move.point };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 5) {
  const [d, dx, dy] = process.argv.slice(2);
  const out = translatePath(d, Number(dx), Number(dy));
  process.stdout.write(`${out.d}\n`);
  console.error(`path_shift: start=${out.start.x},${out.start.y}`);
}
