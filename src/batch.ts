import fs from "fs";
import path from "path";
import { composeDocument } from "./compose.js";
import type { StrokeConfig } from "./config.js";
import { EnvironmentError, GlyphError, readText, writeText } from "./util.js";

export type BatchFailure = {
  file: string;
  reason: string;
};

export type BatchReport = {
  seen: number;
  generated: number;
  failures: BatchFailure[];
};

export type Logger = (msg: string) => void;

export function outputName(file: string, config: Pick<StrokeConfig, "inputExtension" | "outputSuffix">): string {
  const stem = file.endsWith(config.inputExtension) ? file.slice(0, -config.inputExtension.length) : file;
  return `${stem}${config.outputSuffix}`;
}

function isDirectory(dir: string): boolean {
  return fs.existsSync(dir) && fs.statSync(dir).isDirectory();
}

/**
 * Writes a stroke progression document for every glyph file in the input
 * directory. A glyph that fails to parse or compose is logged and skipped;
 * nothing is written for it.
 */
export function generateStrokes(config: StrokeConfig, log: Logger = console.error): BatchReport {
  if (!isDirectory(config.inputDir)) {
    throw new EnvironmentError(`${config.inputDir} is not a directory.`);
  }
  fs.mkdirSync(config.outputDir, { recursive: true });

  const entries = fs
    .readdirSync(config.inputDir, { withFileTypes: true })
    .sort((a, b) => a.name.localeCompare(b.name));
  const report: BatchReport = { seen: 0, generated: 0, failures: [] };

  for (const entry of entries) {
    report.seen += 1;
    if (report.seen % config.progressEvery === 0) log(`Processed ${report.seen}...`);
    if (!entry.isFile() || !entry.name.endsWith(config.inputExtension)) continue;

    let doc: string;
    try {
      doc = composeDocument(readText(path.join(config.inputDir, entry.name)), config);
    } catch (e) {
      if (!(e instanceof GlyphError)) throw e;
      log(`Error in parsing ${entry.name}: ${e.message}`);
      report.failures.push({ file: entry.name, reason: e.message });
      continue;
    }
    writeText(path.join(config.outputDir, outputName(entry.name, config)), doc);
    report.generated += 1;
  }

  log(`Generated ${report.generated} stroke documents (${report.failures.length} failed).`);
  return report;
}
