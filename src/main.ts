#!/usr/bin/env node
import { generateStrokes } from "./batch.js";
import { loadConfig } from "./config.js";
import { ConfigError, EnvironmentError } from "./util.js";

async function main() {
  const args = process.argv.slice(2);
  if (args.includes("-h") || args.includes("--help")) {
    console.error("Usage: node dist/main.js [input_dir] [output_dir] [rules.yaml]");
    return;
  }
  const [inputDir, outputDir, rulesPath] = args;
  const rules = loadConfig(rulesPath);
  generateStrokes({
    ...rules,
    inputDir: inputDir || rules.inputDir,
    outputDir: outputDir || rules.outputDir,
  });
}

main().catch((e) => {
  console.error(e instanceof EnvironmentError || e instanceof ConfigError ? e.message : e);
  process.exit(1);
});
