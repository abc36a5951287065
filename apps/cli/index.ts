#!/usr/bin/env -S npx tsx
import { readFile } from "fs/promises";
import { parseArgs } from "util";
import {
  DEFAULT_ULD_TYPE_COLORS,
  loadAircraftCatalog,
  loadPlannerConfig,
  loadUldCatalog,
  parseStrategyToken,
  parseUldCsv,
  planLoad,
  renderAssignmentReport,
  renderLoadPlanDiagram,
  saveLoadPlanToFile,
  type AircraftConfig,
  type UldInput,
} from "../../packages/utils/src";
import { InputClosedError, Prompter } from "./prompter";
import { promptAircraft, promptUlds } from "./session";

const USAGE = `Usage: uld-load-planner [--aircraft MODEL --ulds FILE.csv] [--strategy first-fit|cg-balance] [--output PATH] [--no-color]`;

function warn(source: string, message: string) {
  console.warn(`[${source}] ${message}`);
}

async function readBatchUlds(path: string): Promise<UldInput[]> {
  const content = await readFile(path, "utf-8");
  const { ulds, errors } = parseUldCsv(content);
  for (const error of errors) {
    warn("input", `${path}:${error.line} ${error.field ? `${error.field}: ` : ""}${error.message}`);
  }
  return ulds;
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      aircraft: { type: "string", short: "a" },
      ulds: { type: "string", short: "u" },
      strategy: { type: "string", short: "s" },
      output: { type: "string", short: "o" },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadPlannerConfig();
  const strategy = values.strategy !== undefined ? parseStrategyToken(values.strategy) : config.strategy;
  if (strategy === null) {
    console.error(`Unknown strategy "${values.strategy}"\n${USAGE}`);
    return 1;
  }
  const outputPath = values.output ?? config.outputPath;

  const [aircraftDb, uldDb] = await Promise.all([
    loadAircraftCatalog(config.aircraftDbPath),
    loadUldCatalog(config.uldDbPath),
  ]);
  for (const message of [...aircraftDb.warnings, ...uldDb.warnings]) {
    warn("catalog", message);
  }

  console.log("=== Manual ULD Load Planner ===");

  let aircraft: AircraftConfig;
  let ulds: UldInput[];

  if (values.ulds !== undefined) {
    const known = values.aircraft !== undefined ? aircraftDb.catalog.get(values.aircraft) : undefined;
    if (!known) {
      console.error(`Batch mode needs --aircraft with a model from ${config.aircraftDbPath}\n${USAGE}`);
      return 1;
    }
    aircraft = known;
    ulds = await readBatchUlds(values.ulds);
  } else {
    const prompter = new Prompter(process.stdin, process.stdout);
    try {
      aircraft = await promptAircraft(prompter, aircraftDb.catalog);
      ulds = await promptUlds(prompter);
    } finally {
      prompter.close();
    }
  }

  const result = planLoad(aircraft, ulds, uldDb.catalog, {
    strategy,
    armRanges: config.armRanges,
  });

  console.log("");
  for (const line of renderAssignmentReport(result)) {
    console.log(line);
  }
  for (const message of result.warnings) {
    warn("planner", message);
  }

  const colors = process.stdout.isTTY && !values["no-color"] ? DEFAULT_ULD_TYPE_COLORS : undefined;
  const diagram = renderLoadPlanDiagram(result, uldDb.catalog, { colors });
  for (const line of diagram) {
    console.log(line);
  }

  const saved = await saveLoadPlanToFile(outputPath, diagram);
  if (saved.saved) {
    console.log(`Load plan saved to ${saved.path}`);
  } else {
    warn("output", `Failed to save load plan to ${saved.path}: ${saved.error}`);
  }

  console.log("\nDone.");
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof InputClosedError) {
      warn("cli", error.message);
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  });
