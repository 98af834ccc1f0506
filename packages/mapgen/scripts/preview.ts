/**
 * Map Preview Script
 *
 * Usage:
 *   npm run preview -- [options]
 *
 * Options:
 *   --terrain-seed <n>    Terrain seed (default: curated seed)
 *   --locations-seed <n>  Locations seed (default: clock)
 *   --trace               Show pipeline trace/decisions
 *   --no-color            Disable ANSI colors
 *   --help                Show this help
 */

import { describeMap, generateMap, renderMapAscii, SkirmishMap, validateMap } from "../src";

interface Options {
  terrainSeed?: number;
  locationsSeed?: number;
  trace: boolean;
  color: boolean;
  help: boolean;
}

function parseSeed(flag: string, value: string | undefined): number {
  const seed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(seed)) {
    throw new Error(`${flag} expects an integer, got '${value ?? ""}'`);
  }
  return seed;
}

function parseArgs(): Options {
  const args = process.argv.slice(2);
  const options: Options = { trace: false, color: true, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case "--terrain-seed":
        options.terrainSeed = parseSeed(arg, next);
        i++;
        break;
      case "--locations-seed":
        options.locationsSeed = parseSeed(arg, next);
        i++;
        break;
      case "--trace":
        options.trace = true;
        break;
      case "--no-color":
        options.color = false;
        break;
      case "--help":
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg ?? ""}`);
    }
  }

  return options;
}

function showHelp(): void {
  console.log(`
Map Preview Script

Usage:
  npm run preview -- [options]

Options:
  --terrain-seed <n>    Terrain seed (default: curated seed)
  --locations-seed <n>  Locations seed (default: clock)
  --trace               Show pipeline trace/decisions
  --no-color            Disable ANSI colors
  --help                Show this help
`);
}

function main(): void {
  const options = parseArgs();
  if (options.help) {
    showHelp();
    return;
  }

  const result = generateMap(
    {
      terrainSeed: options.terrainSeed,
      locationsSeed: options.locationsSeed,
      config: { trace: options.trace },
    },
    {
      onPassMetrics: (metrics) => {
        if (options.trace) {
          console.log(`${metrics.passId}: ${metrics.durationMs.toFixed(2)}ms`);
        }
      },
    },
  );

  if (options.trace) {
    for (const event of result.trace) {
      if (event.eventType === "decision" || event.eventType === "warning") {
        console.log(`[${event.passId}] ${event.eventType}: ${JSON.stringify(event.data)}`);
      }
    }
  }

  if (!result.success) {
    console.error(`${result.error.code}: ${result.error.message}`);
    process.exitCode = 1;
    return;
  }

  const map = new SkirmishMap(result.artifact);
  console.log(renderMapAscii(map, { useColors: options.color }));
  console.log();
  console.log(describeMap(map));

  const validation = validateMap(result.artifact);
  for (const violation of validation.violations) {
    console.log(`${violation.severity}: ${violation.message}`);
  }
}

main();
