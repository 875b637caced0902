import { readFileSync, writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { formatScorecard, runAutoTest } from "./flock/autoTest";
import { ConfigurationError } from "./flock/errors";
import {
  defaultSimulationConfig,
  resolveSimulationConfig,
} from "./flock/vocabulary/schemas/config";
import type { SimulationConfig } from "./flock/vocabulary/schemas/config";
import { createUpdateLoop } from "./lib/updateLoop";
import { getPresetIds, resolvePresetConfig } from "./profiles";
import { startStandardSystem } from "./systems/standard";

export const DEFAULT_SCORE_FILE = "flock-score.json";

const usage = `Usage:
  flock run [--frames N] [--headless] [--config file] [--preset id] [--seed s]
  flock auto-test [--duration s] [--out file] [--config file] [--preset id] [--seed s]

Presets: ${getPresetIds().join(", ")}`;

export type CliOptions = {
  command: "run" | "auto-test";
  frames: number;
  headless: boolean;
  durationSeconds: number;
  out: string;
  configFile?: string;
  presetId?: string;
  seed?: string;
};

function parsePositive(
  name: string,
  raw: string | undefined,
  fallback: number
): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(
      `--${name} must be a positive number, got "${raw}"`
    );
  }
  return value;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        frames: { type: "string" },
        headless: { type: "boolean", default: false },
        duration: { type: "string" },
        out: { type: "string" },
        config: { type: "string" },
        preset: { type: "string" },
        seed: { type: "string" },
      },
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${reason}\n${usage}`);
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = readArgs(argv);

  const command = positionals[0];
  if (command !== "run" && command !== "auto-test") {
    throw new ConfigurationError(
      `Unknown command "${command ?? ""}"\n${usage}`
    );
  }

  return {
    command,
    frames: Math.round(parsePositive("frames", values.frames, 600)),
    headless: values.headless ?? false,
    durationSeconds: parsePositive("duration", values.duration, 30),
    out: values.out ?? DEFAULT_SCORE_FILE,
    configFile: values.config,
    presetId: values.preset,
    seed: values.seed,
  };
}

function readConfigFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read config file ${path}`, [reason]);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file ${path} is not valid JSON`, [
      reason,
    ]);
  }
}

/**
 * Preset (or defaults), then the config file, then --seed
 */
export function loadConfig(
  options: Pick<CliOptions, "configFile" | "presetId" | "seed">
): SimulationConfig {
  let config = options.presetId
    ? resolvePresetConfig(options.presetId)
    : defaultSimulationConfig;
  if (options.configFile) {
    config = resolveSimulationConfig(
      readConfigFile(options.configFile),
      config
    );
  }
  if (options.seed) {
    config = resolveSimulationConfig({ seed: options.seed }, config);
  }
  return config;
}

async function runCommand(options: CliOptions, config: SimulationConfig) {
  const { system, halt } = await startStandardSystem({
    config,
    presetId: options.presetId ?? null,
  });
  const { engine, profiler, time } = system;

  engine.start();

  if (options.headless) {
    for (let i = 0; i < options.frames; i++) {
      engine.step(1);
    }
  } else {
    // Real time: each tick advances by the wall-clock time it covered
    await new Promise<void>((resolve, reject) => {
      let failure: unknown = null;
      const loop = createUpdateLoop({
        onStart: () => console.log("[cli] Running in real time"),
        onStop: () => (failure === null ? resolve() : reject(failure)),
        onPause: () => {},
        getTargetFps: () => engine.getConfig().fpsTarget,
        onUpdate: (clockDeltaMs, frames) => {
          time.update(clockDeltaMs);
          try {
            engine.step(frames);
          } catch (error) {
            failure = error;
          }
          if (failure !== null || engine.getFrame() >= options.frames) {
            loop.stop();
          }
        },
      });
      loop.start();
    });
  }

  profiler.printSummary();
  console.log(
    `[cli] ${time.getFrame()} frames, ${time.getSimulationTime().toFixed(2)}s simulated`
  );
  if (!options.headless) {
    console.log(`[cli] ${time.getRealWorldTime().toFixed(2)}s real time`);
  }
  await halt();
}

async function autoTestCommand(options: CliOptions, config: SimulationConfig) {
  const { system, halt } = await startStandardSystem({
    config,
    presetId: options.presetId ?? null,
  });

  const scorecard = runAutoTest(
    system.engine,
    { durationSeconds: options.durationSeconds },
    system.runtimeController.stageConfig
  );
  console.log(formatScorecard(scorecard));

  writeFileSync(options.out, `${JSON.stringify(scorecard, null, 2)}\n`);
  console.log(`[cli] Scorecard written to ${options.out}`);

  await halt();
  return scorecard.passed;
}

/**
 * Entry point. Resolves to the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    const config = loadConfig(options);

    if (options.command === "run") {
      await runCommand(options, config);
      return 0;
    }
    return (await autoTestCommand(options, config)) ? 0 : 1;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[cli] ${error.message}`);
      return 2;
    }
    throw error;
  }
}
