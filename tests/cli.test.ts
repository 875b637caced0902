import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_SCORE_FILE, loadConfig, parseCliArgs, runCli } from "@/cli";
import { ConfigurationError } from "@/flock/errors";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "flock-cli-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("parseCliArgs", () => {
  it("fills in defaults", () => {
    expect(parseCliArgs(["run"])).toEqual({
      command: "run",
      frames: 600,
      headless: false,
      durationSeconds: 30,
      out: DEFAULT_SCORE_FILE,
      configFile: undefined,
      presetId: undefined,
      seed: undefined,
    });
  });

  it("reads every option", () => {
    expect(
      parseCliArgs([
        "auto-test",
        "--duration",
        "12.5",
        "--out",
        "score.json",
        "--preset",
        "dense-flock",
        "--seed",
        "abc",
      ])
    ).toMatchObject({
      command: "auto-test",
      durationSeconds: 12.5,
      out: "score.json",
      presetId: "dense-flock",
      seed: "abc",
    });
  });

  it("rejects unknown commands, flags and bad numbers", () => {
    expect(() => parseCliArgs([])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(["fly"])).toThrow('Unknown command "fly"');
    expect(() => parseCliArgs(["run", "--turbo"])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(["run", "--frames", "0"])).toThrow(
      '--frames must be a positive number, got "0"'
    );
  });
});

describe("loadConfig", () => {
  it("layers preset, config file and seed", () => {
    const file = join(dir, "config.json");
    writeFileSync(file, JSON.stringify({ boidCount: 42, seed: "from-file" }));

    const config = loadConfig({
      presetId: "obstacle-course",
      configFile: file,
      seed: "from-flag",
    });

    expect(config.boidCount).toBe(42);
    expect(config.obstacleCount).toBe(40);
    expect(config.seed).toBe("from-flag");
  });

  it("reports unreadable and invalid files", () => {
    const broken = join(dir, "broken.json");
    writeFileSync(broken, "{ boidCount: ");

    expect(() => loadConfig({ configFile: join(dir, "missing.json") })).toThrow(
      ConfigurationError
    );
    expect(() => loadConfig({ configFile: broken })).toThrow(
      `Config file ${broken} is not valid JSON`
    );
  });
});

describe("runCli", () => {
  it("runs a headless simulation", async () => {
    await expect(
      runCli(["run", "--headless", "--frames", "3", "--preset", "default"])
    ).resolves.toBe(0);
  });

  it("writes the auto-test scorecard", async () => {
    const out = join(dir, "score.json");

    const code = await runCli(["auto-test", "--duration", "0.2", "--out", out]);

    const scorecard: unknown = JSON.parse(readFileSync(out, "utf8"));
    expect(scorecard).toMatchObject({ frames: 12 });
    const passed =
      typeof scorecard === "object" &&
      scorecard !== null &&
      "passed" in scorecard &&
      scorecard.passed === true;
    expect(code).toBe(passed ? 0 : 1);
  });

  it("exits with 2 on configuration errors", async () => {
    await expect(runCli(["run", "--preset", "nope"])).resolves.toBe(2);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^\[cli\] Preset not found: nope/)
    );
  });
});
