import { describe, expect, it } from "vitest";
import { canTransition, nextStatus } from "@/flock/engine/lifecycle";

describe("nextStatus", () => {
  it("follows the start, pause and resume path", () => {
    expect(nextStatus("idle", "start")).toBe("running");
    expect(nextStatus("running", "pause")).toBe("paused");
    expect(nextStatus("paused", "resume")).toBe("running");
  });

  it("stops from any live state", () => {
    expect(nextStatus("idle", "stop")).toBe("stopped");
    expect(nextStatus("running", "stop")).toBe("stopped");
    expect(nextStatus("paused", "stop")).toBe("stopped");
  });

  it("rejects everything else", () => {
    expect(nextStatus("idle", "pause")).toBeNull();
    expect(nextStatus("running", "start")).toBeNull();
    expect(nextStatus("paused", "start")).toBeNull();
    expect(canTransition("stopped", "start")).toBe(false);
    expect(canTransition("stopped", "stop")).toBe(false);
  });
});
