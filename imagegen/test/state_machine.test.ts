import { describe, expect, it } from "vitest";
import { ALL_STATES, ALL_STEPS, nextState, stepFrom } from "../src/core/state-machine.js";

describe("state-machine", () => {
  it("has one step per transition before done", () => {
    expect(ALL_STEPS).toHaveLength(ALL_STATES.length - 2);
  });

  it("advances linearly on success", () => {
    expect(nextState("init", "success")).toBe("loaded");
    expect(nextState("loaded", "success")).toBe("composed");
    expect(nextState("composed", "success")).toBe("substituted");
    expect(nextState("substituted", "success")).toBe("artifacts_fetched");
    expect(nextState("artifacts_fetched", "success")).toBe("rendered");
    expect(nextState("rendered", "success")).toBe("done");
  });

  it("names the failed step on failure", () => {
    expect(nextState("init", "failure")).toBe("failed_load");
    expect(nextState("substituted", "failure")).toBe("failed_fetch_artifacts");
    expect(nextState("artifacts_fetched", "failure")).toBe("failed_render");
  });

  it("maps states to the step that runs from them", () => {
    expect(stepFrom("init")).toBe("load");
    expect(stepFrom("artifacts_fetched")).toBe("render");
    expect(stepFrom("rendered")).toBeNull();
    expect(stepFrom("done")).toBeNull();
  });
});
