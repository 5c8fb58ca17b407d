import { describe, it, expect } from "vitest";
import { IllegalTransition, TrackLifecycle } from "../stateMachine";

describe("TrackLifecycle", () => {
  it("records every transition", () => {
    const lifecycle = new TrackLifecycle("t1");
    lifecycle.transition("RESEARCHED");
    lifecycle.transition("REMIX_CHECKED");
    lifecycle.transition("CLASSIFIED");
    lifecycle.transition("MATCHED");
    lifecycle.settle("ACCEPTED");

    expect(lifecycle.history).toEqual([
      "PENDING",
      "RESEARCHED",
      "REMIX_CHECKED",
      "CLASSIFIED",
      "MATCHED",
      "DECIDED",
      "ACCEPTED",
    ]);
  });

  it("throws on skipped stages", () => {
    const lifecycle = new TrackLifecycle("t1");
    expect(() => lifecycle.transition("CLASSIFIED")).toThrow(IllegalTransition);
    expect(lifecycle.state).toBe("PENDING");
  });

  it("allows failures to reject from any working state", () => {
    const lifecycle = new TrackLifecycle("t1");
    lifecycle.transition("RESEARCHED");
    lifecycle.transition("REJECTED");
    expect(lifecycle.history).toEqual(["PENDING", "RESEARCHED", "REJECTED"]);
  });

  it("does not leave a terminal state", () => {
    const lifecycle = new TrackLifecycle("t1");
    lifecycle.transition("DEFERRED");
    expect(() => lifecycle.transition("RESEARCHED")).toThrow("illegal transition DEFERRED -> RESEARCHED");
  });
});
