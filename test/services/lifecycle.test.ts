import { describe, expect, it } from "vitest";
import { canTransition, sourcesFor } from "../../src/services/lifecycle";

describe("status transitions", () => {
  it("allows the forward path and reprocessing", () => {
    expect(canTransition("uploaded", "processing")).toBe(true);
    expect(canTransition("processing", "completed")).toBe(true);
    expect(canTransition("processing", "failed")).toBe(true);
    expect(canTransition("completed", "processing")).toBe(true);
    expect(canTransition("failed", "processing")).toBe(true);
  });

  it("rejects moves that skip or rewind the lifecycle", () => {
    expect(canTransition("uploaded", "completed")).toBe(false);
    expect(canTransition("completed", "uploaded")).toBe(false);
    expect(canTransition("failed", "completed")).toBe(false);
    expect(canTransition("processing", "processing")).toBe(false);
  });

  it("lists every status that may enter processing", () => {
    expect(sourcesFor("processing")).toEqual(["uploaded", "completed", "failed"]);
    expect(sourcesFor("completed")).toEqual(["processing"]);
  });
});
