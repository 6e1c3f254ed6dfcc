import { describe, it, expect } from "vitest";
import { runShowcase } from "../examples/showcase.js";

describe("showcase", () => {
  it("prints the session transcript", () => {
    const lines: string[] = [];
    runShowcase((line) => lines.push(line));
    expect(lines).toEqual(["{2, 3, 4, 5, 1}", "5", "{4, 5, 1, 2}", "{2, 1}", "true", "2"]);
  });
});
