import { describe, expect, it } from "vitest";
import { Metrics } from "../metrics.js";

describe("Metrics", () => {
  it("renders counters sorted by name", () => {
    const m = new Metrics();
    m.inc("requests_total");
    m.inc("corrections_total", 2);

    expect(m.render()).toBe(
      "# TYPE word_suggest_corrections_total counter\n" +
        "word_suggest_corrections_total 2\n" +
        "# TYPE word_suggest_requests_total counter\n" +
        "word_suggest_requests_total 1\n",
    );
    expect(m.get("prefix_hits_total")).toBe(0);
  });
});
