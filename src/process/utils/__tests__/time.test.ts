import { describe, expect, it } from "vitest";
import { formatDuration } from "../time.js";

describe("formatDuration", () => {
  it("picks the unit by magnitude", () => {
    expect(formatDuration(850)).toBe("850ms");
    expect(formatDuration(2500)).toBe("2.5s");
    expect(formatDuration(72000)).toBe("1.2m");
  });
});
