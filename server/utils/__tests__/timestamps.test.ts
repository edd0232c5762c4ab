import { describe, it, expect } from "vitest";
import { formatTimestamp } from "../timestamps";

describe("formatTimestamp", () => {
  it("should zero-pad every field", () => {
    expect(formatTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe("2025-01-02 03:04:05");
  });

  it("should use a 24-hour clock", () => {
    expect(formatTimestamp(new Date(2025, 11, 31, 23, 59, 58))).toBe("2025-12-31 23:59:58");
  });
});
