import { describe, it, expect } from "vitest";
import { formatUtcSeconds, nextUpdatedAt } from "./timestamp.js";

describe("formatUtcSeconds", () => {
  it("drops milliseconds and ends in Z", () => {
    expect(formatUtcSeconds(new Date("2026-01-21T10:00:00.789Z"))).toBe("2026-01-21T10:00:00Z");
  });
});

describe("nextUpdatedAt", () => {
  const now = new Date("2026-01-21T10:00:00Z");

  it("uses now without a previous value", () => {
    expect(nextUpdatedAt(null, now)).toBe("2026-01-21T10:00:00Z");
  });

  it("moves forward from an older value", () => {
    expect(nextUpdatedAt("2025-12-31T23:59:59Z", now)).toBe("2026-01-21T10:00:00Z");
  });

  it("never goes backwards", () => {
    expect(nextUpdatedAt("2099-01-01T00:00:00Z", now)).toBe("2099-01-01T00:00:00Z");
  });
});
