import { describe, expect, it } from "vitest";
import { formatDate, joinTags, normalizeTag } from "./format.js";

describe("formatDate", () => {
  it("formats in UTC", () => {
    expect(formatDate(new Date("2023-02-04T15:38:42Z"))).toBe("February 4, 2023");
    expect(formatDate(new Date("2023-02-04T23:59:59-05:00"))).toBe("February 5, 2023");
  });

  it("takes format options", () => {
    const date = new Date("2023-02-04T23:30:00Z");
    expect(formatDate(date, { month: "short", year: "numeric" })).toBe("Feb 2023");
    expect(formatDate(date, { year: "numeric", month: "2-digit", day: "2-digit" })).toBe("02/04/2023");
  });

  it("keeps UTC even when options name another time zone", () => {
    expect(formatDate(new Date("2023-02-04T23:30:00Z"), { day: "numeric", timeZone: "Asia/Tokyo" })).toBe("4");
  });
});

describe("joinTags", () => {
  it("joins with a comma by default", () => {
    expect(joinTags(["holmes", "watson"])).toBe("holmes, watson");
  });

  it("takes a separator", () => {
    expect(joinTags(["alpha", "beta"], " + ")).toBe("alpha + beta");
  });

  it("returns an empty string for no tags", () => {
    expect(joinTags([])).toBe("");
  });
});

describe("normalizeTag", () => {
  it("trims and lower-cases", () => {
    expect(normalizeTag("  Sherlock Holmes ")).toBe("sherlock holmes");
  });
});
