import {
  SEVERITY_CLASSES,
  classifyHumidity,
  findSeverityClass,
} from "./humidity-classifier";

describe("classifyHumidity", () => {
  it.each([
    [100, "ideal"],
    [60.1, "ideal"],
    [60, "near-ideal"],
    [41, "near-ideal"],
    [40, "observation"],
    [30, "observation"],
    [29, "attention"],
    [20, "attention"],
    [19, "alert"],
    [18, "alert"],
    [12, "alert"],
    [11.9, "emergency"],
    [0, "emergency"],
  ])("should classify %p as %s", (value, expected) => {
    expect(classifyHumidity(value)?.id).toBe(expected);
  });

  it.each([40.5, 29.5, 19.5, -1])(
    "should leave %p unclassified",
    (value) => {
      expect(classifyHumidity(value)).toBeUndefined();
    },
  );

  it("should treat unknown values as unclassified", () => {
    expect(classifyHumidity(null)).toBeUndefined();
    expect(classifyHumidity(undefined)).toBeUndefined();
    expect(classifyHumidity(NaN)).toBeUndefined();
  });

  it("should classify every whole percentage from 0 to 100 exactly once", () => {
    for (let value = 0; value <= 100; value++) {
      const matches = SEVERITY_CLASSES.filter(
        (severity) => classifyHumidity(value)?.id === severity.id,
      );
      expect(matches).toHaveLength(1);
    }
  });

  it("should be deterministic", () => {
    expect(classifyHumidity(35)).toBe(classifyHumidity(35));
  });
});

describe("SEVERITY_CLASSES", () => {
  it("should be ordered from best to worst", () => {
    expect(SEVERITY_CLASSES.map((s) => s.rank)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(SEVERITY_CLASSES.map((s) => s.id)).toEqual([
      "ideal",
      "near-ideal",
      "observation",
      "attention",
      "alert",
      "emergency",
    ]);
  });

  it("should expose the legend colours", () => {
    expect(findSeverityClass("emergency")?.color).toBe("#B91C1C");
    expect(findSeverityClass("observation")?.textColor).toBe("#0b0b0b");
    expect(findSeverityClass("severe")).toBeUndefined();
  });
});
