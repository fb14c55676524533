import { afterEach, describe, expect, it, vi } from "vitest";
import { resetConfig } from "../src/config.js";
import { discover, selectBest } from "../src/induction/discover.js";
import { ShapeMismatchError } from "../src/induction/errors.js";
import { generateHypotheses, generateRuleForAttribute } from "../src/induction/hypotheses.js";
import { loadDataset, weather } from "./fixtures.js";

describe("generateRuleForAttribute", () => {
  it("predicts the most frequent class for each value, in first-seen order", () => {
    const rule = generateRuleForAttribute(["sunny", "sunny", "cloudy", "sunny"], ["hot", "hot", "cold", "cold"]);
    expect(rule).toEqual({
      cases: [
        { attributeValue: "sunny", predictedClass: "hot" },
        { attributeValue: "cloudy", predictedClass: "cold" },
      ],
      accuracy: 0.75,
    });
  });

  it("breaks count ties in favour of the class seen first for that value", () => {
    const rule = generateRuleForAttribute(["v", "v", "v", "v"], ["late", "early", "early", "late"]);
    expect(rule.cases).toEqual([{ attributeValue: "v", predictedClass: "late" }]);
    expect(rule.accuracy).toBe(0.5);
  });

  it("looks only at the rows of the value when breaking ties", () => {
    // "a" appears first overall, but "b" appears first among the rows holding "v"
    const rule = generateRuleForAttribute(["u", "v", "v"], ["a", "b", "a"]);
    expect(rule.cases).toEqual([
      { attributeValue: "u", predictedClass: "a" },
      { attributeValue: "v", predictedClass: "b" },
    ]);
    expect(rule.accuracy).toBe(2 / 3);
  });

  it("gives identical rules for identical input", () => {
    const values = ["x", "y", "x", "z", "y", "x"];
    const classes = ["p", "q", "q", "p", "p", "p"];
    const first = generateRuleForAttribute(values, classes);
    const second = generateRuleForAttribute(values, classes);
    expect(second).toEqual(first);
    expect(Object.is(second.accuracy, first.accuracy)).toBe(true);
  });

  it("freezes the rule and its cases", () => {
    const rule = generateRuleForAttribute(["a"], ["b"]);
    expect(Object.isFrozen(rule)).toBe(true);
    expect(Object.isFrozen(rule.cases)).toBe(true);
    expect(Object.isFrozen(rule.cases[0])).toBe(true);
  });

  it("builds an empty rule from no rows", () => {
    expect(generateRuleForAttribute([], [])).toEqual({ cases: [], accuracy: 0 });
  });

  it("rejects a column and class vector of different lengths", () => {
    expect(() => generateRuleForAttribute(["a", "b"], ["c"])).toThrow(ShapeMismatchError);
  });
});

describe("generateHypotheses", () => {
  it("builds one rule per column, in column order", () => {
    const { attributes, classes } = loadDataset("rentals");
    const hypotheses = generateHypotheses(attributes, classes);

    expect(hypotheses.map((rule) => rule.accuracy)).toEqual([0.6, 0.7, 0.6]);
    expect(hypotheses[0].cases).toEqual([
      { attributeValue: "good", predictedClass: "high" },
      { attributeValue: "bad", predictedClass: "low" },
    ]);
    expect(hypotheses[2].cases).toEqual([
      { attributeValue: "yes", predictedClass: "low" },
      { attributeValue: "no", predictedClass: "high" },
      { attributeValue: "only cats", predictedClass: "medium" },
    ]);
  });

  it("rejects a ragged matrix", () => {
    expect(() => generateHypotheses([["a", "b"], ["c"]], ["p", "q"])).toThrow(
      "Row 1 of the attribute matrix has a different column count: expected 2, got 1",
    );
  });
});

describe("discover", () => {
  it("finds the season rule for the weather data", () => {
    expect(discover(weather.attributes, weather.classes)).toEqual({
      columnIndex: 1,
      rule: {
        cases: [
          { attributeValue: "summer", predictedClass: "hot" },
          { attributeValue: "winter", predictedClass: "cold" },
        ],
        accuracy: 1,
      },
    });
  });

  it("finds the size rule for the rental data", () => {
    const { attributes, classes } = loadDataset("rentals");
    expect(discover(attributes, classes)).toEqual({
      columnIndex: 1,
      rule: {
        cases: [
          { attributeValue: "small", predictedClass: "low" },
          { attributeValue: "big", predictedClass: "high" },
          { attributeValue: "medium", predictedClass: "medium" },
        ],
        accuracy: 0.7,
      },
    });
  });

  it("selects a perfectly predictive column", () => {
    const found = discover(
      [
        [1, "k"],
        [2, "k"],
        [1, "m"],
      ],
      ["x", "y", "x"],
    );
    expect(found?.columnIndex).toBe(0);
    expect(found?.rule.accuracy).toBe(1);
  });

  it("keeps the lowest column when accuracies tie", () => {
    const found = discover(
      [
        ["a", "x"],
        ["b", "y"],
      ],
      ["p", "q"],
    );
    expect(found?.columnIndex).toBe(0);
    expect(found?.rule.accuracy).toBe(1);
  });

  it("returns undefined when there are no columns", () => {
    expect(discover([[], []], ["p", "q"])).toBeUndefined();
    expect(discover([], [])).toBeUndefined();
  });

  it("rejects a class vector that does not match the row count", () => {
    expect(() => discover([["a"], ["b"]], ["p"])).toThrow(ShapeMismatchError);
    expect(() => discover([["a"], ["b"]], ["p"])).toThrow(
      "Attribute matrix row count and class count differ: expected 1, got 2",
    );
  });
});

describe("discover without logging", () => {
  const previousLevel = process.env.ONE_RULE_LOG_LEVEL;

  afterEach(() => {
    if (previousLevel === undefined) {
      delete process.env.ONE_RULE_LOG_LEVEL;
    } else {
      process.env.ONE_RULE_LOG_LEVEL = previousLevel;
    }
    resetConfig();
    vi.restoreAllMocks();
  });

  it("ignores an invalid log level in the environment", () => {
    process.env.ONE_RULE_LOG_LEVEL = "verbose";
    resetConfig();

    expect(discover(weather.attributes, weather.classes)).toEqual({
      columnIndex: 1,
      rule: {
        cases: [
          { attributeValue: "summer", predictedClass: "hot" },
          { attributeValue: "winter", predictedClass: "cold" },
        ],
        accuracy: 1,
      },
    });
  });

  it("writes nothing to stderr at debug level", () => {
    process.env.ONE_RULE_LOG_LEVEL = "debug";
    resetConfig();
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    discover(weather.attributes, weather.classes);

    expect(spy).not.toHaveBeenCalled();
  });
});

describe("selectBest", () => {
  it("never lets NaN win over a number", () => {
    const best = selectBest([
      { cases: [], accuracy: Number.NaN },
      { cases: [], accuracy: 0.2 },
      { cases: [], accuracy: Number.NaN },
    ]);
    expect(best?.columnIndex).toBe(1);
  });

  it("falls back to the first column when every accuracy is NaN", () => {
    const best = selectBest([
      { cases: [], accuracy: Number.NaN },
      { cases: [], accuracy: Number.NaN },
    ]);
    expect(best?.columnIndex).toBe(0);
  });

  it("returns undefined for no hypotheses", () => {
    expect(selectBest([])).toBeUndefined();
  });
});
