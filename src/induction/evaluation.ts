import type { Accuracy, AttributeValue, Case, EvaluationTally } from "../schema/rule.js";
import { sameValue } from "./equality.js";
import { assertSameLength } from "./errors.js";

/**
 * Apply a set of cases to an attribute value to get a prediction.
 *
 * Returns the class of the first case whose attribute value equals
 * `attributeValue`, or `undefined` when no case matches.
 *
 * @example
 * ```ts
 * const cases = [
 *   { attributeValue: "summer", predictedClass: "hot" },
 *   { attributeValue: "winter", predictedClass: "cold" },
 * ];
 * interpret(cases, "summer"); // "hot"
 * interpret(cases, "spring"); // undefined
 * ```
 */
export function interpret<A extends AttributeValue, C extends AttributeValue>(
  cases: ReadonlyArray<Case<A, C>>,
  attributeValue: A,
): C | undefined {
  return cases.find((candidate) => sameValue(candidate.attributeValue, attributeValue))?.predictedClass;
}

function buildLookup<A extends AttributeValue, C extends AttributeValue>(
  cases: ReadonlyArray<Case<A, C>>,
): Map<A, C> {
  const lookup = new Map<A, C>();
  for (const { attributeValue, predictedClass } of cases) {
    // First case wins, as in interpret()
    if (!lookup.has(attributeValue)) {
      lookup.set(attributeValue, predictedClass);
    }
  }
  return lookup;
}

/**
 * Count correct, incorrect and unpredicted rows for a set of cases applied to
 * a data set. Unpredicted rows lower the accuracy like incorrect ones.
 */
export function tally<A extends AttributeValue, C extends AttributeValue>(
  cases: ReadonlyArray<Case<A, C>>,
  attributeValues: ReadonlyArray<A>,
  classes: ReadonlyArray<C>,
): EvaluationTally {
  assertSameLength("Attribute values and classes differ in length", attributeValues.length, classes.length);

  const lookup = buildLookup(cases);
  let correct = 0;
  let incorrect = 0;
  let unpredicted = 0;

  attributeValues.forEach((value, index) => {
    const predicted = lookup.get(value);
    if (predicted === undefined) {
      unpredicted += 1;
      return;
    }
    if (sameValue(predicted, classes[index])) {
      correct += 1;
    } else {
      incorrect += 1;
    }
  });

  const total = attributeValues.length;
  return {
    total,
    correct,
    incorrect,
    unpredicted,
    accuracy: total === 0 ? 0 : correct / total,
  };
}

/**
 * Evaluate cases (a rule) against a data set. Accuracy is the number of
 * correct predictions over the number of rows, and 0 for no rows.
 */
export function evaluate<A extends AttributeValue, C extends AttributeValue>(
  cases: ReadonlyArray<Case<A, C>>,
  attributeValues: ReadonlyArray<A>,
  classes: ReadonlyArray<C>,
): Accuracy {
  return tally(cases, attributeValues, classes).accuracy;
}
