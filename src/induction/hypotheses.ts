import type { AttributeMatrix, AttributeValue, Case, Rule } from "../schema/rule.js";
import { evaluate } from "./evaluation.js";
import { assertSameLength, ShapeMismatchError } from "./errors.js";

/**
 * Returns the class with the highest count. Ties go to the class inserted
 * first, i.e. the one seen first in row order.
 */
function mostFrequent<C>(counts: Map<C, number>): C | undefined {
  let best: C | undefined;
  let bestCount = 0;
  for (const [candidate, count] of counts) {
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Generate a rule based on a single attribute.
 *
 * Each distinct attribute value becomes one case predicting the most frequent
 * class among the rows carrying that value. Cases are listed in the order the
 * values first occur, and the rule is scored on the same rows it was built
 * from.
 */
export function generateRuleForAttribute<A extends AttributeValue, C extends AttributeValue>(
  attributeValues: ReadonlyArray<A>,
  classes: ReadonlyArray<C>,
): Rule<A, C> {
  assertSameLength("Attribute values and classes differ in length", attributeValues.length, classes.length);

  // value -> (class -> count); both maps keep first-occurrence order
  const classCounts = new Map<A, Map<C, number>>();
  attributeValues.forEach((value, index) => {
    let counts = classCounts.get(value);
    if (!counts) {
      counts = new Map<C, number>();
      classCounts.set(value, counts);
    }
    const cls = classes[index];
    counts.set(cls, (counts.get(cls) ?? 0) + 1);
  });

  const cases: Case<A, C>[] = [];
  for (const [attributeValue, counts] of classCounts) {
    const predictedClass = mostFrequent(counts);
    if (predictedClass !== undefined) {
      cases.push(Object.freeze({ attributeValue, predictedClass }));
    }
  }

  const accuracy = evaluate(cases, attributeValues, classes);
  return Object.freeze({ cases: Object.freeze(cases), accuracy });
}

/**
 * Checks that the matrix has one row per class and that every row has the
 * same width. Returns that width.
 */
function validateShape<A extends AttributeValue, C extends AttributeValue>(
  attributes: AttributeMatrix<A>,
  classes: ReadonlyArray<C>,
): number {
  assertSameLength("Attribute matrix row count and class count differ", classes.length, attributes.length);

  const width = attributes.length > 0 ? attributes[0].length : 0;
  attributes.forEach((row, index) => {
    if (row.length !== width) {
      throw new ShapeMismatchError(`Row ${index} of the attribute matrix has a different column count`, width, row.length);
    }
  });
  return width;
}

function column<A extends AttributeValue>(attributes: AttributeMatrix<A>, index: number): A[] {
  return attributes.map((row) => row[index]);
}

/** One rule per column of the attribute matrix, in column order. */
export function generateHypotheses<A extends AttributeValue, C extends AttributeValue>(
  attributes: AttributeMatrix<A>,
  classes: ReadonlyArray<C>,
): Array<Rule<A, C>> {
  const width = validateShape(attributes, classes);

  const hypotheses: Array<Rule<A, C>> = [];
  for (let index = 0; index < width; index += 1) {
    hypotheses.push(generateRuleForAttribute(column(attributes, index), classes));
  }
  return hypotheses;
}
