import type { AttributeMatrix, AttributeValue, Discovery, Rule } from "../schema/rule.js";
import { generateHypotheses } from "./hypotheses.js";

function comparable(accuracy: number): number {
  return Number.isNaN(accuracy) ? Number.NEGATIVE_INFINITY : accuracy;
}

/**
 * Pick the rule with the highest accuracy, scanning columns left to right.
 * The first column reaching the maximum wins; NaN never beats a number.
 */
export function selectBest<A extends AttributeValue, C extends AttributeValue>(
  hypotheses: ReadonlyArray<Rule<A, C>>,
): Discovery<A, C> | undefined {
  let best: Discovery<A, C> | undefined;
  for (const [columnIndex, rule] of hypotheses.entries()) {
    if (!best || comparable(rule.accuracy) > comparable(best.rule.accuracy)) {
      best = { columnIndex, rule };
    }
  }
  return best;
}

/**
 * Find the one rule that fits a set of example data points.
 *
 * @param attributes - rows of attribute values, one column per attribute.
 * @param classes - the true class of each row.
 * @returns the column the best rule applies to and the rule itself, or
 * `undefined` when the matrix has no columns.
 *
 * @example
 * ```ts
 * const found = discover(
 *   [["sunny", "summer"], ["sunny", "summer"], ["cloudy", "winter"], ["sunny", "winter"]],
 *   ["hot", "hot", "cold", "cold"],
 * );
 * // { columnIndex: 1, rule: { cases: [summer -> hot, winter -> cold], accuracy: 1 } }
 * ```
 */
export function discover<A extends AttributeValue, C extends AttributeValue>(
  attributes: AttributeMatrix<A>,
  classes: ReadonlyArray<C>,
): Discovery<A, C> | undefined {
  return selectBest(generateHypotheses(attributes, classes));
}
