import type { AttributeMatrix, AttributeValue, Discovery } from "../schema/rule.js";
import { ShapeMismatchError } from "./errors.js";
import { interpret } from "./evaluation.js";

/**
 * Classify rows with a discovered rule. Each row is read at the rule's column;
 * values no case covers yield `undefined`.
 */
export function predict<A extends AttributeValue, C extends AttributeValue>(
  discovery: Discovery<A, C>,
  rows: AttributeMatrix<A>,
): Array<C | undefined> {
  const { columnIndex, rule } = discovery;
  return rows.map((row, index) => {
    if (columnIndex >= row.length) {
      throw new ShapeMismatchError(`Row ${index} is too short for column ${columnIndex}`, columnIndex + 1, row.length);
    }
    return interpret(rule.cases, row[columnIndex]);
  });
}
