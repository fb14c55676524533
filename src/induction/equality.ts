import type { AttributeValue } from "../schema/rule.js";

export function sameValue(a: AttributeValue, b: AttributeValue): boolean {
  // SameValueZero: matches how Map compares keys, so NaN finds NaN.
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}
