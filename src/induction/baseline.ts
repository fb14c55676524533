import type { AttributeValue, ZeroRule } from "../schema/rule.js";

/**
 * The 0R baseline: ignore every attribute and always predict the most frequent
 * class. Ties go to the class seen first. Returns `undefined` for no rows.
 */
export function zeroRule<C extends AttributeValue>(classes: ReadonlyArray<C>): ZeroRule<C> | undefined {
  const counts = new Map<C, number>();
  for (const cls of classes) {
    counts.set(cls, (counts.get(cls) ?? 0) + 1);
  }

  let best: ZeroRule<C> | undefined;
  let bestCount = 0;
  for (const [predictedClass, count] of counts) {
    if (count > bestCount) {
      bestCount = count;
      best = { predictedClass, accuracy: count / classes.length };
    }
  }
  return best && Object.freeze(best);
}
