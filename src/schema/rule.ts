/**
 * Attribute and class values are JSON scalars. Two values are equal under
 * SameValueZero, the equality `Map` uses for its keys.
 */
export type AttributeValue = string | number | boolean | null;

/** One IF attribute = value THEN class condition. */
export interface Case<A extends AttributeValue = AttributeValue, C extends AttributeValue = AttributeValue> {
  readonly attributeValue: A;
  readonly predictedClass: C;
}

/** Fraction of correctly predicted rows, 0.0 for an empty data set. */
export type Accuracy = number;

/**
 * The cases discovered for a single attribute together with their accuracy on
 * the training data they were built from.
 */
export interface Rule<A extends AttributeValue = AttributeValue, C extends AttributeValue = AttributeValue> {
  readonly cases: ReadonlyArray<Case<A, C>>;
  readonly accuracy: Accuracy;
}

export interface Discovery<A extends AttributeValue = AttributeValue, C extends AttributeValue = AttributeValue> {
  /** Zero-based column of the attribute matrix the rule reads. */
  readonly columnIndex: number;
  readonly rule: Rule<A, C>;
}

export interface EvaluationTally {
  total: number;
  correct: number;
  incorrect: number;
  /** Rows whose attribute value no case matched. Not included in `incorrect`. */
  unpredicted: number;
  accuracy: Accuracy;
}

export interface ZeroRule<C extends AttributeValue = AttributeValue> {
  readonly predictedClass: C;
  readonly accuracy: Accuracy;
}

export type AttributeMatrix<A extends AttributeValue = AttributeValue> = ReadonlyArray<ReadonlyArray<A>>;
