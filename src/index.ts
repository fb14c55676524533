export * from "./induction/index.js";
export type {
  Accuracy,
  AttributeMatrix,
  AttributeValue,
  Case,
  Discovery,
  EvaluationTally,
  Rule,
  ZeroRule,
} from "./schema/rule.js";
