export { zeroRule } from "./baseline.js";
export { discover, selectBest } from "./discover.js";
export { ShapeMismatchError } from "./errors.js";
export { evaluate, interpret, tally } from "./evaluation.js";
export { generateHypotheses, generateRuleForAttribute } from "./hypotheses.js";
export { predict } from "./predict.js";
