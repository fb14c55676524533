import { z } from "zod";
import { selectBest } from "../induction/discover.js";
import { generateHypotheses } from "../induction/hypotheses.js";
import type { Rule } from "../schema/rule.js";
import { attributeMatrixSchema, classVectorSchema, ruleSchema } from "./schemas.js";
import { defineTool } from "./types.js";

const ruleDiscoverInputSchema = z.object({
  attributes: attributeMatrixSchema.describe("Rows of categorical attribute values, one column per attribute"),
  classes: classVectorSchema.describe("True class of each row"),
});

const ruleDiscoverOutputSchema = z.object({
  found: z.boolean(),
  columnIndex: z.number().int().min(0).optional(),
  rule: ruleSchema.optional(),
  hypotheses: z.array(ruleSchema),
});

export type RuleDiscoverInput = z.infer<typeof ruleDiscoverInputSchema>;
export type RuleDiscoverOutput = z.infer<typeof ruleDiscoverOutputSchema>;

export function toPlainRule(rule: Rule): z.infer<typeof ruleSchema> {
  return {
    cases: rule.cases.map(({ attributeValue, predictedClass }) => ({ attributeValue, predictedClass })),
    accuracy: rule.accuracy,
  };
}

export const ruleDiscoverTool = defineTool({
  name: "rule_discover",
  description:
    "Run 1R rule induction: build one rule per attribute column and return the column whose rule has the best training accuracy.",
  inputSchema: ruleDiscoverInputSchema,
  outputSchema: ruleDiscoverOutputSchema,
  handler: async (input, context): Promise<RuleDiscoverOutput> => {
    context.logger?.info("Discovering rule", {
      rows: input.classes.length,
      columns: input.attributes[0]?.length ?? 0,
    });

    const hypotheses = generateHypotheses(input.attributes, input.classes);
    const best = selectBest(hypotheses);

    if (!best) {
      return { found: false, hypotheses: [] };
    }

    context.logger?.info("Selected attribute", { columnIndex: best.columnIndex, accuracy: best.rule.accuracy });

    return {
      found: true,
      columnIndex: best.columnIndex,
      rule: toPlainRule(best.rule),
      hypotheses: hypotheses.map(toPlainRule),
    };
  },
});
