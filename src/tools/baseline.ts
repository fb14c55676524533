import { z } from "zod";
import { zeroRule } from "../induction/baseline.js";
import { attributeValueSchema, classVectorSchema } from "./schemas.js";
import { defineTool } from "./types.js";

const ruleBaselineInputSchema = z.object({
  classes: classVectorSchema.describe("True class of each row"),
});

const ruleBaselineOutputSchema = z.object({
  found: z.boolean(),
  predictedClass: attributeValueSchema.optional(),
  accuracy: z.number().min(0).max(1).optional(),
});

export type RuleBaselineInput = z.infer<typeof ruleBaselineInputSchema>;
export type RuleBaselineOutput = z.infer<typeof ruleBaselineOutputSchema>;

export const ruleBaselineTool = defineTool({
  name: "rule_baseline",
  description: "0R baseline: the most frequent class and the accuracy of always predicting it.",
  inputSchema: ruleBaselineInputSchema,
  outputSchema: ruleBaselineOutputSchema,
  handler: async (input): Promise<RuleBaselineOutput> => {
    const baseline = zeroRule(input.classes);
    if (!baseline) {
      return { found: false };
    }
    return { found: true, predictedClass: baseline.predictedClass, accuracy: baseline.accuracy };
  },
});
