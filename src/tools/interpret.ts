import { z } from "zod";
import { interpret } from "../induction/evaluation.js";
import { attributeValueSchema, caseSchema } from "./schemas.js";
import { defineTool } from "./types.js";

const ruleInterpretInputSchema = z.object({
  cases: z.array(caseSchema),
  attributeValue: attributeValueSchema,
});

const ruleInterpretOutputSchema = z.object({
  matched: z.boolean(),
  predictedClass: attributeValueSchema.optional(),
});

export type RuleInterpretInput = z.infer<typeof ruleInterpretInputSchema>;
export type RuleInterpretOutput = z.infer<typeof ruleInterpretOutputSchema>;

export const ruleInterpretTool = defineTool({
  name: "rule_interpret",
  description: "Look up the class a set of cases predicts for a single attribute value.",
  inputSchema: ruleInterpretInputSchema,
  outputSchema: ruleInterpretOutputSchema,
  handler: async (input): Promise<RuleInterpretOutput> => {
    const predictedClass = interpret(input.cases, input.attributeValue);
    if (predictedClass === undefined) {
      return { matched: false };
    }
    return { matched: true, predictedClass };
  },
});
