import { z } from "zod";
import { tally } from "../induction/evaluation.js";
import { attributeValueSchema, caseSchema, classVectorSchema } from "./schemas.js";
import { defineTool } from "./types.js";

const ruleEvaluateInputSchema = z.object({
  cases: z.array(caseSchema).describe("Cases (IF value THEN class) of the rule to score"),
  attributeValues: z.array(attributeValueSchema).describe("Attribute value of each row"),
  classes: classVectorSchema.describe("True class of each row"),
});

const ruleEvaluateOutputSchema = z.object({
  total: z.number().int().min(0),
  correct: z.number().int().min(0),
  incorrect: z.number().int().min(0),
  unpredicted: z.number().int().min(0),
  accuracy: z.number().min(0).max(1),
});

export type RuleEvaluateInput = z.infer<typeof ruleEvaluateInputSchema>;
export type RuleEvaluateOutput = z.infer<typeof ruleEvaluateOutputSchema>;

export const ruleEvaluateTool = defineTool({
  name: "rule_evaluate",
  description:
    "Score a set of cases against labelled rows. Rows no case matches count against accuracy and are reported as unpredicted.",
  inputSchema: ruleEvaluateInputSchema,
  outputSchema: ruleEvaluateOutputSchema,
  handler: async (input, context): Promise<RuleEvaluateOutput> => {
    context.logger?.info("Evaluating cases", { cases: input.cases.length, rows: input.classes.length });
    return tally(input.cases, input.attributeValues, input.classes);
  },
});
