import { z } from "zod";
import { predict } from "../induction/predict.js";
import { attributeMatrixSchema, attributeValueSchema, caseSchema } from "./schemas.js";
import { defineTool } from "./types.js";

const rulePredictInputSchema = z.object({
  columnIndex: z.number().int().min(0).describe("Column the rule reads, as returned by rule_discover"),
  cases: z.array(caseSchema),
  rows: attributeMatrixSchema.describe("Rows to classify"),
});

const rulePredictOutputSchema = z.object({
  // null where no case covers the row's value
  predictions: z.array(attributeValueSchema),
  unmatched: z.array(z.number().int().min(0)).describe("Indices of rows no case covered"),
});

export type RulePredictInput = z.infer<typeof rulePredictInputSchema>;
export type RulePredictOutput = z.infer<typeof rulePredictOutputSchema>;

export const rulePredictTool = defineTool({
  name: "rule_predict",
  description: "Classify rows with a discovered rule. Rows whose value no case covers get null.",
  inputSchema: rulePredictInputSchema,
  outputSchema: rulePredictOutputSchema,
  handler: async (input, context): Promise<RulePredictOutput> => {
    context.logger?.info("Predicting", { rows: input.rows.length, columnIndex: input.columnIndex });

    // Accuracy is not needed to classify
    const discovery = { columnIndex: input.columnIndex, rule: { cases: input.cases, accuracy: 0 } };
    const predicted = predict(discovery, input.rows);
    const unmatched: number[] = [];
    predicted.forEach((value, index) => {
      if (value === undefined) {
        unmatched.push(index);
      }
    });
    return { predictions: predicted.map((value) => value ?? null), unmatched };
  },
});
