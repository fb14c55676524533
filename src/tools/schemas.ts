import { z } from "zod";

export const attributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const caseSchema = z.object({
  attributeValue: attributeValueSchema,
  predictedClass: attributeValueSchema,
});

export const ruleSchema = z.object({
  cases: z.array(caseSchema),
  accuracy: z.number().min(0).max(1),
});

export const attributeMatrixSchema = z.array(z.array(attributeValueSchema));
export const classVectorSchema = z.array(attributeValueSchema);
