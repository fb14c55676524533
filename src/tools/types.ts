import type { z } from "zod";

export interface ToolContext {
  requestId: string;
  logger?: {
    info: (message: string, meta?: unknown) => void;
    error: (message: string, meta?: unknown) => void;
  };
}

export interface ToolDefinition<
  InputShape extends z.ZodRawShape,
  OutputShape extends z.ZodRawShape,
  Output extends Record<string, unknown>,
> {
  name: string;
  description: string;
  inputSchema: z.ZodObject<InputShape>;
  outputSchema: z.ZodObject<OutputShape>;
  handler: (input: z.infer<z.ZodObject<InputShape>>, context: ToolContext) => Promise<Output>;
}

/**
 * A tool with its schemas reduced to raw shapes, ready for registration.
 * `run` parses the raw arguments before handing them to the handler.
 */
export interface RegisteredTool {
  name: string;
  description: string;
  inputShape: z.ZodRawShape;
  outputShape: z.ZodRawShape;
  run: (args: unknown, context: ToolContext) => Promise<Record<string, unknown>>;
}

export function defineTool<
  InputShape extends z.ZodRawShape,
  OutputShape extends z.ZodRawShape,
  Output extends Record<string, unknown>,
>(tool: ToolDefinition<InputShape, OutputShape, Output>): RegisteredTool {
  return {
    name: tool.name,
    description: tool.description,
    inputShape: tool.inputSchema.shape,
    outputShape: tool.outputSchema.shape,
    run: async (args, context) => tool.handler(tool.inputSchema.parse(args ?? {}), context),
  };
}
