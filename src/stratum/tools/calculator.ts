/**
 * Arithmetic tool
 */

import { z } from "zod";
import { ToolErrorCode, createToolError, defineTool, toolOk } from "./types.js";

const CalculatorInput = z.object({
  operation: z.enum(["add", "subtract", "multiply", "divide"]),
  a: z.number(),
  b: z.number(),
});

export const calculatorTool = defineTool({
  name: "calculator",
  description: "Apply add, subtract, multiply or divide to two numbers.",
  parameters: {
    type: "object",
    properties: {
      operation: { type: "string", enum: ["add", "subtract", "multiply", "divide"] },
      a: { type: "number" },
      b: { type: "number" },
    },
    required: ["operation", "a", "b"],
  },
  input: CalculatorInput,
  async run({ operation, a, b }) {
    switch (operation) {
      case "add":
        return toolOk(a + b);
      case "subtract":
        return toolOk(a - b);
      case "multiply":
        return toolOk(a * b);
      case "divide":
        if (b === 0) {
          return createToolError(ToolErrorCode.INVALID_INPUT, "Division by zero", { a, b });
        }
        return toolOk(a / b);
    }
  },
});
