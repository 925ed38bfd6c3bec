import { toolUseBlock } from "@tether/core";
import { describe, expect, it } from "vitest";
import { evaluateExpression, ExpressionError } from "../src/calculator";
import { buildToolkit } from "../src/tools";

describe("evaluateExpression", () => {
  it("follows operator precedence", () => {
    expect(evaluateExpression("2 + 3 * 4")).toBe(14);
    expect(evaluateExpression("(2 + 3) * 4")).toBe(20);
    expect(evaluateExpression("10 / 4 - 1")).toBe(1.5);
    expect(evaluateExpression("7 % 4")).toBe(3);
  });

  it("treats powers as right-associative and binding tighter than negation", () => {
    expect(evaluateExpression("2 ** 3 ** 2")).toBe(512);
    expect(evaluateExpression("(1 + 2) ^ 2")).toBe(9);
    expect(evaluateExpression("-2 ** 2")).toBe(-4);
    expect(evaluateExpression("2 ** -1")).toBe(0.5);
  });

  it("supports functions and constants", () => {
    expect(evaluateExpression("sqrt(16) + max(1, 5, 3)")).toBe(9);
    expect(evaluateExpression("round(PI * 100)")).toBe(314);
    expect(evaluateExpression("abs(-2.5e1)")).toBe(25);
  });

  it("rejects malformed input", () => {
    expect(() => evaluateExpression("")).toThrow("Empty expression");
    expect(() => evaluateExpression("2 +")).toThrow("Unexpected end of expression");
    expect(() => evaluateExpression("2 $ 3")).toThrow("Unexpected character at position 3");
    expect(() => evaluateExpression("(1 + 2")).toThrow('Expected ")"');
    expect(() => evaluateExpression("1 2")).toThrow('Unexpected "2"');
    expect(() => evaluateExpression("process(1)")).toThrow('Unknown name "process"');
    expect(() => evaluateExpression("constructor")).toThrow(ExpressionError);
  });

  it("rejects division by zero and non-finite results", () => {
    expect(() => evaluateExpression("1 / 0")).toThrow("Division by zero");
    expect(() => evaluateExpression("10 ** 400")).toThrow("Result is not a finite number");
  });
});

describe("calculator tool", () => {
  it("answers with the expression and its value", async () => {
    const result = await buildToolkit().execute(toolUseBlock("call_1", "calculator", { expression: "2 + 3 * 4" }));
    expect(result).toEqual({
      type: "tool_result",
      id: "call_1",
      name: "calculator",
      output: [{ type: "text", text: "2 + 3 * 4 = 14" }],
      isError: false,
    });
  });

  it("reports evaluation errors to the model", async () => {
    const result = await buildToolkit().execute(toolUseBlock("call_1", "calculator", { expression: "1 / 0" }));
    expect(result.isError).toBe(true);
    expect(result.output).toEqual([{ type: "text", text: "Error: Division by zero" }]);
  });
});
