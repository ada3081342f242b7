import test from "node:test";
import assert from "node:assert/strict";
import { EvaluationError } from "../../../src/core/errors/engine.errors";
import { evaluateNode } from "../../../src/core/resource/expression.evaluator";
import { parseExpression } from "../../../src/core/resource/expression.parser";
import { ResourceRecord } from "../../../src/core/resource/resource.record";

function run(text: string, device: Record<string, string>) {
  return evaluateNode(parseExpression(text).ast, new Map([["device", ResourceRecord.from(device)]]));
}

function fails(text: string, device: Record<string, string>, message: string): void {
  assert.throws(
    () => run(text, device),
    (error: unknown) => error instanceof EvaluationError && error.message === `EVALUATION_ERROR ${message}`
  );
}

test("evaluator: integer arithmetic stays exact inside the safe range", () => {
  assert.equal(run("int(device.size) + 1", { size: "9007199254740990" }), 9007199254740991);
  assert.equal(run("int(device.mask) & 12", { mask: "10" }), 8);
  assert.equal(run("int(device.bit) << 52", { bit: "1" }), 4503599627370496);
});

/** Intent: values that cannot be held exactly are refused instead of rounded. */
test("evaluator: int() refuses text beyond the safe integer range", () => {
  fails("int(device.size) > 0", { size: "9007199254740993" }, "int() value '9007199254740993' is out of range");
  fails("int(device.size) > 0", { size: "12abc" }, "invalid literal for int(): '12abc'");
});

test("evaluator: bitwise results outside the safe range are errors", () => {
  fails("int(device.bit) << 53", { bit: "1" }, "result of '<<' is out of integer range");
  fails("int(device.bit) << 4096", { bit: "1" }, "result of '<<' is out of integer range");
  assert.equal(run("int(device.bit) << 4096", { bit: "0" }), 0);
  fails("int(device.x) | 1e300", { x: "1" }, "operator '|' operand 1e+300 is out of integer range");
});
