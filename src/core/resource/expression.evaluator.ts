import { EvaluationError } from "../errors/engine.errors";
import type { BinaryOperator, CompareOperator, ExpressionNode, Value } from "./expression.ast";
import { ResourceRecord, isIntegerText, parseFloatStrict, parseIntStrict } from "./resource.record";

export type Bindings = ReadonlyMap<string, ResourceRecord>;

function describe(value: Value): string {
  if (value === null) {
    return "None";
  }
  if (value instanceof ResourceRecord) {
    return "resource";
  }
  if (Array.isArray(value)) {
    return "sequence";
  }
  return typeof value;
}

function isSequence(value: Value): value is readonly Value[] {
  return Array.isArray(value);
}

/** Booleans take part in arithmetic as 0 and 1. */
function toNumeric(value: Value): number | undefined {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return undefined;
}

export function isTruthy(value: Value): boolean {
  if (value === null) {
    return false;
  }
  if (typeof value === "string") {
    return value.length > 0;
  }
  if (typeof value === "number") {
    return value !== 0;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (isSequence(value)) {
    return value.length > 0;
  }
  return true;
}

export function valuesEqual(left: Value, right: Value): boolean {
  const leftNum = toNumeric(left);
  const rightNum = toNumeric(right);
  if (leftNum !== undefined && rightNum !== undefined) {
    return leftNum === rightNum;
  }
  if (isSequence(left) && isSequence(right)) {
    return left.length === right.length && left.every((item, idx) => valuesEqual(item, right[idx]));
  }
  return left === right;
}

function compareOrder(left: Value, right: Value): number {
  const leftNum = toNumeric(left);
  const rightNum = toNumeric(right);
  if (leftNum !== undefined && rightNum !== undefined) {
    return leftNum === rightNum ? 0 : leftNum < rightNum ? -1 : 1;
  }
  if (typeof left === "string" && typeof right === "string") {
    return left === right ? 0 : left < right ? -1 : 1;
  }
  if (isSequence(left) && isSequence(right)) {
    const shared = Math.min(left.length, right.length);
    for (let i = 0; i < shared; i += 1) {
      if (!valuesEqual(left[i], right[i])) {
        return compareOrder(left[i], right[i]);
      }
    }
    return left.length - right.length;
  }
  throw new EvaluationError(`cannot order ${describe(left)} and ${describe(right)}`);
}

function contains(container: Value, item: Value): boolean {
  if (typeof container === "string") {
    if (typeof item !== "string") {
      throw new EvaluationError(`'in <string>' requires a string operand, got ${describe(item)}`);
    }
    return container.includes(item);
  }
  if (isSequence(container)) {
    return container.some((candidate) => valuesEqual(candidate, item));
  }
  throw new EvaluationError(`argument of type ${describe(container)} is not iterable`);
}

function applyCompare(op: CompareOperator, left: Value, right: Value): boolean {
  switch (op) {
    case "==":
      return valuesEqual(left, right);
    case "!=":
      return !valuesEqual(left, right);
    case "<":
      return compareOrder(left, right) < 0;
    case "<=":
      return compareOrder(left, right) <= 0;
    case ">":
      return compareOrder(left, right) > 0;
    case ">=":
      return compareOrder(left, right) >= 0;
    case "in":
      return contains(right, left);
    case "not in":
      return !contains(right, left);
  }
}

function requireInteger(value: Value, op: string): bigint {
  const numeric = toNumeric(value);
  if (numeric === undefined || !Number.isInteger(numeric)) {
    throw new EvaluationError(`operator '${op}' requires integers, got ${describe(value)}`);
  }
  if (!Number.isSafeInteger(numeric)) {
    throw new EvaluationError(`operator '${op}' operand ${formatNumber(numeric)} is out of integer range`);
  }
  return BigInt(numeric);
}

function fromInteger(value: bigint, op: string): number {
  const result = Number(value);
  if (!Number.isSafeInteger(result)) {
    throw new EvaluationError(`result of '${op}' is out of integer range`);
  }
  return result;
}

function requireNumber(value: Value, op: string): number {
  const numeric = toNumeric(value);
  if (numeric === undefined) {
    throw new EvaluationError(`operator '${op}' does not support ${describe(value)}`);
  }
  return numeric;
}

function repeat(text: string, times: Value): string {
  const count = toNumeric(times);
  if (count === undefined || !Number.isInteger(count)) {
    throw new EvaluationError(`can't multiply string by ${describe(times)}`);
  }
  return count <= 0 ? "" : text.repeat(count);
}

function applyBinary(op: BinaryOperator, left: Value, right: Value): Value {
  switch (op) {
    case "+": {
      if (typeof left === "string" && typeof right === "string") {
        return left + right;
      }
      if (isSequence(left) && isSequence(right)) {
        return [...left, ...right];
      }
      return requireNumber(left, op) + requireNumber(right, op);
    }
    case "-":
      return requireNumber(left, op) - requireNumber(right, op);
    case "*": {
      if (typeof left === "string") {
        return repeat(left, right);
      }
      if (typeof right === "string") {
        return repeat(right, left);
      }
      return requireNumber(left, op) * requireNumber(right, op);
    }
    case "/": {
      const divisor = requireNumber(right, op);
      if (divisor === 0) {
        throw new EvaluationError("division by zero");
      }
      return requireNumber(left, op) / divisor;
    }
    case "//": {
      const divisor = requireNumber(right, op);
      if (divisor === 0) {
        throw new EvaluationError("integer division by zero");
      }
      return Math.floor(requireNumber(left, op) / divisor);
    }
    case "%": {
      const divisor = requireNumber(right, op);
      if (divisor === 0) {
        throw new EvaluationError("modulo by zero");
      }
      const dividend = requireNumber(left, op);
      return ((dividend % divisor) + divisor) % divisor;
    }
    case "**":
      return requireNumber(left, op) ** requireNumber(right, op);
    case "&":
      return fromInteger(requireInteger(left, op) & requireInteger(right, op), op);
    case "|":
      return fromInteger(requireInteger(left, op) | requireInteger(right, op), op);
    case "^":
      return fromInteger(requireInteger(left, op) ^ requireInteger(right, op), op);
    case "<<": {
      const shift = requireInteger(right, op);
      if (shift < 0n) {
        throw new EvaluationError("negative shift count");
      }
      const base = requireInteger(left, op);
      if (base !== 0n && shift > 53n) {
        throw new EvaluationError(`result of '${op}' is out of integer range`);
      }
      return fromInteger(base << shift, op);
    }
    case ">>": {
      const shift = requireInteger(right, op);
      if (shift < 0n) {
        throw new EvaluationError("negative shift count");
      }
      return fromInteger(requireInteger(left, op) >> shift, op);
    }
  }
}

function formatNumber(value: number): string {
  if (Number.isNaN(value)) {
    return "nan";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf";
  }
  return String(value);
}

function toText(value: Value): string {
  if (value === null) {
    return "None";
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  if (typeof value === "number") {
    return formatNumber(value);
  }
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof ResourceRecord) {
    return value.toString();
  }
  return `[${value.map((item) => (typeof item === "string" ? `'${item}'` : toText(item))).join(", ")}]`;
}

function callBuiltin(fn: "int" | "float" | "bool" | "str" | "len", arg: Value): Value {
  switch (fn) {
    case "int": {
      if (typeof arg === "string") {
        const parsed = parseIntStrict(arg);
        if (parsed === undefined) {
          throw new EvaluationError(
            isIntegerText(arg) ? `int() value '${arg.trim()}' is out of range` : `invalid literal for int(): '${arg}'`
          );
        }
        return parsed;
      }
      const numeric = toNumeric(arg);
      if (numeric === undefined || !Number.isFinite(numeric)) {
        throw new EvaluationError(`int() argument must be a string or a number, not ${describe(arg)}`);
      }
      return Math.trunc(numeric);
    }
    case "float": {
      if (typeof arg === "string") {
        const parsed = parseFloatStrict(arg);
        if (parsed === undefined) {
          throw new EvaluationError(`could not convert string to float: '${arg}'`);
        }
        return parsed;
      }
      const numeric = toNumeric(arg);
      if (numeric === undefined) {
        throw new EvaluationError(`float() argument must be a string or a number, not ${describe(arg)}`);
      }
      return numeric;
    }
    case "bool":
      return isTruthy(arg);
    case "str":
      return toText(arg);
    case "len": {
      if (typeof arg === "string" || isSequence(arg)) {
        return arg.length;
      }
      throw new EvaluationError(`object of type ${describe(arg)} has no len()`);
    }
  }
}

function lookup(bindings: Bindings, name: string): ResourceRecord {
  const record = bindings.get(name);
  if (!record) {
    throw new EvaluationError(`name '${name}' is not bound`);
  }
  return record;
}

/** Evaluates one parsed expression with each resource name bound to a single record. */
export function evaluateNode(node: ExpressionNode, bindings: Bindings): Value {
  switch (node.type) {
    case "literal":
      return node.value;
    case "sequence":
      return node.items.map((item) => evaluateNode(item, bindings));
    case "name":
      return lookup(bindings, node.name);
    case "field": {
      const value = lookup(bindings, node.name).text(node.field);
      if (value === undefined) {
        throw new EvaluationError(`resource '${node.name}' has no field '${node.field}'`);
      }
      return value;
    }
    case "unary": {
      const operand = evaluateNode(node.operand, bindings);
      switch (node.op) {
        case "not":
          return !isTruthy(operand);
        case "-":
          return -requireNumber(operand, "-");
        case "+":
          return requireNumber(operand, "+");
        case "~":
          return fromInteger(~requireInteger(operand, "~"), "~");
      }
    }
    case "binary":
      return applyBinary(node.op, evaluateNode(node.left, bindings), evaluateNode(node.right, bindings));
    case "logical": {
      let last: Value = null;
      for (const operand of node.operands) {
        last = evaluateNode(operand, bindings);
        const truthy = isTruthy(last);
        if (node.op === "and" && !truthy) {
          return last;
        }
        if (node.op === "or" && truthy) {
          return last;
        }
      }
      return last;
    }
    case "compare": {
      let left = evaluateNode(node.first, bindings);
      for (const { op, right } of node.rest) {
        const rightValue = evaluateNode(right, bindings);
        if (!applyCompare(op, left, rightValue)) {
          return false;
        }
        left = rightValue;
      }
      return true;
    }
    case "call":
      return callBuiltin(node.fn, evaluateNode(node.arg, bindings));
  }
}
