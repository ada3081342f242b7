import type { ResourceRecord } from "./resource.record";

export type ScalarValue = string | number | boolean | null;

export type Value = ScalarValue | readonly Value[] | ResourceRecord;

export const ALLOWED_CALLS = Object.freeze(["int", "float", "bool", "str", "len"] as const);

export type CallName = (typeof ALLOWED_CALLS)[number];

export type CompareOperator = "==" | "!=" | "<" | "<=" | ">" | ">=" | "in" | "not in";

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "//"
  | "%"
  | "**"
  | "&"
  | "|"
  | "^"
  | "<<"
  | ">>";

export type UnaryOperator = "not" | "-" | "+" | "~";

export type ExpressionNode =
  | { readonly type: "literal"; readonly value: ScalarValue }
  | { readonly type: "sequence"; readonly items: readonly ExpressionNode[] }
  | { readonly type: "name"; readonly name: string }
  | { readonly type: "field"; readonly name: string; readonly field: string }
  | { readonly type: "unary"; readonly op: UnaryOperator; readonly operand: ExpressionNode }
  | {
      readonly type: "binary";
      readonly op: BinaryOperator;
      readonly left: ExpressionNode;
      readonly right: ExpressionNode;
    }
  | { readonly type: "logical"; readonly op: "and" | "or"; readonly operands: readonly ExpressionNode[] }
  | {
      readonly type: "compare";
      readonly first: ExpressionNode;
      readonly rest: readonly { readonly op: CompareOperator; readonly right: ExpressionNode }[];
    }
  | { readonly type: "call"; readonly fn: CallName; readonly arg: ExpressionNode };

export interface ParsedExpression {
  readonly text: string;
  readonly ast: ExpressionNode;
  /** Resource names referenced by the expression, in order of first appearance. */
  readonly names: readonly string[];
}

export function isCallName(value: string): value is CallName {
  return (ALLOWED_CALLS as readonly string[]).includes(value);
}
