import { createLog } from "../_shared/log";
import { ResourceProgramError } from "../errors/engine.errors";
import { JOB_ID_SEPARATOR } from "../job/job_id";
import type { ExpressionNode, ParsedExpression } from "./expression.ast";
import { evaluateNode, isTruthy } from "./expression.evaluator";
import { parseExpression } from "./expression.parser";
import type { ResourceRecord } from "./resource.record";
import { isReservedGroup, type ResourceStore } from "./resource.store";

const log = createLog("resource");

export interface CompileOptions {
  /** Namespace of the owning job; bare names resolve to `namespace::name`. */
  readonly namespace?: string;
  /** Explicit `alias -> group` bindings, checked before namespace resolution. */
  readonly imports?: Readonly<Record<string, string>>;
}

export interface ResourceBinding {
  /** Name as written in the expression. */
  readonly name: string;
  /** Resource group key in the store. */
  readonly group: string;
}

export interface ResourceLine {
  readonly text: string;
  readonly expression: ParsedExpression;
  readonly bindings: readonly ResourceBinding[];
}

export interface LineVerdict {
  readonly text: string;
  readonly groups: readonly string[];
  readonly satisfied: boolean;
  /** Groups that were never published or published empty. */
  readonly emptyGroups: readonly string[];
}

export interface LintWarning {
  readonly line: string;
  readonly message: string;
}

function resolveGroup(name: string, options: CompileOptions): string {
  const imported = options.imports?.[name];
  if (imported !== undefined) {
    return imported;
  }
  if (isReservedGroup(name) || name.includes(JOB_ID_SEPARATOR) || options.namespace === undefined) {
    return name;
  }
  return `${options.namespace}${JOB_ID_SEPARATOR}${name}`;
}

function* crossProduct(
  bindings: readonly ResourceBinding[],
  pools: readonly (readonly ResourceRecord[])[]
): Generator<Map<string, ResourceRecord>> {
  const cursor = new Array<number>(pools.length).fill(0);
  while (true) {
    const current = new Map<string, ResourceRecord>();
    bindings.forEach((binding, idx) => {
      current.set(binding.name, pools[idx][cursor[idx]]);
    });
    yield current;

    let position = pools.length - 1;
    while (position >= 0) {
      cursor[position] += 1;
      if (cursor[position] < pools[position].length) {
        break;
      }
      cursor[position] = 0;
      position -= 1;
    }
    if (position < 0) {
      return;
    }
  }
}

function holds(line: ResourceLine, bound: ReadonlyMap<string, ResourceRecord>): boolean {
  try {
    return isTruthy(evaluateNode(line.expression.ast, bound));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    log.debug(`record rejected by '${line.text}': ${reason}`);
    return false;
  }
}

/**
 * A compiled, newline-separated list of resource expressions.
 *
 * Each line is existentially quantified over the records of the groups it
 * names (a cross product when it names more than one); the program holds only
 * when every line holds.
 */
export class ResourceProgram {
  private constructor(
    readonly source: string,
    readonly lines: readonly ResourceLine[]
  ) {}

  static compile(source: string, options: CompileOptions = {}): ResourceProgram {
    const lines: ResourceLine[] = [];
    for (const raw of source.split(/\r?\n/)) {
      const text = raw.trim();
      if (text.length === 0 || text.startsWith("#")) {
        continue;
      }
      const expression = parseExpression(text);
      const bindings = expression.names.map((name) => ({ name, group: resolveGroup(name, options) }));
      lines.push(Object.freeze({ text, expression, bindings: Object.freeze(bindings) }));
    }
    if (lines.length === 0) {
      throw new ResourceProgramError(source, "program has no expressions");
    }
    return new ResourceProgram(source, Object.freeze(lines));
  }

  /** Group keys read by any line, in order of first appearance. */
  get requiredGroups(): string[] {
    const seen = new Set<string>();
    for (const line of this.lines) {
      for (const binding of line.bindings) {
        seen.add(binding.group);
      }
    }
    return [...seen];
  }

  /** Field names read from `group` anywhere in the program. */
  fieldsOf(group: string): string[] {
    const fields = new Set<string>();
    for (const line of this.lines) {
      const names = new Set(line.bindings.filter((binding) => binding.group === group).map((binding) => binding.name));
      collectFields(line.expression.ast, names, fields);
    }
    return [...fields];
  }

  evaluate(store: ResourceStore): boolean {
    return this.lines.every((line) => this.evaluateLine(line, store));
  }

  explain(store: ResourceStore): LineVerdict[] {
    return this.lines.map((line) => ({
      text: line.text,
      groups: line.bindings.map((binding) => binding.group),
      satisfied: this.evaluateLine(line, store),
      emptyGroups: line.bindings
        .filter((binding) => store.records(binding.group).length === 0)
        .map((binding) => binding.group),
    }));
  }

  /**
   * Evaluates every line with `group` pinned to one record. Other groups a
   * line names still range over their records in `store`. Used for template
   * filters.
   */
  evaluateRecord(group: string, record: ResourceRecord, store?: ResourceStore): boolean {
    return this.lines.every((line) =>
      this.evaluateLine(line, (binding) =>
        binding.group === group || binding.name === group ? [record] : store?.records(binding.group) ?? []
      )
    );
  }

  private evaluateLine(
    line: ResourceLine,
    source: ResourceStore | ((binding: ResourceBinding) => readonly ResourceRecord[])
  ): boolean {
    const pools = line.bindings.map((binding) =>
      typeof source === "function" ? source(binding) : source.records(binding.group)
    );
    if (pools.some((pool) => pool.length === 0)) {
      return false;
    }
    for (const bound of crossProduct(line.bindings, pools)) {
      if (holds(line, bound)) {
        return true;
      }
    }
    return false;
  }
}

export function evaluate(program: ResourceProgram, store: ResourceStore): boolean {
  return program.evaluate(store);
}

function childrenOf(node: ExpressionNode): readonly ExpressionNode[] {
  switch (node.type) {
    case "sequence":
      return node.items;
    case "unary":
      return [node.operand];
    case "binary":
      return [node.left, node.right];
    case "logical":
      return node.operands;
    case "compare":
      return [node.first, ...node.rest.map((link) => link.right)];
    case "call":
      return [node.arg];
    default:
      return [];
  }
}

function collectFields(node: ExpressionNode, names: ReadonlySet<string>, fields: Set<string>): void {
  if (node.type === "field" && names.has(node.name)) {
    fields.add(node.field);
  }
  childrenOf(node).forEach((child) => collectFields(child, names, fields));
}

function collectNegations(node: ExpressionNode, found: string[]): void {
  if (node.type === "compare") {
    for (const { op } of node.rest) {
      if (op === "!=" || op === "not in") {
        found.push(op);
      }
    }
  }
  childrenOf(node).forEach((child) => collectNegations(child, found));
}

/**
 * Flags lines whose negative comparisons read as "no record matches" but
 * evaluate as "some record differs".
 */
export function lintProgram(program: ResourceProgram): LintWarning[] {
  const warnings: LintWarning[] = [];
  for (const line of program.lines) {
    const found: string[] = [];
    collectNegations(line.expression.ast, found);
    for (const op of new Set(found)) {
      warnings.push({
        line: line.text,
        message: `'${op}' holds when any record differs, not when every record does`,
      });
    }
  }
  return warnings;
}
