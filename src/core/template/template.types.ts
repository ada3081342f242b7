import type { ResourceProgram } from "../resource/resource.program";

export const TEMPLATE_ENGINES = Object.freeze(["simple", "jinja"] as const);

export type TemplateEngine = (typeof TEMPLATE_ENGINES)[number];

export function isTemplateEngine(value: string): value is TemplateEngine {
  return (TEMPLATE_ENGINES as readonly string[]).includes(value);
}

/**
 * Raw job skeleton. String fields may carry template markup; list fields are
 * rendered item by item.
 */
export type UnitSkeleton = Readonly<Record<string, string | number | boolean | readonly string[]>>;

export interface Template {
  readonly id: string;
  readonly namespace: string;
  /** Resource group key (the producing job's full id). */
  readonly resource: string;
  readonly engine: TemplateEngine;
  readonly filterText?: string;
  readonly filter?: ResourceProgram;
  readonly unit: UnitSkeleton;
}

/** Values a rendered field sees: record fields plus the expansion counters. */
export interface RenderContext {
  readonly fields: Readonly<Record<string, string>>;
  /** Record values in record order, for positional `{0}` references. */
  readonly positional: readonly string[];
  readonly index: number;
  readonly resourceId: string;
}

export interface RenderEngine {
  render(text: string, context: RenderContext): string;
}
