import nunjucks from "nunjucks";
import type { RenderContext, RenderEngine, TemplateEngine } from "./template.types";

const INDEX_KEY = "__index__";
const RESOURCE_ID_KEY = "__resource_id__";
const POSITIONAL_KEY = /^\d+$/;

function lookupKey(key: string, context: RenderContext): string {
  if (key === INDEX_KEY) {
    return String(context.index);
  }
  if (key === RESOURCE_ID_KEY) {
    return context.resourceId;
  }
  if (POSITIONAL_KEY.test(key)) {
    const value = context.positional[Number(key)];
    if (value === undefined) {
      throw new Error(`RENDER_ERROR positional index ${key} out of range`);
    }
    return value;
  }
  if (!Object.prototype.hasOwnProperty.call(context.fields, key)) {
    throw new Error(`RENDER_ERROR missing key '${key}'`);
  }
  return context.fields[key];
}

/**
 * `{name}` and `{0}` substitution with `{{` and `}}` as literal braces.
 * Format specs and conversions are not supported.
 */
export const simpleEngine: RenderEngine = {
  render(text, context) {
    let out = "";
    let cursor = 0;
    while (cursor < text.length) {
      const ch = text[cursor];
      if (ch === "{") {
        if (text[cursor + 1] === "{") {
          out += "{";
          cursor += 2;
          continue;
        }
        const end = text.indexOf("}", cursor + 1);
        if (end < 0) {
          throw new Error("RENDER_ERROR single '{' encountered in format string");
        }
        const key = text.slice(cursor + 1, end).trim();
        if (key.length === 0 || /[!:{]/.test(key)) {
          throw new Error(`RENDER_ERROR unsupported replacement field '{${key}}'`);
        }
        out += lookupKey(key, context);
        cursor = end + 1;
        continue;
      }
      if (ch === "}") {
        if (text[cursor + 1] !== "}") {
          throw new Error("RENDER_ERROR single '}' encountered in format string");
        }
        out += "}";
        cursor += 2;
        continue;
      }
      out += ch;
      cursor += 1;
    }
    return out;
  },
};

const jinjaEnvironment = new nunjucks.Environment(null, {
  autoescape: false,
  throwOnUndefined: true,
});

/** Conditional and loop-capable rendering (Jinja-compatible syntax). */
export const jinjaEngine: RenderEngine = {
  render(text, context) {
    return jinjaEnvironment.renderString(text, {
      ...context.fields,
      [INDEX_KEY]: context.index,
      [RESOURCE_ID_KEY]: context.resourceId,
    });
  },
};

export function engineFor(engine: TemplateEngine): RenderEngine {
  return engine === "jinja" ? jinjaEngine : simpleEngine;
}
