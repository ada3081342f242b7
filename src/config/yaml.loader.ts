import fs from "node:fs";
import path from "node:path";
import { ConfigurationError } from "./config.errors";

interface SourceLine {
  indent: number;
  text: string;
  lineNo: number;
}

/**
 * Block mappings, block sequences, inline `[a, b]` lists and plain or quoted
 * scalars. Anchors, multi-line strings and flow mappings are not supported.
 */
class ConfigYamlParser {
  private idx = 0;

  constructor(
    private readonly lines: SourceLine[],
    private readonly source: string
  ) {}

  parse(): unknown {
    if (this.lines.length === 0) {
      return {};
    }
    const value = this.parseNode(this.lines[0].indent);
    const leftover = this.peek();
    if (leftover) {
      this.fail(leftover.lineNo, `unexpected content '${leftover.text}'`);
    }
    return value;
  }

  private fail(lineNo: number, message: string): never {
    throw new ConfigurationError(`${this.source}:${lineNo} ${message}`);
  }

  private parseNode(indent: number): unknown {
    const current = this.peek();
    if (!current) {
      throw new ConfigurationError(`${this.source}: unexpected end of file`);
    }
    if (current.indent !== indent) {
      this.fail(current.lineNo, `invalid indentation for '${current.text}'`);
    }
    return isSequenceItem(current.text) ? this.parseSequence(indent) : this.parseMapping(indent, {});
  }

  private parseMapping(indent: number, out: Record<string, unknown>): Record<string, unknown> {
    for (let line = this.peek(); line && line.indent >= indent; line = this.peek()) {
      if (line.indent > indent) {
        this.fail(line.lineNo, `invalid indentation for '${line.text}'`);
      }
      if (isSequenceItem(line.text)) {
        break;
      }
      const { key, rest } = this.splitKeyValue(line.text, line.lineNo);
      if (Object.prototype.hasOwnProperty.call(out, key)) {
        this.fail(line.lineNo, `duplicate key '${key}'`);
      }
      this.idx += 1;
      out[key] = rest === "" ? this.parseNested(indent) : this.parseScalar(rest, line.lineNo);
    }
    return out;
  }

  private parseSequence(indent: number): unknown[] {
    const out: unknown[] = [];
    for (let line = this.peek(); line && line.indent >= indent; line = this.peek()) {
      if (line.indent > indent) {
        this.fail(line.lineNo, `invalid indentation for '${line.text}'`);
      }
      if (!isSequenceItem(line.text)) {
        break;
      }
      const rest = line.text.slice(1).trim();
      const lineNo = line.lineNo;
      this.idx += 1;

      if (rest === "") {
        const nested = this.peek();
        out.push(nested && nested.indent > indent ? this.parseNode(nested.indent) : null);
      } else if (rest.indexOf(":") > 0 && !isQuoted(rest)) {
        const item: Record<string, unknown> = {};
        const entry = this.splitKeyValue(rest, lineNo);
        item[entry.key] = entry.rest === "" ? this.parseNested(indent) : this.parseScalar(entry.rest, lineNo);
        const next = this.peek();
        if (next && next.indent > indent) {
          this.parseMapping(next.indent, item);
        }
        out.push(item);
      } else {
        out.push(this.parseScalar(rest, lineNo));
      }
    }
    return out;
  }

  private parseNested(parentIndent: number): unknown {
    const nested = this.peek();
    return nested && nested.indent > parentIndent ? this.parseNode(nested.indent) : {};
  }

  private splitKeyValue(text: string, lineNo: number): { key: string; rest: string } {
    const idx = text.indexOf(":");
    if (idx <= 0) {
      this.fail(lineNo, "expected 'key: value'");
    }
    const key = unquote(text.slice(0, idx).trim());
    if (key === "") {
      this.fail(lineNo, "empty key");
    }
    return { key, rest: text.slice(idx + 1).trim() };
  }

  private parseScalar(value: string, lineNo: number): unknown {
    if (value === "{}") {
      return {};
    }
    if (value.startsWith("[")) {
      if (!value.endsWith("]")) {
        this.fail(lineNo, `unterminated list '${value}'`);
      }
      const body = value.slice(1, -1).trim();
      return body === "" ? [] : splitFlowItems(body).map((item) => this.parseScalar(item, lineNo));
    }
    if (isQuoted(value)) {
      return unquote(value);
    }
    switch (value) {
      case "true":
        return true;
      case "false":
        return false;
      case "null":
      case "~":
        return null;
      default:
        return /^-?\d+(?:\.\d+)?$/.test(value) ? Number(value) : value;
    }
  }

  private peek(): SourceLine | undefined {
    return this.lines[this.idx];
  }
}

function isSequenceItem(text: string): boolean {
  return text === "-" || text.startsWith("- ");
}

function isQuoted(value: string): boolean {
  return (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
  );
}

function unquote(value: string): string {
  return isQuoted(value) ? value.slice(1, -1) : value;
}

function splitFlowItems(body: string): string[] {
  const items: string[] = [];
  let quote: string | undefined;
  let current = "";
  for (const char of body) {
    if (quote) {
      quote = char === quote ? undefined : quote;
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === ",") {
      items.push(current.trim());
      current = "";
      continue;
    }
    current += char;
  }
  items.push(current.trim());
  return items;
}

function toSourceLines(raw: string, source: string): SourceLine[] {
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  const out: SourceLine[] = [];
  text.split(/\r?\n/).forEach((line, i) => {
    if (line.includes("\t")) {
      throw new ConfigurationError(`${source}:${i + 1} tab indentation is not supported`);
    }
    const noComment = line.replace(/\s+#.*$/, "");
    const trimmed = noComment.trim();
    if (trimmed === "" || trimmed.startsWith("#")) {
      return;
    }
    const indent = noComment.length - noComment.trimStart().length;
    out.push({ indent, text: noComment.trimEnd().slice(indent), lineNo: i + 1 });
  });
  return out;
}

export function parseYaml(raw: string, source = "<inline>"): unknown {
  return new ConfigYamlParser(toSourceLines(raw, source), source).parse();
}

export function loadYamlFile(absPath: string): unknown {
  if (!path.isAbsolute(absPath)) {
    throw new ConfigurationError(`${absPath}: path must be absolute`);
  }
  let raw: string;
  try {
    raw = fs.readFileSync(absPath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`${absPath}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
  return parseYaml(raw, absPath);
}
