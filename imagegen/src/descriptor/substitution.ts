import { CliUsageError, SubstitutionError } from "../errors.js";

/**
 * `{{NAME}}` or `{{NAME:default}}`. The default runs up to the first `}}` and may
 * itself contain `:` (e.g. `{{FROM:rhel:7}}`).
 */
const PLACEHOLDER = /\{\{([A-Za-z_][A-Za-z0-9_]*)(?::((?:(?!\}\}).)*))?\}\}/g;
const PLACEHOLDER_AT = new RegExp(PLACEHOLDER.source, "y");

/** Values that read back as the same plain scalar; anything else is emitted double-quoted. */
const SAFE_PLAIN = /^[A-Za-z0-9_][A-Za-z0-9_./@+:=-]*$/;

const BLOCK_HEADER = /^[|>][0-9+-]*[ \t]*(?:#.*)?\r?$/;

export type SubstitutionContext = {
  overrides: Record<string, string>;
};

export type Placeholder = {
  name: string;
  default?: string;
};

/**
 * A resolved placeholder. Inline defaults are source text and go in as written;
 * override values are escaped for the scalar they land in.
 */
type Replacement = { text: string; verbatim: boolean };

type Resolve = (name: string, fallback: string | undefined) => Replacement;

/**
 * Replace every placeholder in the descriptor text.
 * Precedence: override > inline default; neither → SubstitutionError.
 *
 * Placeholders in comments are left alone. A plain scalar containing a
 * placeholder is re-emitted double-quoted unless its value is a simple token,
 * quoted scalars get the value escaped for their quote style, and block
 * scalars take it as is.
 */
export function substitute(text: string, ctx: SubstitutionContext): string {
  return rewrite(text, (name, fallback) => {
    if (Object.prototype.hasOwnProperty.call(ctx.overrides, name)) {
      return { text: ctx.overrides[name], verbatim: false };
    }
    if (fallback !== undefined) {
      return { text: fallback, verbatim: true };
    }
    throw new SubstitutionError(name);
  });
}

/** List placeholders outside comments, in order of first appearance. */
export function listPlaceholders(text: string): Placeholder[] {
  const seen = new Map<string, Placeholder>();
  rewrite(text, (name, fallback) => {
    if (!seen.has(name)) {
      seen.set(name, fallback === undefined ? { name } : { name, default: fallback });
    }
    return { text: fallback ?? "", verbatim: true };
  });
  return [...seen.values()];
}

/** Parse repeated `NAME=VALUE` CLI arguments into an override map. */
export function parseParams(pairs: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const pair of pairs) {
    const idx = pair.indexOf("=");
    if (idx <= 0) {
      throw new CliUsageError(`Invalid parameter '${pair}'.`, ["Expected format: --param NAME=VALUE"]);
    }
    overrides[pair.slice(0, idx)] = pair.slice(idx + 1);
  }
  return overrides;
}

// --- YAML-aware scanning ---

function placeholderAt(text: string, pos: number): RegExpExecArray | null {
  PLACEHOLDER_AT.lastIndex = pos;
  return PLACEHOLDER_AT.exec(text);
}

function lineEnd(text: string, pos: number): number {
  const idx = text.indexOf("\n", pos);
  return idx === -1 ? text.length : idx;
}

function isBreak(ch: string | undefined, inFlow: boolean): boolean {
  if (ch === undefined || ch === " " || ch === "\t" || ch === "\n" || ch === "\r") return true;
  return inFlow && ",[]{}".includes(ch);
}

function isSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/**
 * Walk the text once, tracking comments, flow collections, quoted and block
 * scalars, and rewrite each scalar that holds a placeholder.
 */
function rewrite(text: string, resolve: Resolve): string {
  let out = "";
  let i = 0;
  let flow = 0;
  let nodeStart = true;
  let lineIndent = 0;
  let blockIndent: number | null = null;

  while (i < text.length) {
    if (i === 0 || text[i - 1] === "\n") {
      const eol = lineEnd(text, i);
      const line = text.slice(i, eol);
      const indent = line.length - line.trimStart().length;

      if (blockIndent !== null && (line.trim() === "" || indent > blockIndent)) {
        out += replaceAll(line, resolve, (value) => value.replace(/\n/g, `\n${" ".repeat(indent)}`));
        if (eol < text.length) out += "\n";
        i = eol + 1;
        continue;
      }

      blockIndent = null;
      lineIndent = indent;
      if (flow === 0) nodeStart = true;
    }

    const ch = text[i];

    if (isSpace(ch)) {
      out += ch;
      i += 1;
      continue;
    }

    if (ch === "#" && (i === 0 || isSpace(text[i - 1]))) {
      const eol = lineEnd(text, i);
      out += text.slice(i, eol);
      i = eol;
      continue;
    }

    if (nodeStart) {
      if (ch === "'" || ch === '"') {
        const end = quotedEnd(text, i, ch);
        out += rewriteQuoted(text.slice(i, end), ch, resolve);
        i = end;
        nodeStart = false;
        continue;
      }

      const eol = lineEnd(text, i);
      if ((ch === "|" || ch === ">") && BLOCK_HEADER.test(text.slice(i, eol))) {
        out += text.slice(i, eol);
        blockIndent = lineIndent;
        i = eol;
        nodeStart = false;
        continue;
      }

      // anchors and tags precede the node they decorate
      if (ch === "&" || ch === "!") {
        let j = i;
        while (j < text.length && !isSpace(text[j])) j += 1;
        out += text.slice(i, j);
        i = j;
        continue;
      }
    }

    if ((ch === "-" || ch === "?" || ch === ":") && isBreak(text[i + 1], flow > 0)) {
      out += ch;
      i += 1;
      nodeStart = true;
      continue;
    }

    if ((ch === "[" || ch === "{") && placeholderAt(text, i) === null) {
      out += ch;
      i += 1;
      flow += 1;
      nodeStart = true;
      continue;
    }

    if (flow > 0 && (ch === "]" || ch === "}" || ch === ",")) {
      out += ch;
      i += 1;
      if (ch === ",") {
        nodeStart = true;
      } else {
        flow -= 1;
        nodeStart = false;
      }
      continue;
    }

    const end = plainEnd(text, i, flow > 0);
    out += rewritePlain(text.slice(i, end), resolve);
    i = end;
    nodeStart = false;
  }

  return out;
}

/** End of the plain scalar starting at `start`, trailing blanks excluded. */
function plainEnd(text: string, start: number, inFlow: boolean): number {
  let j = start;
  while (j < text.length) {
    const m = placeholderAt(text, j);
    if (m) {
      j += m[0].length;
      continue;
    }
    const ch = text[j];
    if (ch === "\n") break;
    if (ch === "#" && j > start && isSpace(text[j - 1])) break;
    if (ch === ":" && isBreak(text[j + 1], inFlow)) break;
    if (inFlow && ",[]{}".includes(ch)) break;
    j += 1;
  }
  while (j > start && isSpace(text[j - 1])) j -= 1;
  return j;
}

/** Index just past the closing quote of the scalar opening at `start`. */
function quotedEnd(text: string, start: number, quote: "'" | '"'): number {
  let j = start + 1;
  while (j < text.length) {
    const m = placeholderAt(text, j);
    if (m) {
      j += m[0].length;
      continue;
    }
    const ch = text[j];
    if (quote === '"' && ch === "\\") {
      j += 2;
      continue;
    }
    if (ch === quote) {
      if (quote === "'" && text[j + 1] === "'") {
        j += 2;
        continue;
      }
      return j + 1;
    }
    j += 1;
  }
  return text.length;
}

function replaceAll(segment: string, resolve: Resolve, escape: (value: string) => string): string {
  return segment.replace(PLACEHOLDER, (_match, name: string, fallback: string | undefined) => {
    const r = resolve(name, fallback);
    return r.verbatim ? r.text : escape(r.text);
  });
}

function rewriteQuoted(segment: string, quote: "'" | '"', resolve: Resolve): string {
  return replaceAll(segment, resolve, (value) =>
    quote === "'" ? value.replace(/'/g, "''") : JSON.stringify(value).slice(1, -1),
  );
}

function rewritePlain(segment: string, resolve: Resolve): string {
  if (segment.search(PLACEHOLDER) === -1) return segment;
  const value = replaceAll(segment, resolve, (v) => v);
  return SAFE_PLAIN.test(value) && !value.endsWith(":") ? value : JSON.stringify(value);
}
