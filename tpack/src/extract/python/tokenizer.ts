export type TokenType = "name" | "string" | "number" | "op";

export type Token = {
  type: TokenType;
  value: string;
  line: number;
};

/** One logical line: physical lines joined across brackets and backslash continuations. */
export type LogicalLine = {
  indent: number;
  line: number;
  tokens: Token[];
};

export type TokenizeResult =
  | { ok: true; lines: LogicalLine[] }
  | { ok: false; line: number; reason: string };

const OPERATORS = [
  "**=", "//=", ">>=", "<<=", "...",
  "==", "!=", "<=", ">=", "->", "**", "//", "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "@=", ":=", "<<", ">>",
  "+", "-", "*", "/", "%", "@", "&", "|", "^", "~", "<", ">", "(", ")", "[", "]", "{", "}", ",", ":", ".", ";", "=",
];

const OPENERS = new Set(["(", "[", "{"]);
const CLOSERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

const NAME_RE = /[\p{L}_][\p{L}\p{N}_]*/uy;
const NUMBER_RE = /(?:0[xXoObB][0-9a-fA-F_]+|\d[\d_]*(?:\.[\d_]*)?(?:[eE][+-]?\d+)?[jJ]?|\.\d[\d_]*(?:[eE][+-]?\d+)?[jJ]?)/y;
const STRING_PREFIX_RE = /(?:[rRbBuUfF]{1,2})?(?=["'])/y;

/** Drop `{...}` replacement fields from an f-string body, keeping `{{`/`}}` literals as braces. */
function stripReplacementFields(body: string): string {
  return body
    .replace(/\{\{/g, "\u0000")
    .replace(/\}\}/g, "\u0001")
    .replace(/\{[^{}]*\}/g, "")
    .replace(/\u0000/g, "{")
    .replace(/\u0001/g, "}");
}

function measureIndent(src: string, start: number): { col: number; end: number } {
  let col = 0;
  let i = start;
  while (i < src.length) {
    const c = src[i];
    if (c === " ") col += 1;
    else if (c === "\t") col = (Math.floor(col / 8) + 1) * 8;
    else if (c === "\f") col = 0;
    else break;
    i++;
  }
  return { col, end: i };
}

/**
 * Tokenize Python source into logical lines. Comments are dropped, string
 * tokens carry their body without quotes or prefix. Fails on the errors that
 * make a file unparseable: unterminated strings, unbalanced brackets,
 * inconsistent dedents and characters outside the grammar.
 */
export function tokenize(src: string): TokenizeResult {
  const lines: LogicalLine[] = [];
  const indents = [0];
  const brackets: string[] = [];

  let tokens: Token[] = [];
  let current: { indent: number; line: number } | null = null;
  let line = 1;
  let i = 0;
  let atLineStart = true;

  const flush = (): void => {
    if (current && tokens.length > 0) {
      lines.push({ indent: current.indent, line: current.line, tokens });
    }
    tokens = [];
    current = null;
  };

  while (i < src.length) {
    if (atLineStart && brackets.length === 0) {
      const { col, end } = measureIndent(src, i);
      const c = src[end];
      if (end >= src.length) {
        i = end;
        break;
      }
      if (c === "\n" || c === "\r" || c === "#") {
        // blank or comment-only line: indentation is irrelevant
        const nl = src.indexOf("\n", end);
        if (nl === -1) {
          i = src.length;
          break;
        }
        i = nl + 1;
        line++;
        continue;
      }

      const top = indents[indents.length - 1];
      if (col > top) {
        indents.push(col);
      } else if (col < top) {
        while (indents.length > 1 && col < indents[indents.length - 1]) indents.pop();
        if (col !== indents[indents.length - 1]) {
          return { ok: false, line, reason: "unindent does not match any outer indentation level" };
        }
      }

      current = { indent: col, line };
      atLineStart = false;
      i = end;
      continue;
    }

    const c = src[i];

    if (c === "\n") {
      line++;
      i++;
      if (brackets.length === 0) {
        flush();
        atLineStart = true;
      }
      continue;
    }
    if (c === " " || c === "\t" || c === "\r" || c === "\f") {
      i++;
      continue;
    }
    if (c === "#") {
      const nl = src.indexOf("\n", i);
      i = nl === -1 ? src.length : nl;
      continue;
    }
    if (c === "\\") {
      const next = src[i + 1] === "\r" ? src[i + 2] : src[i + 1];
      if (next === "\n" || next === undefined) {
        i = src[i + 1] === "\r" ? i + 3 : i + 2;
        line++;
        continue;
      }
      return { ok: false, line, reason: "unexpected character after line continuation" };
    }

    STRING_PREFIX_RE.lastIndex = i;
    const prefixMatch = STRING_PREFIX_RE.exec(src);
    if (prefixMatch) {
      const prefix = prefixMatch[0].toLowerCase();
      const quoteAt = i + prefixMatch[0].length;
      const quote = src[quoteAt];
      const triple = src.startsWith(quote.repeat(3), quoteAt);
      const delimiter = triple ? quote.repeat(3) : quote;
      const startLine = line;
      let j = quoteAt + delimiter.length;
      let closed = false;

      while (j < src.length) {
        const ch = src[j];
        if (ch === "\\") {
          if (src[j + 1] === "\n") line++;
          j += 2;
          continue;
        }
        if (ch === "\n") {
          if (!triple) break;
          line++;
        }
        if (src.startsWith(delimiter, j)) {
          closed = true;
          break;
        }
        j++;
      }

      if (!closed) {
        return { ok: false, line: startLine, reason: "unterminated string literal" };
      }

      const body = src.slice(quoteAt + delimiter.length, j);
      tokens.push({ type: "string", value: prefix.includes("f") ? stripReplacementFields(body) : body, line: startLine });
      i = j + delimiter.length;
      continue;
    }

    NAME_RE.lastIndex = i;
    const name = NAME_RE.exec(src);
    if (name) {
      tokens.push({ type: "name", value: name[0], line });
      i += name[0].length;
      continue;
    }

    NUMBER_RE.lastIndex = i;
    const num = NUMBER_RE.exec(src);
    if (num) {
      tokens.push({ type: "number", value: num[0], line });
      i += num[0].length;
      continue;
    }

    const op = OPERATORS.find((o) => src.startsWith(o, i));
    if (!op) {
      return { ok: false, line, reason: `invalid character '${c}'` };
    }

    if (OPENERS.has(op)) {
      brackets.push(op);
    } else if (op in CLOSERS) {
      const open = brackets.pop();
      if (open !== CLOSERS[op]) {
        return { ok: false, line, reason: `unmatched '${op}'` };
      }
    }

    tokens.push({ type: "op", value: op, line });
    i += op.length;
  }

  if (brackets.length > 0) {
    return { ok: false, line, reason: `'${brackets[brackets.length - 1]}' was never closed` };
  }

  flush();
  return { ok: true, lines };
}
