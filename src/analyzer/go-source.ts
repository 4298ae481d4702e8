/**
 * Reader for the top of a Go source file: package doc comment, package clause
 * and import declarations. Nothing after the last import is looked at.
 */

export type GoImport = {
  /** Unquoted import path. */
  path: string;
  /** Explicit import name ("_", "." or an identifier), if any. */
  name: string | null;
  line: number;
};

export type GoFileHeader = {
  fileName: string;
  packageName: string;
  /** Text of the package doc comment, or null when the file has none. */
  doc: string | null;
  imports: GoImport[];
};

export class GoSyntaxError extends Error {
  constructor(
    readonly fileName: string,
    readonly line: number,
    readonly column: number,
    detail: string,
  ) {
    super(`${fileName}:${line}:${column}: ${detail}`);
    this.name = "GoSyntaxError";
  }
}

type Comment = { text: string; startLine: number; endLine: number };

type Token =
  | { kind: "ident"; value: string; line: number; column: number }
  | { kind: "string"; value: string; line: number; column: number }
  | { kind: "punct"; value: string; line: number; column: number }
  | { kind: "eof"; value: ""; line: number; column: number };

/** Tool directives ("//go:build", "//line") are not part of doc text. */
const DIRECTIVE = /^(line |extern |export |[a-z0-9]+:[a-z0-9])/;

class Scanner {
  private pos = 0;
  private line = 1;
  private lineStart = 0;
  readonly comments: Comment[] = [];

  constructor(
    private readonly src: string,
    private readonly fileName: string,
  ) {}

  fail(line: number, column: number, detail: string): never {
    throw new GoSyntaxError(this.fileName, line, column, detail);
  }

  private column(): number {
    return this.pos - this.lineStart + 1;
  }

  private newline(): void {
    this.line++;
    this.lineStart = this.pos + 1;
  }

  private skipSpaceAndComments(): void {
    const src = this.src;
    while (this.pos < src.length) {
      const ch = src[this.pos];
      if (ch === "\n") {
        this.newline();
        this.pos++;
      } else if (ch === " " || ch === "\t" || ch === "\r" || ch === "\uFEFF") {
        this.pos++;
      } else if (ch === "/" && src[this.pos + 1] === "/") {
        const end = src.indexOf("\n", this.pos);
        const stop = end === -1 ? src.length : end;
        this.comments.push({ text: src.slice(this.pos, stop), startLine: this.line, endLine: this.line });
        this.pos = stop;
      } else if (ch === "/" && src[this.pos + 1] === "*") {
        const startLine = this.line;
        const startCol = this.column();
        const end = src.indexOf("*/", this.pos + 2);
        if (end === -1) this.fail(startLine, startCol, "comment not terminated");
        const text = src.slice(this.pos, end + 2);
        for (let i = this.pos; i < end; i++) {
          if (src[i] === "\n") {
            this.line++;
            this.lineStart = i + 1;
          }
        }
        this.comments.push({ text, startLine, endLine: this.line });
        this.pos = end + 2;
      } else {
        return;
      }
    }
  }

  next(): Token {
    this.skipSpaceAndComments();
    const src = this.src;
    const line = this.line;
    const column = this.column();
    if (this.pos >= src.length) return { kind: "eof", value: "", line, column };

    const ch = src[this.pos];
    if (/[\p{L}_]/u.test(ch)) {
      const m = /^[\p{L}\p{Nd}_]+/u.exec(src.slice(this.pos));
      const value = m ? m[0] : ch;
      this.pos += value.length;
      return { kind: "ident", value, line, column };
    }
    if (ch === '"') {
      return { kind: "string", value: this.interpretedString(line, column), line, column };
    }
    if (ch === "`") {
      const end = src.indexOf("`", this.pos + 1);
      if (end === -1) this.fail(line, column, "raw string literal not terminated");
      const value = src.slice(this.pos + 1, end).replace(/\r/g, "");
      for (let i = this.pos; i < end; i++) {
        if (src[i] === "\n") {
          this.line++;
          this.lineStart = i + 1;
        }
      }
      this.pos = end + 1;
      return { kind: "string", value, line, column };
    }
    this.pos++;
    return { kind: "punct", value: ch, line, column };
  }

  private interpretedString(line: number, column: number): string {
    const src = this.src;
    let out = "";
    let i = this.pos + 1;
    while (i < src.length && src[i] !== '"') {
      if (src[i] === "\n") this.fail(line, column, "string literal not terminated");
      if (src[i] === "\\") {
        const esc = src[i + 1];
        const simple: Record<string, string> = { n: "\n", t: "\t", r: "\r", "\\": "\\", '"': '"', a: "\x07", b: "\b", f: "\f", v: "\v" };
        if (esc !== undefined && esc in simple) {
          out += simple[esc];
          i += 2;
          continue;
        }
        const hex = /^(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8})/.exec(src.slice(i + 1));
        if (hex) {
          out += String.fromCodePoint(parseInt(hex[0].slice(1), 16));
          i += 1 + hex[0].length;
          continue;
        }
        const octal = /^[0-7]{3}/.exec(src.slice(i + 1));
        if (octal) {
          const value = parseInt(octal[0], 8);
          if (value > 255) this.fail(line, column + (i - this.pos), "octal escape value > 255");
          out += String.fromCharCode(value);
          i += 4;
          continue;
        }
        this.fail(line, column + (i - this.pos), "unknown escape sequence");
      }
      out += src[i];
      i++;
    }
    if (i >= src.length) this.fail(line, column, "string literal not terminated");
    this.pos = i + 1;
    return out;
  }
}

/** Strip comment markers and directives the way Go's doc text does. */
function commentGroupText(group: Comment[]): string {
  const lines: string[] = [];
  for (const c of group) {
    if (c.text.startsWith("//")) {
      const body = c.text.slice(2);
      if (DIRECTIVE.test(body)) continue;
      lines.push(body.startsWith(" ") ? body.slice(1) : body);
    } else {
      for (const l of c.text.slice(2, -2).split("\n")) lines.push(l.replace(/\r$/, ""));
    }
  }
  const trimmed = lines.map((l) => l.replace(/\s+$/, ""));
  while (trimmed.length > 0 && trimmed[0] === "") trimmed.shift();
  while (trimmed.length > 0 && trimmed[trimmed.length - 1] === "") trimmed.pop();
  return trimmed.length === 0 ? "" : trimmed.join("\n") + "\n";
}

/** The comment group ending on the line right before `line`, if any. */
function leadComment(comments: Comment[], line: number): string | null {
  let end = comments.length;
  while (end > 0 && comments[end - 1].endLine >= line) end--;
  if (end === 0 || comments[end - 1].endLine !== line - 1) return null;
  let start = end - 1;
  while (start > 0 && comments[start].startLine - comments[start - 1].endLine <= 1) start--;
  return commentGroupText(comments.slice(start, end));
}

/** Parse the package clause and import declarations of one Go file. */
export function parseGoHeader(source: string, fileName: string): GoFileHeader {
  const scanner: Scanner = new Scanner(source, fileName);

  let tok = scanner.next();
  if (tok.kind !== "ident" || tok.value !== "package") {
    scanner.fail(tok.line, tok.column, `expected 'package', found ${describe(tok)}`);
  }
  const doc = leadComment(scanner.comments, tok.line);

  const name = scanner.next();
  if (name.kind !== "ident") {
    scanner.fail(name.line, name.column, `expected package name, found ${describe(name)}`);
  }
  if (name.value === "_") scanner.fail(name.line, name.column, "invalid package name _");

  const imports: GoImport[] = [];
  tok = skipSemicolons(scanner, scanner.next());

  while (tok.kind === "ident" && tok.value === "import") {
    tok = scanner.next();
    if (tok.kind === "punct" && tok.value === "(") {
      tok = skipSemicolons(scanner, scanner.next());
      while (!(tok.kind === "punct" && tok.value === ")")) {
        if (tok.kind === "eof") scanner.fail(tok.line, tok.column, "expected ')', found EOF");
        tok = importSpec(scanner, tok, imports);
        tok = skipSemicolons(scanner, tok);
      }
      tok = scanner.next();
    } else {
      tok = importSpec(scanner, tok, imports);
    }
    tok = skipSemicolons(scanner, tok);
  }

  return { fileName, packageName: name.value, doc, imports };
}

function importSpec(scanner: Scanner, tok: Token, out: GoImport[]): Token {
  let name: string | null = null;
  if (tok.kind === "ident" || (tok.kind === "punct" && tok.value === ".")) {
    name = tok.value;
    tok = scanner.next();
  }
  if (tok.kind !== "string") {
    scanner.fail(tok.line, tok.column, `missing import path; found ${describe(tok)}`);
  }
  if (tok.value === "") scanner.fail(tok.line, tok.column, "invalid import path (empty string)");
  out.push({ path: tok.value, name, line: tok.line });
  return scanner.next();
}

function skipSemicolons(scanner: Scanner, tok: Token): Token {
  while (tok.kind === "punct" && tok.value === ";") tok = scanner.next();
  return tok;
}

function describe(tok: Token): string {
  if (tok.kind === "eof") return "EOF";
  if (tok.kind === "string") return JSON.stringify(tok.value);
  return `'${tok.value}'`;
}
