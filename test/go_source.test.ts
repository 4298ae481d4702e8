import { describe, expect, it } from "vitest";
import { GoSyntaxError, parseGoHeader } from "../src/analyzer/go-source.js";

describe("parseGoHeader", () => {
  it("reads doc comment, package name and grouped imports", () => {
    const src = [
      "// Command orders handles order events.",
      "//",
      "// It runs as the orders Lambda.",
      "package main",
      "",
      "import (",
      '\t"context"',
      '\t"github.com/aws/aws-lambda-go/lambda"',
      '\t_ "embed"',
      '\tf "fmt"',
      ")",
      "",
      "func main() { lambda.Start(handler) }",
    ].join("\n");

    const header = parseGoHeader(src, "main.go");
    expect(header.packageName).toBe("main");
    expect(header.doc).toBe("Command orders handles order events.\n\nIt runs as the orders Lambda.\n");
    expect(header.imports).toEqual([
      { path: "context", name: null, line: 7 },
      { path: "github.com/aws/aws-lambda-go/lambda", name: null, line: 8 },
      { path: "embed", name: "_", line: 9 },
      { path: "fmt", name: "f", line: 10 },
    ]);
  });

  it("reads single-line imports, dot imports and raw string paths", () => {
    const src = 'package main\n\nimport "fmt"\nimport . "strings"\nimport `os`\n\nvar x = 1\n';
    const header = parseGoHeader(src, "a.go");
    expect(header.imports.map((i) => [i.name, i.path])).toEqual([
      [null, "fmt"],
      [".", "strings"],
      [null, "os"],
    ]);
  });

  it("accepts explicit semicolons", () => {
    const header = parseGoHeader('package main; import "fmt"; import "os"', "a.go");
    expect(header.imports.map((i) => i.path)).toEqual(["fmt", "os"]);
  });

  it("has no doc when there is no comment", () => {
    expect(parseGoHeader("package main\n", "a.go").doc).toBeNull();
  });

  it("has no doc when a blank line separates the comment from the package clause", () => {
    expect(parseGoHeader("// orders\n\npackage main\n", "a.go").doc).toBeNull();
  });

  it("drops build directives from the doc text", () => {
    const header = parseGoHeader("//go:build linux\n// Command orders.\npackage main\n", "a.go");
    expect(header.doc).toBe("Command orders.\n");
  });

  it("does not take a directive group separated by a blank line as doc", () => {
    const header = parseGoHeader("//go:build linux\n\n// Command orders.\npackage main\n", "a.go");
    expect(header.doc).toBe("Command orders.\n");
  });

  it("reads block comment docs", () => {
    const header = parseGoHeader("/*\nService orders.\n*/\npackage main\n", "a.go");
    expect(header.doc).toBe("Service orders.\n");
  });

  it("ignores comments inside the import block", () => {
    const src = 'package main\n\nimport (\n\t// logging\n\t"log" /* std */\n)\n';
    expect(parseGoHeader(src, "a.go").imports.map((i) => i.path)).toEqual(["log"]);
  });

  it("decodes escapes in interpreted import paths", () => {
    const header = parseGoHeader('package main\nimport "git\\x68ub.com/a/b"\n', "a.go");
    expect(header.imports[0].path).toBe("github.com/a/b");
  });

  it("decodes octal escapes", () => {
    const header = parseGoHeader('package main\nimport "git\\150ub.com/a/b"\n', "a.go");
    expect(header.imports[0].path).toBe("github.com/a/b");
  });

  it("rejects octal escapes above one byte", () => {
    expect(() => parseGoHeader('package main\nimport "a\\400"\n', "x.go")).toThrow(
      "x.go:2:10: octal escape value > 255",
    );
  });

  it("stops reading at the first non-import declaration", () => {
    const src = 'package main\nimport "fmt"\nfunc main() { import }\n';
    expect(parseGoHeader(src, "a.go").imports.map((i) => i.path)).toEqual(["fmt"]);
  });

  it("reports a missing package clause with position", () => {
    expect(() => parseGoHeader("func main() {}\n", "main.go")).toThrow(
      "main.go:1:1: expected 'package', found 'func'",
    );
  });

  it("reports an import without a path", () => {
    expect(() => parseGoHeader("package main\nimport (\n\tfmt\n)\n", "x.go")).toThrow(
      "x.go:4:1: missing import path; found ')'",
    );
  });

  it("reports an unterminated import path", () => {
    expect(() => parseGoHeader('package main\nimport "fmt', "x.go")).toThrow(
      "x.go:2:8: string literal not terminated",
    );
  });

  it("reports an unterminated import block", () => {
    expect(() => parseGoHeader('package main\nimport (\n\t"fmt"\n', "x.go")).toThrow(GoSyntaxError);
  });

  it("reports an empty file", () => {
    expect(() => parseGoHeader("", "empty.go")).toThrow("empty.go:1:1: expected 'package', found EOF");
  });
});
