import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { PublishConfig } from "../src/types/config.js";
import type { FunctionDescriptor } from "../src/types/function.js";

export const LAMBDA_IMPORT = "github.com/aws/aws-lambda-go/lambda";

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFiles(dir: string, files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), content, "utf8");
  }
}

/** A main package that passes every strict check for `name`. */
export function lambdaMain(name: string): string {
  return [
    `// Command ${name} handles order events.`,
    "package main",
    "",
    "import (",
    '\t"context"',
    "",
    `\t"${LAMBDA_IMPORT}"`,
    ")",
    "",
    "func handler(ctx context.Context) error { return nil }",
    "",
    "func main() { lambda.Start(handler) }",
    "",
  ].join("\n");
}

export function makeConfig(overrides: Partial<PublishConfig> = {}): PublishConfig {
  return {
    schema_version: "1.0.0",
    qualifier: "$LATEST",
    bootstrap_name: "bootstrap",
    framework_import: LAMBDA_IMPORT,
    exclude: ["*_test.go"],
    timeouts: { fetch_seconds: 30, update_seconds: 300 },
    compiler: { command: "go", env: {} },
    aws: {},
    ...overrides,
  };
}

export function descriptor(overrides: Partial<FunctionDescriptor> = {}): FunctionDescriptor {
  return {
    name: "orders",
    packageType: "Zip",
    runtime: "provided.al2023",
    architectures: ["x86_64"],
    handlerName: "",
    revisionId: "rev-1",
    qualifier: "$LATEST",
    ...overrides,
  };
}
