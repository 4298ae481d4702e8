import type { BuildTarget } from "../types/build.js";
import type { CompilerArch, FunctionDescriptor, RuntimeFamily } from "../types/function.js";

export const ZIP_PACKAGE_TYPE = "Zip";
export const DEFAULT_BOOTSTRAP_NAME = "bootstrap";

const LEGACY_RUNTIMES = new Set(["go1.x"]);
const CUSTOM_RUNTIMES = new Set(["provided", "provided.al2", "provided.al2023"]);

const ARCH_BY_PLATFORM: Record<string, CompilerArch> = {
  x86_64: "amd64",
  arm64: "arm64",
};

export class ResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResolutionError";
  }
}

export function runtimeFamily(runtime: string): RuntimeFamily {
  if (LEGACY_RUNTIMES.has(runtime)) return "legacy-managed";
  if (CUSTOM_RUNTIMES.has(runtime)) return "custom-provided";
  return "unsupported";
}

export function compilerArch(architecture: string): CompilerArch | null {
  return Object.hasOwn(ARCH_BY_PLATFORM, architecture) ? ARCH_BY_PLATFORM[architecture] : null;
}

/**
 * Decide the binary name and GOARCH for a function. Pure; throws
 * ResolutionError for every combination the platform cannot invoke.
 */
export function resolveBuildTarget(
  descriptor: FunctionDescriptor,
  opts: { bootstrapName?: string } = {},
): BuildTarget {
  if (descriptor.packageType !== ZIP_PACKAGE_TYPE) {
    throw new ResolutionError(
      `unsupported package type ${JSON.stringify(descriptor.packageType)}, want ${JSON.stringify(ZIP_PACKAGE_TYPE)}`,
    );
  }
  if (descriptor.architectures.length !== 1) {
    throw new ResolutionError(
      `expected single supported architecture, got ${descriptor.architectures.length}: [${descriptor.architectures.join(", ")}]`,
    );
  }

  const architecture = descriptor.architectures[0];
  const arch = compilerArch(architecture);

  switch (runtimeFamily(descriptor.runtime)) {
    case "legacy-managed":
      if (arch === null) throw unsupportedArchitecture(architecture);
      if (arch !== "amd64") {
        throw new ResolutionError(`runtime ${descriptor.runtime} does not support architecture ${architecture}`);
      }
      if (descriptor.handlerName === "") {
        throw new ResolutionError("lambda configuration has empty handler name");
      }
      return { binaryFilename: descriptor.handlerName, compilerArch: arch };
    case "custom-provided":
      if (arch === null) throw unsupportedArchitecture(architecture);
      return { binaryFilename: opts.bootstrapName ?? DEFAULT_BOOTSTRAP_NAME, compilerArch: arch };
    case "unsupported":
      throw new ResolutionError(
        `lambda configured with unsupported runtime ${JSON.stringify(descriptor.runtime)}, want one of ${[...LEGACY_RUNTIMES, ...CUSTOM_RUNTIMES].join(", ")}`,
      );
  }
}

function unsupportedArchitecture(architecture: string): ResolutionError {
  return new ResolutionError(
    `unsupported architecture ${JSON.stringify(architecture)}, want one of ${Object.keys(ARCH_BY_PLATFORM).join(", ")}`,
  );
}
