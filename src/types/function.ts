/**
 * Function configuration as read from the remote service.
 * Raw values are kept as the service returns them; the resolver classifies them.
 */
export type FunctionDescriptor = {
  name: string;
  /** "Zip" or "Image". */
  packageType: string;
  /** Runtime id, e.g. "go1.x" or "provided.al2023". */
  runtime: string;
  /** Instruction set ids, e.g. ["x86_64"]. */
  architectures: string[];
  handlerName: string;
  revisionId: string | undefined;
  qualifier: string;
};

export type RuntimeFamily = "legacy-managed" | "custom-provided" | "unsupported";

export type CompilerArch = "amd64" | "arm64";

export type UpdateCodeInput = {
  name: string;
  revisionId: string | undefined;
  zipFile: Uint8Array;
  publish: boolean;
};

export type UpdateCodeResult = {
  version: string | undefined;
  revisionId: string | undefined;
  codeSha256: string | undefined;
};
