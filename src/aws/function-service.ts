import {
  Lambda,
  type FunctionConfiguration,
  type GetFunctionConfigurationCommandInput,
  type GetFunctionConfigurationCommandOutput,
  type UpdateFunctionCodeCommandInput,
  type UpdateFunctionCodeCommandOutput,
} from "@aws-sdk/client-lambda";
import { errorMessage, isCancellation } from "../core/errors.js";
import type { AwsConfig } from "../types/config.js";
import type { FunctionDescriptor, UpdateCodeInput, UpdateCodeResult } from "../types/function.js";

/** Architecture Lambda assumes when a configuration does not list one. */
export const DEFAULT_ARCHITECTURE = "x86_64";

/** Remote configuration and code API of the function platform. */
export interface FunctionService {
  getFunction(name: string, qualifier: string, signal?: AbortSignal): Promise<FunctionDescriptor>;
  updateCode(input: UpdateCodeInput, signal?: AbortSignal): Promise<UpdateCodeResult>;
}

type CallOptions = { abortSignal?: AbortSignal };

/** The two Lambda operations this tool calls; satisfied by the SDK's `Lambda` client. */
export interface LambdaApi {
  getFunctionConfiguration(
    input: GetFunctionConfigurationCommandInput,
    options?: CallOptions,
  ): Promise<GetFunctionConfigurationCommandOutput>;
  updateFunctionCode(input: UpdateFunctionCodeCommandInput, options?: CallOptions): Promise<UpdateFunctionCodeCommandOutput>;
}

/** Failure of one remote operation; the message starts with the operation name. */
export class RemoteError extends Error {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(`${operation}: ${errorMessage(cause)}`, { cause });
    this.name = "RemoteError";
  }
}

export function toDescriptor(name: string, qualifier: string, cfg: FunctionConfiguration): FunctionDescriptor {
  return {
    name,
    packageType: cfg.PackageType ?? "Zip",
    runtime: cfg.Runtime ?? "",
    architectures: cfg.Architectures && cfg.Architectures.length > 0 ? [...cfg.Architectures] : [DEFAULT_ARCHITECTURE],
    handlerName: cfg.Handler ?? "",
    revisionId: cfg.RevisionId,
    qualifier,
  };
}

export function createLambdaApi(aws: AwsConfig = {}): LambdaApi {
  return new Lambda({
    ...(aws.region ? { region: aws.region } : {}),
    ...(aws.endpoint_url ? { endpoint: aws.endpoint_url } : {}),
  });
}

/**
 * FunctionService over the AWS SDK. Region and credentials come from the
 * standard AWS chain unless the config names a region or endpoint.
 */
export class LambdaFunctionService implements FunctionService {
  constructor(private readonly api: LambdaApi) {}

  async getFunction(name: string, qualifier: string, signal?: AbortSignal): Promise<FunctionDescriptor> {
    try {
      const out = await this.api.getFunctionConfiguration(
        { FunctionName: name, Qualifier: qualifier },
        { abortSignal: signal },
      );
      return toDescriptor(name, qualifier, out);
    } catch (e) {
      if (isCancellation(e)) throw e;
      throw new RemoteError("GetFunctionConfiguration", e);
    }
  }

  async updateCode(input: UpdateCodeInput, signal?: AbortSignal): Promise<UpdateCodeResult> {
    try {
      const out = await this.api.updateFunctionCode(
        {
          FunctionName: input.name,
          RevisionId: input.revisionId,
          ZipFile: input.zipFile,
          Publish: input.publish,
        },
        { abortSignal: signal },
      );
      return { version: out.Version, revisionId: out.RevisionId, codeSha256: out.CodeSha256 };
    } catch (e) {
      if (isCancellation(e)) throw e;
      throw new RemoteError("UpdateFunctionCode", e);
    }
  }
}
