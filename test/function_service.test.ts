import { describe, expect, it } from "vitest";
import type {
  GetFunctionConfigurationCommandInput,
  UpdateFunctionCodeCommandInput,
} from "@aws-sdk/client-lambda";
import {
  createLambdaApi,
  LambdaFunctionService,
  RemoteError,
  toDescriptor,
  type LambdaApi,
} from "../src/aws/function-service.js";

function fakeApi(overrides: Partial<LambdaApi> = {}) {
  const reads: GetFunctionConfigurationCommandInput[] = [];
  const writes: UpdateFunctionCodeCommandInput[] = [];
  const signals: Array<AbortSignal | undefined> = [];
  const api: LambdaApi = {
    async getFunctionConfiguration(input, options) {
      reads.push(input);
      signals.push(options?.abortSignal);
      return {
        $metadata: {},
        FunctionName: "orders",
        PackageType: "Zip",
        Runtime: "provided.al2023",
        Architectures: ["arm64"],
        Handler: "bootstrap",
        RevisionId: "rev-1",
      };
    },
    async updateFunctionCode(input, options) {
      writes.push(input);
      signals.push(options?.abortSignal);
      return { $metadata: {}, Version: "7", RevisionId: "rev-2", CodeSha256: "c2hh" };
    },
    ...overrides,
  };
  return { api, reads, writes, signals };
}

describe("toDescriptor", () => {
  it("keeps the raw runtime, package type and architectures", () => {
    const d = toDescriptor("arn:aws:lambda:us-east-1:123456789012:function:orders", "$LATEST", {
      PackageType: "Image",
      Runtime: "go1.x",
      Architectures: ["x86_64"],
      Handler: "main",
      RevisionId: "rev-9",
    });
    expect(d).toEqual({
      name: "arn:aws:lambda:us-east-1:123456789012:function:orders",
      packageType: "Image",
      runtime: "go1.x",
      architectures: ["x86_64"],
      handlerName: "main",
      revisionId: "rev-9",
      qualifier: "$LATEST",
    });
  });

  it("fills in platform defaults for omitted fields", () => {
    const d = toDescriptor("orders", "$LATEST", {});
    expect(d.packageType).toBe("Zip");
    expect(d.architectures).toEqual(["x86_64"]);
    expect(d.runtime).toBe("");
    expect(d.handlerName).toBe("");
    expect(d.revisionId).toBeUndefined();
  });
});

describe("LambdaFunctionService", () => {
  it("reads the configuration of the requested qualifier", async () => {
    const { api, reads, signals } = fakeApi();
    const controller = new AbortController();
    const service = new LambdaFunctionService(api);

    const d = await service.getFunction("orders", "$LATEST", controller.signal);

    expect(reads).toEqual([{ FunctionName: "orders", Qualifier: "$LATEST" }]);
    expect(signals[0]).toBe(controller.signal);
    expect(d).toMatchObject({ runtime: "provided.al2023", architectures: ["arm64"], revisionId: "rev-1" });
  });

  it("publishes code guarded by the revision id", async () => {
    const { api, writes } = fakeApi();
    const service = new LambdaFunctionService(api);
    const zip = new Uint8Array([80, 75, 5, 6]);

    const res = await service.updateCode({ name: "orders", revisionId: "rev-1", zipFile: zip, publish: true });

    expect(writes).toEqual([{ FunctionName: "orders", RevisionId: "rev-1", ZipFile: zip, Publish: true }]);
    expect(res).toEqual({ version: "7", revisionId: "rev-2", codeSha256: "c2hh" });
  });

  it("names the operation on read failures", async () => {
    const { api } = fakeApi({
      getFunctionConfiguration: async () => {
        throw new Error("Function not found: orders");
      },
    });
    const service = new LambdaFunctionService(api);

    const err = await service.getFunction("orders", "$LATEST").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteError);
    expect(err).toMatchObject({
      operation: "GetFunctionConfiguration",
      message: "GetFunctionConfiguration: Function not found: orders",
    });
  });

  it("names the operation on write failures", async () => {
    const { api } = fakeApi({
      updateFunctionCode: async () => {
        throw new Error("The RevisionId provided does not match the latest RevisionId");
      },
    });
    const service = new LambdaFunctionService(api);

    await expect(
      service.updateCode({ name: "orders", revisionId: "stale", zipFile: new Uint8Array(0), publish: true }),
    ).rejects.toThrow("UpdateFunctionCode: The RevisionId provided does not match the latest RevisionId");
  });

  it("lets aborts through unwrapped", async () => {
    const abort = new Error("Request aborted");
    abort.name = "AbortError";
    const { api } = fakeApi({
      getFunctionConfiguration: async () => {
        throw abort;
      },
    });
    await expect(new LambdaFunctionService(api).getFunction("orders", "$LATEST")).rejects.toBe(abort);
  });
});

describe("createLambdaApi", () => {
  it("builds an SDK client exposing both operations", () => {
    const api = createLambdaApi({ region: "eu-west-1", endpoint_url: "http://localhost:4566" });
    expect(typeof api.getFunctionConfiguration).toBe("function");
    expect(typeof api.updateFunctionCode).toBe("function");
  });
});
