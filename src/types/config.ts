/** Layered configuration: base.yaml, an optional env layer, then LAMBDA_PUBLISH_* variables. */
export type TimeoutsConfig = {
  fetch_seconds: number;
  update_seconds: number;
};

export type CompilerConfig = {
  command: string;
  env: Record<string, string>;
};

export type AwsConfig = {
  region?: string;
  endpoint_url?: string;
};

export type PublishConfig = {
  schema_version: string;
  qualifier: string;
  bootstrap_name: string;
  framework_import: string;
  exclude: string[];
  timeouts: TimeoutsConfig;
  compiler: CompilerConfig;
  aws: AwsConfig;
};
