/** Layered configuration: base.yaml, then <env>.yaml, then RELEASECTL_* variables. */
export type HealthConfig = {
  poll_interval_ms: number;
  max_attempts: number;
  log_tail_lines: number;
  project_prefix: string;
};

export type RenderConfig = {
  templates_dir: string;
  namespace: string;
  app: string;
  secret_name: string;
};

export type PackageConfig = {
  out_dir: string;
  root_dir: string;
  archive_name: string;
};

export type PublishConfig = {
  host: string;
  port: number;
  remote_dir: string;
  secure: boolean;
  /** Deliberate trust decision; false accepts any server certificate. */
  verify_certificate: boolean;
  user_env: string;
  password_env: string;
};

export type SecretsConfig =
  | { source: "env"; env_prefix?: string }
  | { source: "file"; file: string };

export type ReleaseConfig = {
  schema_version: string;
  runs_dir: string;
  topology: string;
  health: HealthConfig;
  render: RenderConfig;
  package: PackageConfig;
  publish: PublishConfig;
  secrets: SecretsConfig;
};
