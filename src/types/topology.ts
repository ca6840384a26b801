/** Service topology: the declarative description the pipeline releases. */
export type ServiceTier = "database" | "application";

/** exclusive-writer → ReadWriteOnce, shared-writer → ReadWriteMany. */
export type AccessMode = "exclusive-writer" | "shared-writer";

export type ResourcePair = {
  cpu: string;
  memory: string;
};

export type ResourceBounds = {
  requests: ResourcePair;
  limits: ResourcePair;
};

export type StorageSpec = {
  size: string;
  accessMode: AccessMode;
  mountPath?: string;
};

export type ProbeTiming = {
  initialDelaySeconds: number;
  periodSeconds: number;
  timeoutSeconds: number;
  failureThreshold: number;
};

export type ProbeSettings = {
  liveness: ProbeTiming;
  readiness: ProbeTiming;
};

export type ProbeOverrides = {
  liveness?: Partial<ProbeTiming>;
  readiness?: Partial<ProbeTiming>;
};

export type ServiceSpec = {
  name: string;
  tier: ServiceTier;
  image: string;
  replicas: number;
  port?: number;
  resources: ResourceBounds;
  storage?: StorageSpec;
  secrets: string[];
  dependsOn?: string[];
  environment?: Record<string, string>;
  probes?: ProbeOverrides;
  backup?: { schedule: string };
  /** Services with required=false are started but do not gate health. */
  required?: boolean;
};

export type ServiceTopology = {
  name: string;
  services: ServiceSpec[];
};
