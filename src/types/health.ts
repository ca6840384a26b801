export type HealthVerdict =
  | { status: "healthy" }
  | { status: "unhealthy"; reason: string }
  | { status: "timeout" };

export type HealthPolicy = {
  pollIntervalMs: number;
  maxAttempts: number;
  logTailLines: number;
};

export type ServiceDiagnostics = {
  service: string;
  verdict: HealthVerdict;
  logTail: string;
};

export type HealthReport = {
  status: "healthy" | "timeout";
  attempts: number;
  services: Record<string, HealthVerdict>;
  diagnostics: ServiceDiagnostics[];
};
