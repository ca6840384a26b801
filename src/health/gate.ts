import { setTimeout as delay } from "node:timers/promises";
import { errorMessage } from "../core/errors.js";
import { redactSensitiveInfo } from "../secrets/redact.js";
import type { HealthPolicy, HealthReport, HealthVerdict, ServiceDiagnostics } from "../types/health.js";
import type { SecretBundle } from "../types/secrets.js";
import type { ServiceTopology } from "../types/topology.js";
import { StartError, onceTeardown, type ServiceRuntime, type ServiceState, type TopologyHandle } from "./runtime.js";

export const DEFAULT_HEALTH_POLICY: HealthPolicy = {
  pollIntervalMs: 2000,
  maxAttempts: 30,
  logTailLines: 50,
};

/** Polling(attempt, results) → Healthy | Timeout */
export type PollState =
  | { phase: "polling"; attempt: number; observed: ServiceState[] }
  | { phase: "healthy"; attempt: number; observed: ServiceState[] }
  | { phase: "timeout"; attempt: number; observed: ServiceState[] };

export function initialPollState(policy: HealthPolicy): PollState {
  if (policy.maxAttempts <= 0) return { phase: "timeout", attempt: 0, observed: [] };
  return { phase: "polling", attempt: 0, observed: [] };
}

export function isHealthy(s: ServiceState): boolean {
  return s.state === "running" && (s.health === undefined || s.health === "healthy");
}

/** One poll iteration has completed; decide where the machine goes next. */
export function advancePoll(
  state: Extract<PollState, { phase: "polling" }>,
  observed: ServiceState[],
  policy: HealthPolicy
): PollState {
  const attempt = state.attempt + 1;
  if (observed.every(isHealthy)) return { phase: "healthy", attempt, observed };
  if (attempt >= policy.maxAttempts) return { phase: "timeout", attempt, observed };
  return { phase: "polling", attempt, observed };
}

/** Final verdict for a service given the last thing observed about it. */
export function verdictFor(s: ServiceState | undefined): HealthVerdict {
  if (s && isHealthy(s)) return { status: "healthy" };
  if (s && (s.state === "exited" || s.state === "dead")) {
    return { status: "unhealthy", reason: s.exitCode === undefined ? s.state : `${s.state} (code ${s.exitCode})` };
  }
  if (s?.health === "unhealthy") return { status: "unhealthy", reason: "container healthcheck failing" };
  return { status: "timeout" };
}

/**
 * Scoped acquisition of a running topology: start, run `body`, tear down on
 * every exit path. A start that fails half way still gets its partial handle
 * torn down. When teardown fails while another error is propagating, both are
 * thrown together as an AggregateError led by the original.
 */
export async function withTopology<T>(
  runtime: ServiceRuntime,
  topology: ServiceTopology,
  secrets: SecretBundle,
  body: (handle: TopologyHandle) => Promise<T>
): Promise<T> {
  let handle: TopologyHandle | null = null;
  let failure: { error: unknown } | null = null;
  try {
    try {
      handle = onceTeardown(await runtime.start(topology, secrets));
    } catch (e) {
      if (e instanceof StartError) handle = onceTeardown(e.handle);
      throw e;
    }
    return await body(handle);
  } catch (e) {
    failure = { error: e };
    throw e;
  } finally {
    if (handle) await teardownAfter(handle, failure);
  }
}

async function teardownAfter(handle: TopologyHandle, failure: { error: unknown } | null): Promise<void> {
  try {
    await handle.teardown();
  } catch (teardownError) {
    if (!failure) throw teardownError;
    throw new AggregateError(
      [failure.error, teardownError],
      `${errorMessage(failure.error)} (teardown also failed: ${errorMessage(teardownError)})`
    );
  }
}

export type AwaitHealthyOptions = {
  sleep?: (ms: number) => Promise<void>;
  onPoll?: (state: PollState) => void;
};

async function collectDiagnostics(
  handle: TopologyHandle,
  services: Record<string, HealthVerdict>,
  policy: HealthPolicy,
  secrets: SecretBundle
): Promise<ServiceDiagnostics[]> {
  const unhealthy = Object.entries(services).filter(([, v]) => v.status !== "healthy");
  return Promise.all(
    unhealthy.map(async ([service, verdict]) => {
      let logTail: string;
      try {
        logTail = await handle.logs(service, policy.logTailLines);
      } catch (e) {
        logTail = `(logs unavailable: ${errorMessage(e)})`;
      }
      return { service, verdict, logTail: redactSensitiveInfo(logTail, secrets) };
    })
  );
}

/**
 * Bring the topology up and poll until every required service is running on
 * the same iteration, or the attempt budget is spent. Everything started is
 * torn down before this returns or throws.
 */
export async function awaitHealthy(
  runtime: ServiceRuntime,
  topology: ServiceTopology,
  secrets: SecretBundle,
  policy: HealthPolicy = DEFAULT_HEALTH_POLICY,
  opts: AwaitHealthyOptions = {}
): Promise<HealthReport> {
  const sleep = opts.sleep ?? ((ms: number) => delay(ms));
  const required = topology.services.filter((s) => s.required !== false).map((s) => s.name);

  return withTopology(runtime, topology, secrets, async (handle) => {
    let state = initialPollState(policy);

    while (state.phase === "polling") {
      if (state.attempt > 0) await sleep(policy.pollIntervalMs);
      const observed = await Promise.all(required.map((name) => handle.status(name)));
      state = advancePoll(state, observed, policy);
      opts.onPoll?.(state);
    }

    const last = new Map(state.observed.map((s) => [s.service, s]));
    const services: Record<string, HealthVerdict> = {};
    for (const name of required) services[name] = verdictFor(last.get(name));

    if (state.phase === "healthy") {
      return { status: "healthy", attempts: state.attempt, services, diagnostics: [] };
    }

    return {
      status: "timeout",
      attempts: state.attempt,
      services,
      diagnostics: await collectDiagnostics(handle, services, policy, secrets),
    };
  });
}
