import type { SecretBundle } from "../types/secrets.js";
import type { ServiceTopology } from "../types/topology.js";

/** What the runtime reports for one service on one poll. */
export type ServiceState = {
  service: string;
  /** running | exited | restarting | created | dead | paused | missing */
  state: string;
  /** Container healthcheck result when the image defines one. */
  health?: "healthy" | "unhealthy" | "starting";
  exitCode?: number;
};

/** A started topology. Owned by exactly one health gate invocation. */
export interface TopologyHandle {
  readonly id: string;
  status(service: string): Promise<ServiceState>;
  logs(service: string, tail: number): Promise<string>;
  /** Stop and remove everything started. Safe to call more than once. */
  teardown(): Promise<void>;
}

export interface ServiceRuntime {
  /**
   * Start every service of the topology. Secrets are handed to the services as
   * files. If start fails after creating anything, the returned promise rejects
   * with a StartError carrying the partial handle so it can still be torn down.
   */
  start(topology: ServiceTopology, secrets: SecretBundle): Promise<TopologyHandle>;
}

export class StartError extends Error {
  constructor(
    message: string,
    readonly handle: TopologyHandle,
    options?: { cause?: unknown }
  ) {
    super(message);
    this.name = "StartError";
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** Wrap a handle so teardown runs at most once however often it is called. */
export function onceTeardown(handle: TopologyHandle): TopologyHandle & { readonly tornDown: boolean } {
  let pending: Promise<void> | null = null;
  return {
    id: handle.id,
    status: (service) => handle.status(service),
    logs: (service, tail) => handle.logs(service, tail),
    teardown: () => {
      pending ??= handle.teardown();
      return pending;
    },
    get tornDown() {
      return pending !== null;
    },
  };
}
