/**
 * Idempotent Resource Ensurer: Types
 */

import type { ProvisioningResult, ResourceSpec } from "../types.js";

/**
 * Adapter between the ensurer and one concrete resource. `get` must resolve
 * to `null` for not-found and throw for every other failure.
 */
export type ResourceDriver<T> = {
  spec: ResourceSpec;
  get: () => Promise<T | null>;
  create: () => Promise<T>;
  describe: (resource: T) => ResourceIdentity;
  /** Readiness signal polled after create, bounded by the readiness timeout. */
  isReady?: (resource: T) => Promise<boolean>;
  /** Fixed settle interval for resources with no readiness signal. */
  settleMs?: number;
  /**
   * Create races with propagation of a dependency (subnet after VNet, access
   * policy after a new identity): retry with a fixed backoff until the new
   * resource is readable.
   */
  propagationSensitive?: boolean;
};

export type ResourceIdentity = {
  resourceId: string;
  attributes?: Record<string, string | undefined>;
};

export type EnsureOutcome<T> = ProvisioningResult & {
  resource: T;
};
