/**
 * Idempotent Resource Ensurer
 *
 * existence check → conditional create → readiness wait. Existing resources
 * are returned as found; configuration drift is not reconciled.
 */

import { recordResourceChange } from "../diagnostics.js";
import { ProvisioningError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import { waitUntilReady } from "../progress.js";
import { sleep, withPropagationRetry } from "../retry.js";
import type { PropagationRetryOptions, ReadinessOptions, ResourceSpec } from "../types.js";
import type { EnsureOutcome, ResourceDriver, ResourceIdentity } from "./types.js";

export type ResourceEnsurerOptions = {
  propagationRetry?: PropagationRetryOptions;
  readiness?: ReadinessOptions;
  logger?: Logger;
};

export function specKey(spec: Pick<ResourceSpec, "kind" | "name" | "resourceGroup">): string {
  return `${spec.kind}:${spec.resourceGroup}/${spec.name}`.toLowerCase();
}

export class ResourceEnsurer {
  private options: ResourceEnsurerOptions;
  private log: Logger;

  constructor(options: ResourceEnsurerOptions = {}) {
    this.options = options;
    this.log = options.logger ?? getLogger("ensurer");
  }

  async ensure<T>(driver: ResourceDriver<T>): Promise<EnsureOutcome<T>> {
    const { spec } = driver;
    const log = this.log.withContext({ resource: specKey(spec) });

    const existing = await driver.get();
    if (existing !== null) {
      log.debug(`Found existing ${spec.kind} "${spec.name}"`);
      return toOutcome(existing, driver.describe(existing), false);
    }

    log.info(`Creating ${spec.kind} "${spec.name}"`, { region: spec.region });
    const created = driver.propagationSensitive
      ? await this.createAndConfirm(driver, log)
      : await driver.create();
    recordResourceChange(spec.kind, spec.name, "create", spec.resourceGroup);

    if (driver.isReady) {
      const isReady = driver.isReady;
      await waitUntilReady(
        { kind: spec.kind, name: spec.name, operation: "create" },
        () => isReady(created),
        this.options.readiness,
      );
    } else if (driver.settleMs) {
      await sleep(driver.settleMs);
    }

    log.info(`Created ${spec.kind} "${spec.name}"`);
    return toOutcome(created, driver.describe(created), true);
  }

  /**
   * Create, then read back until the new resource is visible. A read that
   * still reports not-found counts as a propagation failure.
   */
  private async createAndConfirm<T>(driver: ResourceDriver<T>, log: Logger): Promise<T> {
    const { spec } = driver;
    return withPropagationRetry(
      { kind: spec.kind, name: spec.name, operation: "create" },
      async () => {
        await driver.create();
        const visible = await driver.get();
        if (visible === null) {
          throw new ProvisioningError(
            "PROPAGATION",
            `${spec.kind} "${spec.name}" is not visible after create`,
            { resourceKind: spec.kind, resourceName: spec.name, operation: "create" },
          );
        }
        return visible;
      },
      this.options.propagationRetry,
      (attempt, error) =>
        log.warn(`Propagation delay on ${spec.kind} "${spec.name}" (attempt ${attempt}), retrying`, {
          error: error instanceof Error ? error.message : String(error),
        }),
    );
  }
}

function toOutcome<T>(resource: T, identity: ResourceIdentity, created: boolean): EnsureOutcome<T> {
  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(identity.attributes ?? {})) {
    if (value !== undefined) attributes[key] = value;
  }
  return { resourceId: identity.resourceId, created, attributes, resource };
}
