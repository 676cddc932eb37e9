/**
 * App Service plan configuration.
 */

import { describeResource } from "../arm/resources.js";
import type { PeerContext, ResourceBuilder, ResourceDescriptor } from "../core/builder.js";
import { ConfigurationError } from "../core/errors.js";
import type { Location, ResourceName } from "../core/types.js";
import { resourceName } from "../core/types.js";
import { Skus } from "./server-farm.js";
import type { OperatingSystem, ServerFarmResource, Sku, WorkerSize } from "./types.js";

export type ServicePlanInput = {
  name: string;
  /** Default: F1 (Free). */
  sku?: Sku;
  /** Default: Small. */
  workerSize?: WorkerSize;
  /** Default: 1. */
  workerCount?: number;
  /** Default: Windows. */
  operatingSystem?: OperatingSystem;
};

export type ServicePlanSettings = {
  readonly sku: Sku;
  readonly workerSize: WorkerSize;
  readonly workerCount: number;
  readonly operatingSystem: OperatingSystem;
};

/**
 * Fill in plan defaults and validate the worker count.
 */
export function resolvePlanSettings(input: Omit<ServicePlanInput, "name">): ServicePlanSettings {
  const workerCount = input.workerCount ?? 1;
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new ConfigurationError(`Worker count must be a positive integer, got ${workerCount}`, {
      context: { workerCount },
    });
  }
  return {
    sku: input.sku ?? Skus.F1,
    workerSize: input.workerSize ?? "Small",
    workerCount,
    operatingSystem: input.operatingSystem ?? "Windows",
  };
}

export function serverFarmResource(name: ResourceName, location: Location, settings: ServicePlanSettings): ServerFarmResource {
  return { kind: "serverfarm", name, location, ...settings };
}

export class ServicePlanConfig implements ResourceBuilder {
  readonly name: ResourceName;
  readonly settings: ServicePlanSettings;

  constructor(name: ResourceName, settings: ServicePlanSettings) {
    this.name = name;
    this.settings = settings;
    Object.freeze(this);
  }

  dependencyName(): ResourceName {
    return this.name;
  }

  build(location: Location, _peers: PeerContext): readonly ResourceDescriptor[] {
    return [describeResource(serverFarmResource(this.name, location, this.settings))];
  }
}

export function createServicePlan(input: ServicePlanInput): ServicePlanConfig {
  return new ServicePlanConfig(resourceName(input.name), resolvePlanSettings(input));
}
