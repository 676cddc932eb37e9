/**
 * armgraph: Builder Contract
 *
 * Every resource configuration implements {@link ResourceBuilder}, which lets
 * the compiler treat heterogeneous kinds uniformly.
 */

import type { PostDeployAction } from "../postdeploy/types.js";
import type { ArmExpression, SecureParameter } from "./expression.js";
import type { JsonObject, Location, ResourceName } from "./types.js";

/**
 * A compiled, serializable unit representing one deployable cloud object.
 */
export type ResourceDescriptor = {
  readonly name: ResourceName;
  readonly jsonShape: Readonly<JsonObject>;
};

/**
 * Read-only view of the batch being compiled.
 */
export interface PeerContext {
  /** Subscription-level default tenant. */
  readonly tenantId: ArmExpression;
  /** Descriptors emitted earlier in the batch, in emission order. */
  readonly resources: readonly ResourceDescriptor[];
  /** Whether a descriptor with this name (and resource type, when given) was already emitted. */
  has(name: ResourceName, resourceType?: string): boolean;
}

export interface ResourceBuilder {
  /** Name other configurations use to depend on this one. */
  dependencyName(): ResourceName;
  /** Every descriptor this configuration contributes, in template order. Pure. */
  build(location: Location, peers: PeerContext): readonly ResourceDescriptor[];
  secureParameters?(): readonly SecureParameter[];
  postDeployActions?(): readonly PostDeployAction[];
}

/** The ARM resource type recorded in a descriptor's shape. */
export function descriptorType(descriptor: ResourceDescriptor): string | undefined {
  const type = descriptor.jsonShape.type;
  return typeof type === "string" ? type : undefined;
}

/** Deep-freeze a descriptor so kind modules cannot mutate it after creation. */
export function freezeDescriptor(name: ResourceName, jsonShape: JsonObject): ResourceDescriptor {
  return Object.freeze({ name, jsonShape: deepFreeze(jsonShape) });
}

function deepFreeze<T extends JsonObject>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    freezeValue(child);
  }
  return Object.freeze(value);
}

function freezeValue(value: JsonObject[string]): void {
  if (Array.isArray(value)) {
    for (const item of value) freezeValue(item);
    Object.freeze(value);
  } else if (typeof value === "object" && value !== null) {
    deepFreeze(value);
  }
}
