/**
 * ARM Resources
 *
 * The closed set of resource records kind modules emit, and the single
 * function that turns any of them into a descriptor.
 */

import type { ResourceDescriptor } from "../core/builder.js";
import { freezeDescriptor } from "../core/builder.js";
import type { JsonObject } from "../core/types.js";
import { serializeVault, serializeVaultSecret } from "../keyvault/vault.js";
import type { VaultResource, VaultSecretResource } from "../keyvault/types.js";
import { serializeServerFarm } from "../webapp/server-farm.js";
import { serializeSite } from "../webapp/site.js";
import type { ServerFarmResource, SiteResource } from "../webapp/types.js";

export type ArmResource =
  | ServerFarmResource
  | SiteResource
  | VaultResource
  | VaultSecretResource;

export type ArmResourceKind = ArmResource["kind"];

export function serializeResource(resource: ArmResource): JsonObject {
  switch (resource.kind) {
    case "serverfarm":
      return serializeServerFarm(resource);
    case "site":
      return serializeSite(resource);
    case "vault":
      return serializeVault(resource);
    case "vault-secret":
      return serializeVaultSecret(resource);
  }
}

export function describeResource(resource: ArmResource): ResourceDescriptor {
  return freezeDescriptor(resource.name, serializeResource(resource));
}
