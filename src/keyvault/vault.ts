/**
 * Microsoft.KeyVault/vaults and vaults/secrets serialization.
 */

import { evalExpression, parameterReference } from "../core/expression.js";
import type { JsonObject } from "../core/types.js";
import { armLocation, featureFlagValue } from "../core/types.js";
import type { AccessPolicy, CreateMode, SecretValue, VaultResource, VaultSecretResource } from "./types.js";

export const VAULT_TYPE = "Microsoft.KeyVault/vaults";
export const VAULT_SECRET_TYPE = "Microsoft.KeyVault/vaults/secrets";
export const KEY_VAULT_API_VERSION = "2019-09-01";

const CREATE_MODE_TOKENS: Record<CreateMode["mode"], string | undefined> = {
  Unspecified: undefined,
  Default: "default",
  Recover: "recover",
};

/** The `createMode` token ARM expects, or undefined when the platform should decide. */
export function createModeToken(createMode: CreateMode): string | undefined {
  return CREATE_MODE_TOKENS[createMode.mode];
}

function serializeAccessPolicy(policy: AccessPolicy, tenantId: string): JsonObject {
  const json: JsonObject = {
    objectId: evalExpression(policy.objectId),
    tenantId,
  };
  if (policy.applicationId !== undefined) json.applicationId = policy.applicationId;
  json.permissions = {
    keys: [...policy.permissions.keys],
    secrets: [...policy.permissions.secrets],
    certificates: [...policy.permissions.certificates],
    storage: [...policy.permissions.storage],
  };
  return json;
}

export function serializeVault(vault: VaultResource): JsonObject {
  const tenantId = evalExpression(vault.tenantId);
  const { access, networkAcl } = vault;

  const properties: JsonObject = {
    tenantId,
    sku: { name: vault.sku, family: "A" },
  };
  if (access.virtualMachineAccess) properties.enabledForDeployment = featureFlagValue(access.virtualMachineAccess);
  if (access.diskEncryptionAccess) properties.enabledForDiskEncryption = featureFlagValue(access.diskEncryptionAccess);
  if (access.resourceManagerAccess) properties.enabledForTemplateDeployment = featureFlagValue(access.resourceManagerAccess);
  if (access.rbacAuthorization) properties.enableRbacAuthorization = featureFlagValue(access.rbacAuthorization);
  if (access.softDelete) properties.enableSoftDelete = true;
  if (access.softDelete === "SoftDeleteWithPurgeProtection") properties.enablePurgeProtection = true;

  const createMode = createModeToken(vault.createMode);
  if (createMode) properties.createMode = createMode;
  if (vault.uri) properties.vaultUri = vault.uri;

  const policies: readonly AccessPolicy[] = vault.createMode.policies;
  properties.accessPolicies = policies.map((p) => serializeAccessPolicy(p, tenantId));

  const networkAcls: JsonObject = {};
  if (networkAcl.bypass) networkAcls.bypass = networkAcl.bypass;
  if (networkAcl.defaultAction) networkAcls.defaultAction = networkAcl.defaultAction;
  networkAcls.ipRules = networkAcl.ipRules.map((value) => ({ value }));
  networkAcls.virtualNetworkRules = networkAcl.vnetRules.map((id) => ({ id }));
  properties.networkAcls = networkAcls;

  return {
    type: VAULT_TYPE,
    apiVersion: KEY_VAULT_API_VERSION,
    name: vault.name,
    location: armLocation(vault.location),
    properties,
  };
}

export function secretValueString(value: SecretValue): string {
  return value.kind === "parameter" ? parameterReference(value.parameter) : evalExpression(value.expression);
}

function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function serializeVaultSecret(secret: VaultSecretResource): JsonObject {
  const attributes: JsonObject = {};
  if (secret.enabled !== undefined) attributes.enabled = secret.enabled;
  if (secret.activationDate) attributes.nbf = unixSeconds(secret.activationDate);
  if (secret.expirationDate) attributes.exp = unixSeconds(secret.expirationDate);

  const properties: JsonObject = { value: secretValueString(secret.value) };
  if (secret.contentType !== undefined) properties.contentType = secret.contentType;
  properties.attributes = attributes;

  return {
    type: VAULT_SECRET_TYPE,
    apiVersion: KEY_VAULT_API_VERSION,
    name: secret.name,
    location: armLocation(secret.location),
    dependsOn: [...secret.dependencies],
    properties,
  };
}
