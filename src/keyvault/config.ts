/**
 * Key Vault configuration
 *
 * A vault compiles to one Microsoft.KeyVault/vaults resource followed by one
 * vaults/secrets resource per configured secret.
 */

import { describeResource } from "../arm/resources.js";
import type { PeerContext, ResourceBuilder, ResourceDescriptor } from "../core/builder.js";
import { ConfigurationError } from "../core/errors.js";
import type { ArmExpression, SecureParameter } from "../core/expression.js";
import { isGuid } from "../core/expression.js";
import type { Location, ResourceName } from "../core/types.js";
import { childResourceName, resourceName } from "../core/types.js";
import type { SecretConfig } from "./secret.js";
import type {
  AccessPolicy,
  CertificatePermission,
  CreateMode,
  KeyPermission,
  KeyVaultAccessSettings,
  KeyVaultSku,
  NetworkAcl,
  SecretPermission,
  StoragePermission,
} from "./types.js";

// =============================================================================
// Access Policies
// =============================================================================

export type AccessPolicyInput = {
  objectId: ArmExpression;
  applicationId?: string;
  keys?: readonly KeyPermission[];
  secrets?: readonly SecretPermission[];
  certificates?: readonly CertificatePermission[];
  storage?: readonly StoragePermission[];
};

export function accessPolicy(input: AccessPolicyInput): AccessPolicy {
  if (input.applicationId !== undefined && !isGuid(input.applicationId)) {
    throw new ConfigurationError(`Application ID "${input.applicationId}" is not a valid GUID`, {
      context: { applicationId: input.applicationId },
    });
  }
  return {
    objectId: input.objectId,
    applicationId: input.applicationId,
    permissions: {
      keys: unique(input.keys),
      secrets: unique(input.secrets),
      certificates: unique(input.certificates),
      storage: unique(input.storage),
    },
  };
}

/** A policy that only permits reading secrets. */
export function readerPolicy(objectId: ArmExpression): AccessPolicy {
  return accessPolicy({ objectId, secrets: ["get"] });
}

function unique<T>(values: readonly T[] | undefined): readonly T[] {
  return [...new Set(values ?? [])];
}

// =============================================================================
// Create Mode
// =============================================================================

/**
 * Resolve the create mode from the requested mode and policy list.
 * Recover mode needs at least one policy.
 */
export function resolveCreateMode(mode: "Default" | "Recover" | undefined, policies: readonly AccessPolicy[]): CreateMode {
  switch (mode) {
    case undefined:
      return { mode: "Unspecified", policies };
    case "Default":
      return { mode: "Default", policies };
    case "Recover": {
      const [primary, ...secondary] = policies;
      if (primary === undefined) {
        throw new ConfigurationError(
          "Setting the creation mode to Recover requires at least one access policy. Create a policy with accessPolicy() and add it to the vault's accessPolicies.",
        );
      }
      return { mode: "Recover", policies: [primary, ...secondary] };
    }
  }
}

// =============================================================================
// KeyVaultConfig
// =============================================================================

export type KeyVaultInput = {
  name: string;
  /** Default: the tenant of the target subscription. */
  tenantId?: ArmExpression;
  /** Default: standard. */
  sku?: KeyVaultSku;
  /** Merged over the default, which enables Resource Manager access. */
  access?: KeyVaultAccessSettings;
  networkAcl?: Partial<NetworkAcl>;
  createMode?: "Default" | "Recover";
  accessPolicies?: readonly AccessPolicy[];
  uri?: string;
  secrets?: readonly SecretConfig[];
};

export type KeyVaultSettings = {
  readonly tenantId?: ArmExpression;
  readonly sku: KeyVaultSku;
  readonly access: KeyVaultAccessSettings;
  readonly networkAcl: NetworkAcl;
  readonly createMode: CreateMode;
  readonly uri?: string;
  readonly secrets: readonly SecretConfig[];
};

export class KeyVaultConfig implements ResourceBuilder {
  readonly name: ResourceName;
  readonly settings: KeyVaultSettings;

  constructor(name: ResourceName, settings: KeyVaultSettings) {
    this.name = name;
    this.settings = settings;
    Object.freeze(this);
  }

  dependencyName(): ResourceName {
    return this.name;
  }

  build(location: Location, peers: PeerContext): readonly ResourceDescriptor[] {
    const { settings } = this;
    const vault = describeResource({
      kind: "vault",
      name: this.name,
      location,
      tenantId: settings.tenantId ?? peers.tenantId,
      sku: settings.sku,
      access: settings.access,
      createMode: settings.createMode,
      networkAcl: settings.networkAcl,
      uri: settings.uri,
    });

    const secrets = settings.secrets.map((secret) =>
      describeResource({
        kind: "vault-secret",
        name: childResourceName(this.name, secret.key),
        location,
        value: secret.value,
        contentType: secret.contentType,
        enabled: secret.enabled,
        activationDate: secret.activationDate,
        expirationDate: secret.expirationDate,
        dependencies: [...new Set([this.name, ...secret.dependencies])],
      }),
    );

    return [vault, ...secrets];
  }

  secureParameters(): readonly SecureParameter[] {
    const parameters: SecureParameter[] = [];
    for (const secret of this.settings.secrets) {
      if (secret.value.kind === "parameter") parameters.push(secret.value.parameter);
    }
    return parameters;
  }
}

/**
 * Finalize a vault configuration. Fails when Recover mode has no access policy.
 */
export function createKeyVault(input: KeyVaultInput): KeyVaultConfig {
  const name = resourceName(input.name);
  const createMode = resolveCreateMode(input.createMode, [...(input.accessPolicies ?? [])]);

  const seen = new Set<string>();
  for (const secret of input.secrets ?? []) {
    if (seen.has(secret.key)) {
      throw new ConfigurationError(`Key vault "${name}" declares secret "${secret.key}" more than once`, {
        context: { vault: name, key: secret.key },
      });
    }
    seen.add(secret.key);
  }

  return new KeyVaultConfig(name, {
    tenantId: input.tenantId,
    sku: input.sku ?? "standard",
    access: { resourceManagerAccess: "Enabled", ...input.access },
    networkAcl: {
      ipRules: [...(input.networkAcl?.ipRules ?? [])],
      vnetRules: [...(input.networkAcl?.vnetRules ?? [])],
      defaultAction: input.networkAcl?.defaultAction,
      bypass: input.networkAcl?.bypass,
    },
    createMode,
    uri: input.uri,
    secrets: [...(input.secrets ?? [])],
  });
}
