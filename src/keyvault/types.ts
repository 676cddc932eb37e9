/**
 * Azure Key Vault: Type Definitions
 */

import type { ArmExpression, SecureParameter } from "../core/expression.js";
import type { FeatureFlag, Location, ResourceName } from "../core/types.js";

// =============================================================================
// Settings
// =============================================================================

export type KeyVaultSku = "standard" | "premium";

export type SoftDeletionMode = "SoftDeleteOnly" | "SoftDeleteWithPurgeProtection";

export type KeyVaultAccessSettings = {
  /** Whether virtual machines may retrieve certificates stored as secrets. */
  virtualMachineAccess?: FeatureFlag;
  /** Whether Resource Manager may retrieve secrets during template deployments. */
  resourceManagerAccess?: FeatureFlag;
  /** Whether Azure Disk Encryption may retrieve secrets and unwrap keys. */
  diskEncryptionAccess?: FeatureFlag;
  /** Whether data-plane access is authorized through Azure RBAC instead of access policies. */
  rbacAuthorization?: FeatureFlag;
  softDelete?: SoftDeletionMode;
};

export type DefaultAction = "Allow" | "Deny";

export type Bypass = "AzureServices" | "None";

export type NetworkAcl = {
  /** IPv4 addresses or CIDR ranges, e.g. `124.56.78.0/24`. */
  ipRules: readonly string[];
  /** Full subnet resource IDs. */
  vnetRules: readonly string[];
  defaultAction?: DefaultAction;
  bypass?: Bypass;
};

// =============================================================================
// Access Policies
// =============================================================================

export type KeyPermission =
  | "encrypt" | "decrypt" | "wrapKey" | "unwrapKey" | "sign" | "verify"
  | "get" | "list" | "create" | "update" | "import" | "delete"
  | "backup" | "restore" | "recover" | "purge";

export type SecretPermission =
  | "get" | "list" | "set" | "delete" | "backup" | "restore" | "recover" | "purge";

export type CertificatePermission =
  | "get" | "list" | "delete" | "create" | "import" | "update"
  | "managecontacts" | "getissuers" | "listissuers" | "setissuers" | "deleteissuers" | "manageissuers"
  | "recover" | "purge" | "backup" | "restore";

export type StoragePermission =
  | "get" | "list" | "delete" | "set" | "update" | "regeneratekey"
  | "recover" | "purge" | "backup" | "restore"
  | "setsas" | "listsas" | "getsas" | "deletesas";

export type AccessPolicy = {
  objectId: ArmExpression;
  applicationId?: string;
  permissions: {
    keys: readonly KeyPermission[];
    secrets: readonly SecretPermission[];
    certificates: readonly CertificatePermission[];
    storage: readonly StoragePermission[];
  };
};

// =============================================================================
// Create Mode
// =============================================================================

export type NonEmptyArray<T> = readonly [T, ...T[]];

export type CreateMode =
  | { mode: "Unspecified"; policies: readonly AccessPolicy[] }
  | { mode: "Default"; policies: readonly AccessPolicy[] }
  | { mode: "Recover"; policies: NonEmptyArray<AccessPolicy> };

// =============================================================================
// Secrets
// =============================================================================

export type SecretValue =
  | { kind: "parameter"; parameter: SecureParameter }
  | { kind: "expression"; expression: ArmExpression };

// =============================================================================
// ARM Resource Records
// =============================================================================

export type VaultResource = {
  kind: "vault";
  name: ResourceName;
  location: Location;
  tenantId: ArmExpression;
  sku: KeyVaultSku;
  access: KeyVaultAccessSettings;
  createMode: CreateMode;
  networkAcl: NetworkAcl;
  uri?: string;
};

export type VaultSecretResource = {
  kind: "vault-secret";
  name: ResourceName;
  location: Location;
  value: SecretValue;
  contentType?: string;
  enabled?: boolean;
  activationDate?: Date;
  expirationDate?: Date;
  dependencies: readonly ResourceName[];
};
