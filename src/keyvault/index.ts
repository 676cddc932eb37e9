export {
  type AccessPolicyInput,
  type KeyVaultInput,
  type KeyVaultSettings,
  KeyVaultConfig,
  accessPolicy,
  readerPolicy,
  resolveCreateMode,
  createKeyVault,
} from "./config.js";
export {
  type SecretInput,
  type SecretConfig,
  MAX_SECRET_KEY_LENGTH,
  isValidSecretKey,
  createSecret,
} from "./secret.js";
export {
  VAULT_TYPE,
  VAULT_SECRET_TYPE,
  KEY_VAULT_API_VERSION,
  createModeToken,
  secretValueString,
  serializeVault,
  serializeVaultSecret,
} from "./vault.js";
export type {
  KeyVaultSku,
  SoftDeletionMode,
  KeyVaultAccessSettings,
  DefaultAction,
  Bypass,
  NetworkAcl,
  KeyPermission,
  SecretPermission,
  CertificatePermission,
  StoragePermission,
  AccessPolicy,
  NonEmptyArray,
  CreateMode,
  SecretValue,
  VaultResource,
  VaultSecretResource,
} from "./types.js";
