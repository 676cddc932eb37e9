/**
 * Key Vault secret configuration.
 */

import { ConfigurationError } from "../core/errors.js";
import type { ArmExpression } from "../core/expression.js";
import { secureParameter } from "../core/expression.js";
import type { ResourceName } from "../core/types.js";
import type { SecretValue } from "./types.js";

export const MAX_SECRET_KEY_LENGTH = 127;

const SECRET_KEY_CHARACTERS = /^[\p{L}\p{Nd}-]+$/u;

export type SecretInput = {
  key: string;
  /** Expression producing the value. Default: a secure parameter named after the key. */
  value?: ArmExpression;
  /** Resource whose output the value expression reads. */
  owner?: ResourceName;
  contentType?: string;
  enabled?: boolean;
  activationDate?: Date;
  expirationDate?: Date;
  dependsOn?: readonly ResourceName[];
};

export type SecretConfig = {
  readonly key: string;
  readonly value: SecretValue;
  readonly contentType?: string;
  readonly enabled?: boolean;
  readonly activationDate?: Date;
  readonly expirationDate?: Date;
  readonly dependencies: readonly ResourceName[];
};

/** Whether a key is a legal secret name: 1-127 letters, digits or dashes. */
export function isValidSecretKey(key: string): boolean {
  return (
    key.length <= MAX_SECRET_KEY_LENGTH &&
    key.trim().length > 0 &&
    SECRET_KEY_CHARACTERS.test(key)
  );
}

/**
 * Finalize a secret configuration. Invalid keys are rejected here, before the
 * secret can reach a vault.
 */
export function createSecret(input: SecretInput): SecretConfig {
  if (!isValidSecretKey(input.key)) {
    throw new ConfigurationError(
      `Invalid secret key "${input.key}": Key Vault key names must be a 1-127 character string containing only letters, digits and -.`,
      { context: { key: input.key } },
    );
  }

  const value: SecretValue = input.value
    ? { kind: "expression", expression: input.value }
    : { kind: "parameter", parameter: secureParameter(input.key) };

  const dependencies = [...(input.owner ? [input.owner] : []), ...(input.dependsOn ?? [])];

  return Object.freeze({
    key: input.key,
    value,
    contentType: input.contentType,
    enabled: input.enabled,
    activationDate: input.activationDate,
    expirationDate: input.expirationDate,
    dependencies: [...new Set(dependencies)],
  });
}
