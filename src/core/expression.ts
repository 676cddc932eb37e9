/**
 * ARM template expressions and secure parameters.
 */

import { ConfigurationError } from "./errors.js";

/** A raw ARM template expression, e.g. `subscription().tenantId`. */
export type ArmExpression = {
  readonly kind: "expression";
  readonly value: string;
};

export function armExpression(value: string): ArmExpression {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ConfigurationError("ARM expressions must not be empty");
  }
  return Object.freeze({ kind: "expression", value: trimmed });
}

/** Evaluate an expression into its template string form: `[expr]`. */
export function evalExpression(expression: ArmExpression): string {
  return `[${expression.value}]`;
}

const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isGuid(value: string): boolean {
  return GUID_PATTERN.test(value.trim());
}

/**
 * Convert a raw GUID string into an expression (`string('<guid>')`).
 */
export function guidExpression(guid: string): ArmExpression {
  const trimmed = guid.trim();
  if (!isGuid(trimmed)) {
    throw new ConfigurationError(`"${guid}" is not a valid GUID`, { context: { guid } });
  }
  return armExpression(`string('${trimmed.toLowerCase()}')`);
}

/** Tenant of the subscription the template is deployed into. */
export const SUBSCRIPTION_TENANT_ID: ArmExpression = armExpression("subscription().tenantId");

// =============================================================================
// Secure Parameters
// =============================================================================

/** A value supplied at deployment time instead of being embedded in the template. */
export type SecureParameter = {
  readonly name: string;
};

export function secureParameter(name: string): SecureParameter {
  if (name.trim().length === 0) {
    throw new ConfigurationError("Secure parameter names must not be empty");
  }
  return Object.freeze({ name });
}

/** The template reference to a parameter: `[parameters('name')]`. */
export function parameterReference(parameter: SecureParameter): string {
  return `[parameters('${parameter.name}')]`;
}
