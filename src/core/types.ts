/**
 * armgraph: Core Types
 *
 * Value types shared by every resource kind module.
 */

import { ConfigurationError } from "./errors.js";

// =============================================================================
// JSON
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

// =============================================================================
// Resource Names
// =============================================================================

declare const resourceNameBrand: unique symbol;

/** A validated, non-empty resource identifier. */
export type ResourceName = string & { readonly [resourceNameBrand]: true };

export function isResourceName(value: string): value is ResourceName {
  return value.trim().length > 0;
}

/**
 * Create a resource name. Empty or whitespace-only names are rejected.
 */
export function resourceName(value: string): ResourceName {
  if (!isResourceName(value)) {
    throw new ConfigurationError("Resource names must not be empty", { context: { value } });
  }
  return value;
}

/** Join a parent and child name into a nested resource name (`parent/child`). */
export function childResourceName(parent: ResourceName, child: string): ResourceName {
  return resourceName(`${parent}/${child}`);
}

// =============================================================================
// Locations
// =============================================================================

export type Location =
  | "eastus"
  | "eastus2"
  | "westus"
  | "westus2"
  | "centralus"
  | "northeurope"
  | "westeurope"
  | "uksouth"
  | "ukwest"
  | "francecentral"
  | "germanywestcentral"
  | "swedencentral"
  | "eastasia"
  | "southeastasia"
  | "japaneast"
  | "australiaeast"
  | (string & {}); // Display names such as "West Europe" are accepted too

/** Convert a location to the value ARM expects ("West Europe" → "westeurope"). */
export function armLocation(location: Location): string {
  return location.replace(/\s+/g, "").toLowerCase();
}

// =============================================================================
// Feature Flags
// =============================================================================

export type FeatureFlag = "Enabled" | "Disabled";

export function featureFlagValue(flag: FeatureFlag): boolean {
  return flag === "Enabled";
}
