/**
 * ARM Template: Type Definitions
 */

import type { JsonObject } from "../core/types.js";

export const DEPLOYMENT_TEMPLATE_SCHEMA =
  "https://schema.management.azure.com/schemas/2019-04-01/deploymentTemplate.json#";
export const DEPLOYMENT_PARAMETERS_SCHEMA =
  "https://schema.management.azure.com/schemas/2019-04-01/deploymentParameters.json#";
export const CONTENT_VERSION = "1.0.0.0";

export type TemplateParameter = { type: "securestring" };

export type TemplateOutput = { type: "string"; value: string };

export type ArmTemplate = {
  $schema: string;
  contentVersion: string;
  parameters: Record<string, TemplateParameter>;
  outputs: Record<string, TemplateOutput>;
  resources: readonly Readonly<JsonObject>[];
};

export type ParameterValuesFile = {
  $schema: string;
  contentVersion: string;
  parameters: Record<string, { value: string }>;
};
