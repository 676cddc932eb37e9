/**
 * armgraph settings schema (TypeBox) and loader.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError, formatError } from "./core/errors.js";

export const settingsSchema = Type.Object({
  location: Type.String({ minLength: 1, default: "westeurope", description: "Location every resource is deployed to" }),
  resourceGroup: Type.Optional(Type.String({ minLength: 1, description: "Resource group the template is deployed into" })),
  tenantId: Type.Optional(Type.String({ description: "Tenant GUID used instead of the subscription tenant" })),
  outputDir: Type.String({ minLength: 1, default: ".armgraph", description: "Directory receiving the generated template" }),
  templateFileName: Type.String({ minLength: 1, default: "template.json" }),
  artifactDir: Type.Optional(Type.String({ description: "Folder receiving zip archives built from deploy folders" })),
  azPath: Type.String({ minLength: 1, default: "az", description: "Path to the az CLI binary" }),
  azTimeoutMs: Type.Integer({ minimum: 0, default: 600_000 }),
  actionTimeoutMs: Type.Integer({ minimum: 0, default: 900_000, description: "Per post-deploy action timeout, 0 disables" }),
  logLevel: Type.Union(
    [
      Type.Literal("trace"),
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
      Type.Literal("fatal"),
    ],
    { default: "info" },
  ),
});

export type ArmGraphSettings = Static<typeof settingsSchema>;

/**
 * Apply defaults to raw settings and validate them.
 */
export function loadSettings(raw: unknown = {}): ArmGraphSettings {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError("Settings must be an object");
  }

  const value = Value.Default(settingsSchema, Value.Clone(raw));
  if (Value.Check(settingsSchema, value)) {
    return value;
  }

  const errors: string[] = [];
  for (const error of Value.Errors(settingsSchema, value)) {
    errors.push(`${error.path || "(root)"}: ${error.message}`);
  }
  throw new ConfigurationError(`Invalid settings: ${errors.join("; ")}`, { context: { errors } });
}

/**
 * Read a JSON settings file and load it.
 */
export async function readSettingsFile(path: string): Promise<ArmGraphSettings> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read settings file ${path}: ${formatError(err)}`, { cause: err, context: { path } });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Settings file ${path} is not valid JSON: ${formatError(err)}`, { cause: err, context: { path } });
  }
  return loadSettings(raw);
}

export function getDefaultSettings(): ArmGraphSettings {
  return loadSettings({});
}
