/**
 * ARM Template Writer
 *
 * Renders a compilation result as a deployment template document and the
 * matching parameter values file.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { CompilationResult } from "../compiler/types.js";
import { ConfigurationError } from "../core/errors.js";
import type { ArmExpression, SecureParameter } from "../core/expression.js";
import { evalExpression } from "../core/expression.js";
import type {
  ArmTemplate,
  ParameterValuesFile,
  TemplateOutput,
  TemplateParameter,
} from "./types.js";
import { CONTENT_VERSION, DEPLOYMENT_PARAMETERS_SCHEMA, DEPLOYMENT_TEMPLATE_SCHEMA } from "./types.js";

export type TemplateOutputs = ReadonlyArray<readonly [string, ArmExpression]>;

// =============================================================================
// Template
// =============================================================================

export function renderTemplate(result: CompilationResult, outputs: TemplateOutputs = []): ArmTemplate {
  const parameters: Record<string, TemplateParameter> = {};
  for (const parameter of result.secretManifest) {
    parameters[parameter.name] = { type: "securestring" };
  }

  const renderedOutputs: Record<string, TemplateOutput> = {};
  for (const [name, expression] of outputs) {
    renderedOutputs[name] = { type: "string", value: evalExpression(expression) };
  }

  return {
    $schema: DEPLOYMENT_TEMPLATE_SCHEMA,
    contentVersion: CONTENT_VERSION,
    parameters,
    outputs: renderedOutputs,
    resources: result.descriptors.map((d) => d.jsonShape),
  };
}

export function templateJson(template: ArmTemplate): string {
  return JSON.stringify(template, null, 2);
}

/**
 * Write the template into `directory`, creating it if needed. Returns the file path.
 */
export async function writeTemplate(template: ArmTemplate, directory: string, fileName = "template.json"): Promise<string> {
  await mkdir(directory, { recursive: true });
  const path = join(directory, fileName);
  await writeFile(path, templateJson(template), "utf8");
  return path;
}

// =============================================================================
// Parameter Values
// =============================================================================

/**
 * Pair every secure parameter with its value. Fails listing every parameter
 * that has no value.
 */
export function buildParameterValues(
  manifest: readonly SecureParameter[],
  values: Readonly<Record<string, string>>,
): ParameterValuesFile {
  const parameters: Record<string, { value: string }> = {};
  const missing: string[] = [];
  for (const parameter of manifest) {
    if (Object.hasOwn(values, parameter.name)) parameters[parameter.name] = { value: values[parameter.name] };
    else missing.push(parameter.name);
  }
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing values for secure parameters: ${missing.join(", ")}`, {
      context: { missing },
    });
  }

  return { $schema: DEPLOYMENT_PARAMETERS_SCHEMA, contentVersion: CONTENT_VERSION, parameters };
}
