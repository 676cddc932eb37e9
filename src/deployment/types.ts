/**
 * Deployment Pipeline: Type Definitions
 */

import type { ArmGraphSettings } from "../config.js";
import type { ResourceBuilder } from "../core/builder.js";
import type { ArmExpression } from "../core/expression.js";
import type { Location } from "../core/types.js";
import type { Logger } from "../logging/index.js";
import type { PostDeployEventListener, PostDeployReport, ZipDeployClient } from "../postdeploy/types.js";
import type { ArmTemplate, ParameterValuesFile } from "../template/types.js";
import type { TemplateOutputs } from "../template/writer.js";

export type DeploymentInput = {
  /** Default: "armgraph". */
  name?: string;
  location: Location;
  resources: readonly ResourceBuilder[];
  outputs?: TemplateOutputs;
  tenantId?: ArmExpression;
};

export type Deployment = {
  readonly name: string;
  readonly location: Location;
  readonly resources: readonly ResourceBuilder[];
  readonly outputs: TemplateOutputs;
  readonly tenantId?: ArmExpression;
};

// =============================================================================
// Template Submission
// =============================================================================

export type TemplateSubmission = {
  deploymentName: string;
  resourceGroup: string;
  templatePath: string;
  template: ArmTemplate;
  parameters: ParameterValuesFile;
};

export type TemplateSubmissionResult = {
  success: boolean;
  /** Output values reported by the platform. */
  outputs?: Record<string, string>;
  error?: string;
};

/** Applies a rendered template to a resource group. */
export interface TemplateSubmitter {
  submit(submission: TemplateSubmission, signal?: AbortSignal): Promise<TemplateSubmissionResult>;
}

// =============================================================================
// Execution
// =============================================================================

export type DeploymentOptions = {
  settings: ArmGraphSettings;
  submitter: TemplateSubmitter;
  /** Default: `az webapp deployment source config-zip` with the configured az binary. */
  zipDeploy?: ZipDeployClient;
  /** Values for the secure parameters, keyed by parameter name. */
  secrets?: Readonly<Record<string, string>>;
  logger?: Logger;
  signal?: AbortSignal;
  listener?: PostDeployEventListener;
};

export type DeploymentResult = {
  template: ArmTemplate;
  templatePath: string;
  submission: TemplateSubmissionResult;
  postDeploy: PostDeployReport;
};
