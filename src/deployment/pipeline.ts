/**
 * Deployment Pipeline
 *
 * compile → parameter values → template file → submission → post-deploy queue
 *
 * Post-deploy work only starts once the submitter reports success.
 */

import { AzureCliWrapper } from "../cli/wrapper.js";
import { AzureCliZipDeployClient } from "../cli/zip-deploy.js";
import type { ArmGraphSettings } from "../config.js";
import { compile } from "../compiler/compiler.js";
import { ConfigurationError, DeploymentError, formatError, isArmGraphError } from "../core/errors.js";
import { guidExpression } from "../core/expression.js";
import type { Logger } from "../logging/index.js";
import { createLogger } from "../logging/index.js";
import { runPostDeploy } from "../postdeploy/runner.js";
import type { ZipDeployClient } from "../postdeploy/types.js";
import type { ArmTemplate } from "../template/types.js";
import { buildParameterValues, renderTemplate, writeTemplate } from "../template/writer.js";
import type {
  Deployment,
  DeploymentInput,
  DeploymentOptions,
  DeploymentResult,
  TemplateSubmission,
  TemplateSubmissionResult,
  TemplateSubmitter,
} from "./types.js";

export function createDeployment(input: DeploymentInput): Deployment {
  return Object.freeze({
    name: input.name ?? "armgraph",
    location: input.location,
    resources: [...input.resources],
    outputs: [...(input.outputs ?? [])],
    tenantId: input.tenantId,
  });
}

/**
 * Compile a deployment and render its template without deploying anything.
 */
export function deploymentTemplate(deployment: Deployment, logger?: Logger): ArmTemplate {
  const result = compile(deployment.resources, {
    location: deployment.location,
    tenantId: deployment.tenantId,
    logger,
  });
  return renderTemplate(result, deployment.outputs);
}

/**
 * Run the whole pipeline. Compilation, parameter and submission failures
 * throw; post-deploy failures are reported in the result.
 */
export async function executeDeployment(deployment: Deployment, options: DeploymentOptions): Promise<DeploymentResult> {
  const { settings, signal } = options;
  const secrets = options.secrets ?? {};
  const log = (options.logger ?? createLogger("deployment", { level: settings.logLevel }))
    .withContext({ deploymentName: deployment.name })
    .withRedactedValues(Object.values(secrets));

  const resourceGroup = settings.resourceGroup;
  if (resourceGroup === undefined) {
    throw new ConfigurationError("A resource group is required to deploy", { context: { deployment: deployment.name } });
  }

  // 1. Compile
  const compiled = compile(deployment.resources, {
    location: deployment.location,
    tenantId: deployment.tenantId ?? (settings.tenantId ? guidExpression(settings.tenantId) : undefined),
    logger: log.child("compiler"),
  });

  // 2. Parameter values
  const parameters = buildParameterValues(compiled.secretManifest, secrets);

  // 3. Template file
  const template = renderTemplate(compiled, deployment.outputs);
  const templatePath = await writeTemplate(template, settings.outputDir, settings.templateFileName);
  log.info(`Wrote template to ${templatePath}`, { resources: template.resources.length });

  // 4. Submit
  const submission = await submit(options.submitter, {
    deploymentName: deployment.name,
    resourceGroup,
    templatePath,
    template,
    parameters,
  }, signal);
  if (!submission.success) {
    log.error(`Deployment failed: ${submission.error ?? "unknown error"}`);
    throw new DeploymentError(deployment.name, `Deployment "${deployment.name}" failed: ${submission.error ?? "unknown error"}`, {
      context: { resourceGroup },
    });
  }
  log.info(`Deployed ${template.resources.length} resources to ${resourceGroup}`);

  // 5. Post-deploy
  const postDeploy = await runPostDeploy(
    compiled.postDeployQueue,
    {
      resourceGroup,
      targetFolder: settings.artifactDir,
      zipDeploy: options.zipDeploy ?? defaultZipDeployClient(settings, log),
      log: log.child("postdeploy"),
    },
    { actionTimeoutMs: settings.actionTimeoutMs, signal },
    options.listener,
  );

  return { template, templatePath, submission, postDeploy };
}

async function submit(
  submitter: TemplateSubmitter,
  submission: TemplateSubmission,
  signal?: AbortSignal,
): Promise<TemplateSubmissionResult> {
  try {
    return await submitter.submit(submission, signal);
  } catch (err) {
    if (isArmGraphError(err)) throw err;
    throw new DeploymentError(submission.deploymentName, `Deployment "${submission.deploymentName}" failed: ${formatError(err)}`, {
      cause: err,
      context: { resourceGroup: submission.resourceGroup },
    });
  }
}

function defaultZipDeployClient(settings: ArmGraphSettings, log: Logger): ZipDeployClient {
  return new AzureCliZipDeployClient(
    new AzureCliWrapper({ azPath: settings.azPath, timeoutMs: settings.azTimeoutMs, logger: log.child("az") }),
  );
}
