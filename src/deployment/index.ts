export { createDeployment, deploymentTemplate, executeDeployment } from "./pipeline.js";
export type {
  DeploymentInput,
  Deployment,
  TemplateSubmission,
  TemplateSubmissionResult,
  TemplateSubmitter,
  DeploymentOptions,
  DeploymentResult,
} from "./types.js";
