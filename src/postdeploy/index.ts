export {
  type PostDeployRunContext,
  DEFAULT_ACTION_TIMEOUT_MS,
  PostDeployRunner,
  runPostDeploy,
} from "./runner.js";
export type {
  ZipDeployRequest,
  ZipDeployResult,
  ZipDeployClient,
  PostDeployContext,
  PostDeployActionResult,
  PostDeployAction,
  PostDeployStatus,
  PostDeployOutcome,
  PostDeployReport,
  PostDeployOptions,
  PostDeployEventType,
  PostDeployEvent,
  PostDeployEventListener,
} from "./types.js";
