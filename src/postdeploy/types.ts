/**
 * Post-Deploy: Type Definitions
 *
 * Work that runs after a template has been applied successfully, e.g.
 * uploading an application package to a web app that now exists.
 */

import type { Logger } from "../logging/index.js";

// =============================================================================
// External Collaborators
// =============================================================================

export type ZipDeployRequest = {
  /** Name of the web app receiving the package. */
  webAppName: string;
  resourceGroup: string;
  /** Path to the .zip file to upload. */
  zipPath: string;
};

export type ZipDeployResult = {
  success: boolean;
  /** Raw output of the deploy call. */
  output: string;
  /** Underlying transport error, when `success` is false. */
  error?: string;
};

/** Uploads a zip package to a web app. */
export interface ZipDeployClient {
  deploy(request: ZipDeployRequest, signal?: AbortSignal): Promise<ZipDeployResult>;
}

// =============================================================================
// Actions
// =============================================================================

export type PostDeployContext = {
  /** Resource group the template was deployed into. */
  resourceGroup: string;
  /** Folder receiving generated artifacts. Defaults to the source folder's parent. */
  targetFolder?: string;
  zipDeploy: ZipDeployClient;
  log: Logger;
  signal?: AbortSignal;
};

export type PostDeployActionResult = {
  /** Human-readable summary of what the action did. */
  detail: string;
};

export type PostDeployAction = {
  /** Resource the action works against. */
  resourceName: string;
  description: string;
  run: (context: PostDeployContext) => Promise<PostDeployActionResult>;
};

// =============================================================================
// Execution
// =============================================================================

export type PostDeployStatus = "succeeded" | "failed" | "cancelled";

export type PostDeployOutcome = {
  resourceName: string;
  description: string;
  status: PostDeployStatus;
  durationMs: number;
  detail?: string;
  error?: string;
};

export type PostDeployReport = {
  /** True only when every action succeeded. */
  success: boolean;
  outcomes: PostDeployOutcome[];
  startedAt: string;
  completedAt: string;
  totalDurationMs: number;
};

export type PostDeployOptions = {
  /** Per-action timeout (ms, default: 900_000 = 15 min, 0 disables). */
  actionTimeoutMs?: number;
  signal?: AbortSignal;
};

export type PostDeployEventType =
  | "postdeploy:start"
  | "postdeploy:complete"
  | "postdeploy:failed"
  | "action:start"
  | "action:complete"
  | "action:failed"
  | "action:cancelled";

export type PostDeployEvent = {
  type: PostDeployEventType;
  resourceName?: string;
  timestamp: string;
  message: string;
  error?: string;
  progress?: { completed: number; total: number };
};

export type PostDeployEventListener = (event: PostDeployEvent) => void;
