/**
 * Azure CLI Wrapper
 *
 * Wraps the `az` CLI tool for the calls made after a template is deployed.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { formatError } from "../core/errors.js";
import type { Logger } from "../logging/index.js";
import { getLogger } from "../logging/index.js";

const execFileAsync = promisify(execFile);

// =============================================================================
// Types
// =============================================================================

export type AzureCliOptions = {
  /** Path to az CLI binary. */
  azPath?: string;
  /** Timeout in ms. */
  timeoutMs?: number;
  /** Working directory. */
  cwd?: string;
  logger?: Logger;
};

export type AzureCliResult = {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  parsed?: unknown;
};

export type AzureCliConfig = {
  azPath: string;
  defaultArgs: string[];
  timeoutMs: number;
  cwd?: string;
};

// =============================================================================
// AzureCliWrapper
// =============================================================================

export class AzureCliWrapper {
  private config: AzureCliConfig;
  private log: Logger;

  constructor(options?: AzureCliOptions) {
    this.config = {
      azPath: options?.azPath ?? "az",
      defaultArgs: ["--output", "json"],
      timeoutMs: options?.timeoutMs ?? 600_000,
      cwd: options?.cwd,
    };
    this.log = options?.logger ?? getLogger("az");
  }

  /**
   * Execute an az CLI command. Failures are returned, not thrown.
   */
  async execute(args: string[], options?: { signal?: AbortSignal }): Promise<AzureCliResult> {
    const fullArgs = [...args, ...this.config.defaultArgs];
    this.log.debug(`az ${fullArgs.join(" ")}`);

    try {
      const { stdout, stderr } = await execFileAsync(this.config.azPath, fullArgs, {
        timeout: this.config.timeoutMs,
        cwd: this.config.cwd,
        env: process.env,
        signal: options?.signal,
      });
      return { success: true, stdout, stderr, exitCode: 0, parsed: parseJson(stdout) };
    } catch (error) {
      const failure = describeFailure(error);
      this.log.debug(`az ${args.slice(0, 3).join(" ")} exited with ${failure.exitCode}`);
      return { success: false, stdout: "", ...failure };
    }
  }

  /**
   * Check if az CLI is installed and available.
   */
  async isAvailable(): Promise<boolean> {
    const result = await this.execute(["version"]);
    return result.success;
  }
}

function parseJson(stdout: string): unknown {
  try {
    return JSON.parse(stdout);
  } catch {
    return undefined;
  }
}

function describeFailure(error: unknown): { stderr: string; exitCode: number } {
  if (typeof error !== "object" || error === null) {
    return { stderr: error === undefined ? "Unknown error" : formatError(error), exitCode: 1 };
  }
  let stderr = "Unknown error";
  if ("stderr" in error && typeof error.stderr === "string" && error.stderr.length > 0) {
    stderr = error.stderr;
  } else if ("message" in error && typeof error.message === "string") {
    stderr = error.message;
  }
  const exitCode = "code" in error && typeof error.code === "number" ? error.code : 1;
  return { stderr, exitCode };
}

// =============================================================================
// Factory
// =============================================================================

export function createCliWrapper(options?: AzureCliOptions): AzureCliWrapper {
  return new AzureCliWrapper(options);
}
