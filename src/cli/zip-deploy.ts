/**
 * Zip deploy through `az webapp deployment source config-zip`.
 */

import type { ZipDeployClient, ZipDeployRequest, ZipDeployResult } from "../postdeploy/types.js";
import { AzureCliWrapper } from "./wrapper.js";

export function zipDeployArgs(request: ZipDeployRequest): string[] {
  return [
    "webapp",
    "deployment",
    "source",
    "config-zip",
    "--resource-group",
    request.resourceGroup,
    "--name",
    request.webAppName,
    "--src",
    request.zipPath,
  ];
}

export class AzureCliZipDeployClient implements ZipDeployClient {
  private cli: AzureCliWrapper;

  constructor(cli?: AzureCliWrapper) {
    this.cli = cli ?? new AzureCliWrapper();
  }

  async deploy(request: ZipDeployRequest, signal?: AbortSignal): Promise<ZipDeployResult> {
    const result = await this.cli.execute(zipDeployArgs(request), { signal });
    if (result.success) {
      return { success: true, output: result.stdout };
    }
    return { success: false, output: result.stdout, error: result.stderr };
  }
}
