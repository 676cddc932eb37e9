/**
 * Web App configuration
 *
 * A web app compiles to a Microsoft.Web/sites resource and, unless it runs on
 * an existing plan, the plan it is hosted on. Configuring a zip deploy path
 * adds a post-deploy action that uploads the package once the site exists.
 */

import { describeResource } from "../arm/resources.js";
import type { PeerContext, ResourceBuilder, ResourceDescriptor } from "../core/builder.js";
import { DeploymentError } from "../core/errors.js";
import type { SecureParameter } from "../core/expression.js";
import { secureParameter } from "../core/expression.js";
import type { FeatureFlag, Location, ResourceName } from "../core/types.js";
import { resourceName } from "../core/types.js";
import type { PostDeployAction, PostDeployContext, PostDeployActionResult } from "../postdeploy/types.js";
import { classifyArtifact, materializeArtifact } from "../zipdeploy/artifact.js";
import { SERVER_FARM_TYPE } from "./server-farm.js";
import { resolvePlanSettings, serverFarmResource, type ServicePlanSettings } from "./service-plan.js";
import { siteKind } from "./site.js";
import type { OperatingSystem, Setting, SiteResource, Sku, WorkerSize } from "./types.js";

// =============================================================================
// Input
// =============================================================================

export type WebAppPlanInput =
  | {
      kind: "new";
      /** Default: `<web app name>-plan`. */
      name?: string;
      sku?: Sku;
      workerSize?: WorkerSize;
      workerCount?: number;
    }
  | { kind: "existing"; name: string };

export type WebAppInput = {
  name: string;
  /** Default: a new plan named `<name>-plan`. */
  servicePlan?: WebAppPlanInput;
  /** Default: Windows. */
  operatingSystem?: OperatingSystem;
  /** Ordered app settings. */
  appSettings?: ReadonlyArray<readonly [string, Setting]>;
  alwaysOn?: boolean;
  httpsOnly?: boolean;
  http20Enabled?: boolean;
  clientAffinityEnabled?: boolean;
  webSocketsEnabled?: boolean;
  identity?: FeatureFlag;
  linuxFxVersion?: string;
  appCommandLine?: string;
  netFrameworkVersion?: string;
  javaVersion?: string;
  javaContainer?: string;
  javaContainerVersion?: string;
  phpVersion?: string;
  pythonVersion?: string;
  metadata?: ReadonlyArray<readonly [string, string]>;
  dependsOn?: readonly ResourceName[];
  /** Folder or .zip file uploaded after deployment. */
  zipDeployPath?: string;
};

// =============================================================================
// Setting helpers
// =============================================================================

export function literalSetting(value: string): Setting {
  return { kind: "literal", value };
}

/** A setting whose value is supplied as a secure parameter of the same name. */
export function secureSetting(name: string): Setting {
  return { kind: "secure", parameter: secureParameter(name) };
}

// =============================================================================
// WebAppConfig
// =============================================================================

type ResolvedPlan =
  | { kind: "new"; name: ResourceName; settings: ServicePlanSettings }
  | { kind: "existing"; name: ResourceName };

type SiteOptions = Omit<SiteResource, "kind" | "name" | "location" | "servicePlan" | "dependencies">;

export class WebAppConfig implements ResourceBuilder {
  readonly name: ResourceName;
  readonly plan: ResolvedPlan;
  readonly dependencies: readonly ResourceName[];
  readonly zipDeployPath?: string;
  private readonly site: SiteOptions;

  constructor(name: ResourceName, plan: ResolvedPlan, site: SiteOptions, dependencies: readonly ResourceName[], zipDeployPath?: string) {
    this.name = name;
    this.plan = plan;
    this.site = site;
    this.dependencies = dependencies;
    this.zipDeployPath = zipDeployPath;
    Object.freeze(this);
  }

  dependencyName(): ResourceName {
    return this.name;
  }

  build(location: Location, peers: PeerContext): readonly ResourceDescriptor[] {
    const descriptors: ResourceDescriptor[] = [];
    const plan = this.plan;

    if (plan.kind === "new" && !peers.has(plan.name, SERVER_FARM_TYPE)) {
      descriptors.push(describeResource(serverFarmResource(plan.name, location, plan.settings)));
    }

    // An existing plan declared in the same batch still has to be ordered first.
    const dependsOnPlan = plan.kind === "new" || peers.has(plan.name, SERVER_FARM_TYPE);
    const dependencies = dependsOnPlan ? [plan.name, ...this.dependencies] : [...this.dependencies];

    descriptors.push(
      describeResource({
        ...this.site,
        kind: "site",
        name: this.name,
        location,
        servicePlan: plan.name,
        dependencies: [...new Set(dependencies)],
      }),
    );
    return descriptors;
  }

  secureParameters(): readonly SecureParameter[] {
    const parameters: SecureParameter[] = [];
    for (const [, setting] of this.site.appSettings) {
      if (setting.kind === "secure") parameters.push(setting.parameter);
    }
    return parameters;
  }

  postDeployActions(): readonly PostDeployAction[] {
    const path = this.zipDeployPath;
    if (path === undefined) return [];

    const webAppName = this.name;
    return [
      {
        resourceName: webAppName,
        description: `Zip deploy ${path}`,
        run: (context) => runZipDeploy(webAppName, path, context),
      },
    ];
  }
}

async function runZipDeploy(webAppName: string, path: string, context: PostDeployContext): Promise<PostDeployActionResult> {
  const artifact = classifyArtifact(path);
  context.log.info(`Running ZIP deploy for ${artifact.path}`);
  const zipPath = materializeArtifact(artifact, context.targetFolder, context.signal);

  const result = await context.zipDeploy.deploy({ webAppName, resourceGroup: context.resourceGroup, zipPath }, context.signal);
  if (!result.success) {
    throw new DeploymentError(webAppName, `Zip deploy of ${zipPath} to "${webAppName}" failed: ${result.error ?? result.output}`, {
      context: { zipPath, resourceGroup: context.resourceGroup },
    });
  }
  return { detail: `Deployed ${zipPath} to ${webAppName}` };
}

/**
 * Finalize a web app configuration.
 */
export function createWebApp(input: WebAppInput): WebAppConfig {
  const name = resourceName(input.name);
  const operatingSystem = input.operatingSystem ?? "Windows";
  const planInput: WebAppPlanInput = input.servicePlan ?? { kind: "new" };

  const plan: ResolvedPlan =
    planInput.kind === "existing"
      ? { kind: "existing", name: resourceName(planInput.name) }
      : {
          kind: "new",
          name: resourceName(planInput.name ?? `${name}-plan`),
          settings: resolvePlanSettings({ ...planInput, operatingSystem }),
        };

  const site: SiteOptions = {
    appSettings: [...(input.appSettings ?? [])],
    alwaysOn: input.alwaysOn ?? false,
    httpsOnly: input.httpsOnly ?? false,
    http20Enabled: input.http20Enabled,
    clientAffinityEnabled: input.clientAffinityEnabled,
    webSocketsEnabled: input.webSocketsEnabled,
    siteKind: siteKind(operatingSystem),
    identity: input.identity,
    linuxFxVersion: input.linuxFxVersion,
    appCommandLine: input.appCommandLine,
    netFrameworkVersion: input.netFrameworkVersion,
    javaVersion: input.javaVersion,
    javaContainer: input.javaContainer,
    javaContainerVersion: input.javaContainerVersion,
    phpVersion: input.phpVersion,
    pythonVersion: input.pythonVersion,
    metadata: [...(input.metadata ?? [])],
  };

  return new WebAppConfig(name, plan, site, [...(input.dependsOn ?? [])], input.zipDeployPath);
}
