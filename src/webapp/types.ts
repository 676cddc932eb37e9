/**
 * Azure Web Apps: Type Definitions
 */

import type { SecureParameter } from "../core/expression.js";
import type { FeatureFlag, Location, ResourceName } from "../core/types.js";

// =============================================================================
// Service Plan
// =============================================================================

/** App Service plan pricing. Code-carrying cases hold the SKU code used verbatim. */
export type Sku =
  | { kind: "Free" }
  | { kind: "Shared" }
  | { kind: "Basic"; code: string }
  | { kind: "Standard"; code: string }
  | { kind: "Premium"; code: string }
  | { kind: "PremiumV2"; code: string }
  | { kind: "Dynamic" }
  | { kind: "Isolated"; code: string };

export type SkuKind = Sku["kind"];

export type WorkerSize = "Small" | "Medium" | "Large" | "Serverless";

export type OperatingSystem = "Windows" | "Linux";

// =============================================================================
// App Settings
// =============================================================================

export type Setting =
  | { kind: "literal"; value: string }
  | { kind: "secure"; parameter: SecureParameter };

// =============================================================================
// ARM Resource Records
// =============================================================================

export type ServerFarmResource = {
  kind: "serverfarm";
  name: ResourceName;
  location: Location;
  sku: Sku;
  workerSize: WorkerSize;
  workerCount: number;
  operatingSystem: OperatingSystem;
};

export type SiteResource = {
  kind: "site";
  name: ResourceName;
  location: Location;
  servicePlan: ResourceName;
  appSettings: ReadonlyArray<readonly [string, Setting]>;
  alwaysOn: boolean;
  httpsOnly: boolean;
  http20Enabled?: boolean;
  clientAffinityEnabled?: boolean;
  webSocketsEnabled?: boolean;
  dependencies: readonly ResourceName[];
  siteKind: string;
  identity?: FeatureFlag;
  linuxFxVersion?: string;
  appCommandLine?: string;
  netFrameworkVersion?: string;
  javaVersion?: string;
  javaContainer?: string;
  javaContainerVersion?: string;
  phpVersion?: string;
  pythonVersion?: string;
  metadata: ReadonlyArray<readonly [string, string]>;
};
