/**
 * Microsoft.Web/sites serialization.
 *
 * Unset optional site settings are omitted from the JSON, never written as null.
 */

import { parameterReference } from "../core/expression.js";
import type { FeatureFlag, JsonObject } from "../core/types.js";
import { armLocation } from "../core/types.js";
import type { OperatingSystem, Setting, SiteResource } from "./types.js";

export const SITE_TYPE = "Microsoft.Web/sites";
export const SITE_API_VERSION = "2016-08-01";

const SITE_KINDS: Record<OperatingSystem, string> = {
  Windows: "app",
  Linux: "app,linux",
};

const IDENTITY_TYPES: Record<FeatureFlag, string> = {
  Enabled: "SystemAssigned",
  Disabled: "None",
};

export function siteKind(os: OperatingSystem): string {
  return SITE_KINDS[os];
}

export function settingValue(setting: Setting): string {
  return setting.kind === "literal" ? setting.value : parameterReference(setting.parameter);
}

type OptionalSiteConfigKey =
  | "linuxFxVersion"
  | "appCommandLine"
  | "netFrameworkVersion"
  | "javaVersion"
  | "javaContainer"
  | "javaContainerVersion"
  | "phpVersion"
  | "pythonVersion"
  | "http20Enabled"
  | "webSocketsEnabled";

const OPTIONAL_SITE_CONFIG_KEYS: readonly OptionalSiteConfigKey[] = [
  "linuxFxVersion",
  "appCommandLine",
  "netFrameworkVersion",
  "javaVersion",
  "javaContainer",
  "javaContainerVersion",
  "phpVersion",
  "pythonVersion",
  "http20Enabled",
  "webSocketsEnabled",
];

export function serializeSite(site: SiteResource): JsonObject {
  const siteConfig: JsonObject = {
    alwaysOn: site.alwaysOn,
    appSettings: site.appSettings.map(([name, setting]) => ({ name, value: settingValue(setting) })),
  };
  for (const key of OPTIONAL_SITE_CONFIG_KEYS) {
    const value = site[key];
    if (value !== undefined) siteConfig[key] = value;
  }
  siteConfig.metadata = site.metadata.map(([name, value]) => ({ name, value }));

  const properties: JsonObject = {
    serverFarmId: site.servicePlan,
    httpsOnly: site.httpsOnly,
  };
  if (site.clientAffinityEnabled !== undefined) properties.clientAffinityEnabled = site.clientAffinityEnabled;
  properties.siteConfig = siteConfig;

  const json: JsonObject = {
    type: SITE_TYPE,
    apiVersion: SITE_API_VERSION,
    name: site.name,
    location: armLocation(site.location),
    dependsOn: [...site.dependencies],
    kind: site.siteKind,
  };
  if (site.identity !== undefined) json.identity = { type: IDENTITY_TYPES[site.identity] };
  json.properties = properties;
  return json;
}
