/**
 * Microsoft.Web/serverfarms serialization.
 */

import type { JsonObject } from "../core/types.js";
import { armLocation } from "../core/types.js";
import type { OperatingSystem, ServerFarmResource, Sku, SkuKind, WorkerSize } from "./types.js";

export const SERVER_FARM_TYPE = "Microsoft.Web/serverfarms";
export const SERVER_FARM_API_VERSION = "2018-02-01";

const SKU_TIERS: Record<SkuKind, string> = {
  Free: "Free",
  Shared: "Shared",
  Basic: "Basic",
  Standard: "Standard",
  Premium: "Premium",
  PremiumV2: "PremiumV2",
  Dynamic: "Dynamic",
  Isolated: "Isolated",
};

const FIXED_SKU_NAMES = {
  Free: "F1",
  Shared: "D1",
  Dynamic: "Y1",
} as const;

const WORKER_SIZE_CODES: Record<WorkerSize, string> = {
  Small: "0",
  Medium: "1",
  Large: "2",
  Serverless: "Y1",
};

/** Common SKUs by their portal code. */
export const Skus = {
  F1: { kind: "Free" },
  D1: { kind: "Shared" },
  B1: { kind: "Basic", code: "B1" },
  B2: { kind: "Basic", code: "B2" },
  B3: { kind: "Basic", code: "B3" },
  S1: { kind: "Standard", code: "S1" },
  S2: { kind: "Standard", code: "S2" },
  S3: { kind: "Standard", code: "S3" },
  P1: { kind: "Premium", code: "P1" },
  P2: { kind: "Premium", code: "P2" },
  P3: { kind: "Premium", code: "P3" },
  P1V2: { kind: "PremiumV2", code: "P1V2" },
  P2V2: { kind: "PremiumV2", code: "P2V2" },
  P3V2: { kind: "PremiumV2", code: "P3V2" },
  I1: { kind: "Isolated", code: "I1" },
  I2: { kind: "Isolated", code: "I2" },
  I3: { kind: "Isolated", code: "I3" },
  Y1: { kind: "Isolated", code: "Y1" },
} as const satisfies Record<string, Sku>;

export function skuTier(sku: Sku): string {
  return SKU_TIERS[sku.kind];
}

export function skuName(sku: Sku): string {
  switch (sku.kind) {
    case "Free":
    case "Shared":
    case "Dynamic":
      return FIXED_SKU_NAMES[sku.kind];
    case "Basic":
    case "Standard":
    case "Premium":
    case "PremiumV2":
    case "Isolated":
      return sku.code;
  }
}

export function workerSizeCode(size: WorkerSize): string {
  return WORKER_SIZE_CODES[size];
}

/** Consumption (serverless) plans: Isolated "Y1" running on Serverless workers. */
export function isDynamicPlan(sku: Sku, workerSize: WorkerSize): boolean {
  return sku.kind === "Isolated" && sku.code === "Y1" && workerSize === "Serverless";
}

/** ARM uses `reserved` as its Linux marker. */
export function isReserved(os: OperatingSystem): boolean {
  return os === "Linux";
}

export function serializeServerFarm(farm: ServerFarmResource): JsonObject {
  const dynamic = isDynamicPlan(farm.sku, farm.workerSize);

  const sku: JsonObject = {
    name: skuName(farm.sku),
    tier: skuTier(farm.sku),
    size: workerSizeCode(farm.workerSize),
  };
  if (dynamic) sku.family = "Y";
  sku.capacity = dynamic ? 0 : farm.workerCount;

  const properties: JsonObject = { name: farm.name };
  if (dynamic) properties.computeMode = "Dynamic";
  properties.perSiteScaling = dynamic ? null : false;
  properties.reserved = isReserved(farm.operatingSystem);

  const json: JsonObject = {
    type: SERVER_FARM_TYPE,
    apiVersion: SERVER_FARM_API_VERSION,
    name: farm.name,
    location: armLocation(farm.location),
  };
  if (farm.operatingSystem === "Linux") json.kind = "linux";
  json.sku = sku;
  json.properties = properties;
  return json;
}
