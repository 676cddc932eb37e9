export {
  SERVER_FARM_TYPE,
  SERVER_FARM_API_VERSION,
  Skus,
  skuTier,
  skuName,
  workerSizeCode,
  isDynamicPlan,
  isReserved,
  serializeServerFarm,
} from "./server-farm.js";
export { SITE_TYPE, SITE_API_VERSION, siteKind, settingValue, serializeSite } from "./site.js";
export {
  type ServicePlanInput,
  type ServicePlanSettings,
  ServicePlanConfig,
  createServicePlan,
  resolvePlanSettings,
} from "./service-plan.js";
export {
  type WebAppInput,
  type WebAppPlanInput,
  WebAppConfig,
  createWebApp,
  literalSetting,
  secureSetting,
} from "./web-app.js";
export type {
  Sku,
  SkuKind,
  WorkerSize,
  OperatingSystem,
  Setting,
  ServerFarmResource,
  SiteResource,
} from "./types.js";
