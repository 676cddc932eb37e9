/**
 * armgraph: Resource Graph Compiler
 *
 * Compiles typed Azure resource configurations (App Service plans and web
 * apps, Key Vaults and their secrets) into an ARM deployment template, the
 * secure parameters the template needs, and the actions to run once the
 * template has been applied.
 */

// Core
export * from "./src/core/index.js";

// Resource kinds
export * from "./src/webapp/index.js";
export * from "./src/keyvault/index.js";
export * from "./src/arm/index.js";
export * from "./src/zipdeploy/index.js";

// Compilation and output
export * from "./src/compiler/index.js";
export * from "./src/template/index.js";

// Deployment
export * from "./src/postdeploy/index.js";
export * from "./src/cli/index.js";
export * from "./src/deployment/index.js";

// Ambient
export * from "./src/logging/index.js";
export {
  settingsSchema,
  loadSettings,
  readSettingsFile,
  getDefaultSettings,
  type ArmGraphSettings,
} from "./src/config.js";
