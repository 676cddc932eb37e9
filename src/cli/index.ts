export { AzureCliWrapper, createCliWrapper } from "./wrapper.js";
export { AzureCliZipDeployClient, zipDeployArgs } from "./zip-deploy.js";

export type { AzureCliOptions, AzureCliResult, AzureCliConfig } from "./wrapper.js";
