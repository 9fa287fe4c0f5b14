export { AzureWebAppManager } from "./manager.js";
export { keyVaultReference } from "./types.js";
export type {
  WebApp,
  WebAppOptions,
  AppServicePlan,
  ConnectionStringSetting,
  ConnectionStringType,
} from "./types.js";
