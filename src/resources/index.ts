export { AzureResourceManager } from "./manager.js";
export type { ResourceGroup } from "./types.js";
