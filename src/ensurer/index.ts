export { ResourceEnsurer, specKey } from "./ensurer.js";
export type { ResourceEnsurerOptions } from "./ensurer.js";
export type { ResourceDriver, ResourceIdentity, EnsureOutcome } from "./types.js";
