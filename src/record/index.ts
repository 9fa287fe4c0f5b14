export {
  DEFAULT_RECORD_PATH,
  buildDeploymentRecord,
  deploymentRecordSchema,
  readDeploymentRecord,
  writeDeploymentRecord,
} from "./deployment-record.js";
export type { DeploymentRecord } from "./deployment-record.js";
