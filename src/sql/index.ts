export { AzureSQLManager } from "./manager.js";
export { ALLOW_AZURE_SERVICES_RULE, SQL_SERVER_DNS_SUFFIX } from "./types.js";
export type {
  SqlServer,
  SqlServerOptions,
  SqlEntraAdmin,
  SqlPrincipalType,
  SqlDatabase,
  SqlFirewallRule,
} from "./types.js";
