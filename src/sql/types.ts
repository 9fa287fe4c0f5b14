/**
 * Azure SQL Database: Type Definitions
 */

// =============================================================================
// SQL Server
// =============================================================================

export type SqlServer = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  fullyQualifiedDomainName?: string;
  administratorLogin?: string;
  entraAdminLogin?: string;
  state?: string;
  publicNetworkAccess?: string;
};

export type SqlPrincipalType = "User" | "Group" | "Application";

/** Entra ID principal set as the server administrator. */
export type SqlEntraAdmin = {
  login: string;
  objectId: string;
  principalType: SqlPrincipalType;
};

export type SqlServerOptions = {
  tenantId: string;
  entraAdmin: SqlEntraAdmin;
  /**
   * SQL-authentication administrator. Only set when password-based users are
   * explicitly allowed; without it the server accepts Entra authentication only.
   */
  sqlAdmin?: { login: string; password: string };
  tags?: Record<string, string>;
};

// =============================================================================
// SQL Database
// =============================================================================

export type SqlDatabase = {
  id: string;
  name: string;
  serverName: string;
  resourceGroup: string;
  location: string;
  status?: string;
  skuName?: string;
  collation?: string;
};

// =============================================================================
// Firewall Rule
// =============================================================================

export type SqlFirewallRule = {
  id: string;
  name: string;
  startIpAddress: string;
  endIpAddress: string;
};

/** The reserved 0.0.0.0 rule that lets Azure services reach the server. */
export const ALLOW_AZURE_SERVICES_RULE = "AllowAzureServices";

export const SQL_SERVER_DNS_SUFFIX = "database.windows.net";
