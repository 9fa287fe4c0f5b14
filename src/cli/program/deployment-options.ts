import type { Command } from "commander";

import { parseList } from "../cli-utils.js";

/** Options every command that builds a deployment configuration accepts. */
export function addDeploymentOptions(command: Command): Command {
  return command
    .option("--config <file>", "JSON file with deployment parameters (flags win over it)")
    .option("--prefix <prefix>", "Name prefix for every resource (3-21 lowercase chars)")
    .option("--location <region>", "Azure region, e.g. eastus")
    .option("--tenant <id>", "Entra ID tenant ID (default: AZURE_TENANT_ID)")
    .option("--subscription <id>", "Azure subscription ID (default: AZURE_SUBSCRIPTION_ID)")
    .option("--admin-users <emails>", "Publisher admin emails, comma separated", parseList)
    .option("--fulfillment-app-id <id>", "Reuse an existing fulfillment app registration")
    .option("--fulfillment-app-secret <secret>", "Client secret of the reused fulfillment app")
    .option("--landing-page-app-id <id>", "Reuse an existing landing page app registration")
    .option("--admin-portal-app-id <id>", "Reuse an existing admin portal app registration")
    .option("--key-vault <name>", "Key Vault name (default: <prefix>-kv)")
    .option("--resource-group <name>", "Resource group (default: <prefix>)")
    .option("--sql-database <name>", "SQL database name (default: AMPSaaSDB)")
    .option("--logo-png <url>", "PNG logo downloaded into both sites")
    .option("--logo-ico <url>", "ICO favicon downloaded into both sites")
    .option("--client-ip <ip>", "Open the SQL firewall to this address")
    .option("--source-root <dir>", "Root of the web project sources (default: .)")
    .option("--allow-sql-password-fallback", "Create a SQL password admin when no Entra admin can be set")
    .option("-q, --quiet", "Only warnings and errors; no progress output")
    .option("-v, --verbose", "Debug logging, including every control-plane call");
}
