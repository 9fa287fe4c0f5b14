/**
 * App Registration Provisioner
 *
 * Creates or reuses an Entra ID application, its service principal and (for
 * confidential clients) a password credential.
 */

import { ProvisioningError } from "../errors.js";
import { getLogger, type Logger } from "../logging/index.js";
import { waitUntilReady } from "../progress.js";
import { withPropagationRetry } from "../retry.js";
import type { PropagationRetryOptions, ReadinessOptions } from "../types.js";
import {
  MICROSOFT_GRAPH_APP_ID,
  USER_READ_SCOPE_ID,
  type AppRegConfig,
  type AppRegistration,
  type ApplicationManifest,
  type DirectoryClient,
  type GraphApplication,
} from "./types.js";

export const SECRET_VALIDITY_YEARS = 2;

export type AppRegistrationProvisionerOptions = {
  /** Bounds for polling the directory until a new application is visible. */
  visibility?: ReadinessOptions;
  propagationRetry?: PropagationRetryOptions;
  logger?: Logger;
  now?: () => Date;
};

export function buildManifest(config: AppRegConfig): ApplicationManifest {
  const manifest: ApplicationManifest = {
    displayName: config.displayName,
    signInAudience: config.signInAudience,
  };
  if (config.redirectUris && config.redirectUris.length > 0) {
    manifest.web = {
      redirectUris: config.redirectUris,
      logoutUrl: config.logoutUrl,
      implicitGrantSettings: { enableIdTokenIssuance: config.enableIdTokenIssuance ?? false },
    };
  }
  if (config.requestUserRead) {
    manifest.requiredResourceAccess = [
      { resourceAppId: MICROSOFT_GRAPH_APP_ID, resourceAccess: [{ id: USER_READ_SCOPE_ID, type: "Scope" }] },
    ];
  }
  return manifest;
}

export function secretExpiry(now: Date, years = SECRET_VALIDITY_YEARS): Date {
  const end = new Date(now.getTime());
  end.setUTCFullYear(end.getUTCFullYear() + years);
  return end;
}

export class AppRegistrationProvisioner {
  private directory: DirectoryClient;
  private options: AppRegistrationProvisionerOptions;
  private log: Logger;

  constructor(directory: DirectoryClient, options: AppRegistrationProvisionerOptions = {}) {
    this.directory = directory;
    this.options = options;
    this.log = options.logger ?? getLogger("identity");
  }

  async createOrReuse(config: AppRegConfig): Promise<AppRegistration> {
    if (config.applicationId) {
      return this.reuseSupplied(config, config.applicationId);
    }

    const existing = await this.directory.findApplicationsByDisplayName(config.displayName);
    if (existing.length > 1) {
      throw new ProvisioningError(
        "CONFLICT",
        `${existing.length} applications are named "${config.displayName}"`,
        {
          resourceKind: "app-registration",
          resourceName: config.displayName,
          operation: "lookup",
          remediation: "pass the intended application ID explicitly or remove the duplicates",
        },
      );
    }
    if (existing.length === 1) {
      const [app] = existing;
      this.log.info(`Reusing app registration "${config.displayName}" (${app.appId})`);
      await this.ensureServicePrincipal(app);
      if (!config.confidential) return toRegistration(app, config, false, undefined);
      if (config.hasPersistedSecret && (await config.hasPersistedSecret())) {
        this.log.info(`Client secret for "${config.displayName}" is already stored; not issuing another`);
        return toRegistration(app, config, false, undefined);
      }
      return toRegistration(app, config, false, await this.issueSecret(app, config));
    }

    return this.create(config);
  }

  /** Caller-supplied identity wins: nothing is created. */
  private async reuseSupplied(config: AppRegConfig, applicationId: string): Promise<AppRegistration> {
    const app = await this.directory.getApplicationByAppId(applicationId);
    if (!app) {
      throw new ProvisioningError(
        "NOT_FOUND",
        `Application ${applicationId} was not found in the tenant`,
        {
          resourceKind: "app-registration",
          resourceName: config.displayName,
          operation: "lookup",
          remediation: "check the application ID and the --tenant value",
        },
      );
    }
    this.log.info(`Using supplied application ${applicationId} for "${config.displayName}"`);

    let clientSecret = config.clientSecret;
    if (config.confidential && !clientSecret) {
      clientSecret = await this.issueSecret(app, config);
    }
    return toRegistration(app, config, false, clientSecret);
  }

  private async create(config: AppRegConfig): Promise<AppRegistration> {
    this.log.info(`Creating app registration "${config.displayName}"`);
    const app = await this.directory.createApplication(buildManifest(config));

    await waitUntilReady(
      { kind: "app-registration", name: config.displayName, operation: "create" },
      async () => (await this.directory.getApplicationByAppId(app.appId)) !== null,
      this.options.visibility,
    );

    await this.ensureServicePrincipal(app);
    const clientSecret = config.confidential ? await this.issueSecret(app, config) : undefined;
    return toRegistration(app, config, true, clientSecret);
  }

  private async ensureServicePrincipal(app: GraphApplication): Promise<void> {
    if (await this.directory.getServicePrincipalByAppId(app.appId)) return;
    await withPropagationRetry(
      { kind: "app-registration", name: app.displayName, operation: "create-service-principal" },
      () => this.directory.createServicePrincipal(app.appId),
      this.options.propagationRetry,
      (attempt) => this.log.warn(`Application ${app.appId} not yet replicated (attempt ${attempt}), retrying`),
    );
    this.log.info(`Created service principal for ${app.appId}`);
  }

  /**
   * Append a password credential and hand it to `persistSecret` at once.
   */
  private async issueSecret(app: GraphApplication, config: AppRegConfig): Promise<string> {
    const now = this.options.now?.() ?? new Date();
    const credential = await this.directory.addPassword(app.id, `${config.displayName}-secret`, secretExpiry(now));
    this.log.info(`Issued a client secret for "${config.displayName}"`, { expires: credential.endDateTime });
    if (config.persistSecret) await config.persistSecret(credential.secretText);
    return credential.secretText;
  }
}

function toRegistration(
  app: GraphApplication,
  config: AppRegConfig,
  created: boolean,
  clientSecret: string | undefined,
): AppRegistration {
  return {
    displayName: app.displayName,
    applicationId: app.appId,
    objectId: app.id,
    clientSecret,
    redirectUris: app.redirectUris.length > 0 ? app.redirectUris : config.redirectUris ?? [],
    signInAudience: config.signInAudience,
    created,
  };
}
