/**
 * Credentials Manager
 *
 * Resolves an @azure/identity credential for the configured method and
 * produces the explicit ProvisioningContext every manager receives. Tokens
 * for downstream audiences are refreshed ahead of the steps that need them.
 */

import type { AccessToken, TokenCredential } from "@azure/identity";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { emitDiagnosticEvent } from "../diagnostics.js";
import { ProvisioningError, errorMessageOf } from "../errors.js";
import type { ProvisioningContext } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CredentialMethod = "default" | "cli" | "service-principal" | "managed-identity";

export type CredentialsManagerOptions = {
  tenantId: string;
  subscriptionId: string;
  credentialMethod?: CredentialMethod;
  /** Remaining lifetime below which a cached token is refreshed. */
  refreshWindowMs?: number;
};

/** Audiences the provisioning run talks to. */
export const TOKEN_AUDIENCES = {
  management: "https://management.azure.com",
  graph: "https://graph.microsoft.com",
  sql: "https://database.windows.net",
} as const;

export type TokenAudience = (typeof TOKEN_AUDIENCES)[keyof typeof TOKEN_AUDIENCES];

const tokenClaimsSchema = Type.Object({
  oid: Type.String(),
  upn: Type.Optional(Type.String()),
  unique_name: Type.Optional(Type.String()),
  preferred_username: Type.Optional(Type.String()),
  appid: Type.Optional(Type.String()),
  idtyp: Type.Optional(Type.String()),
});

type TokenClaims = Static<typeof tokenClaimsSchema>;

/** The Entra principal the run is signed in as. */
export type SignedInPrincipal = {
  objectId: string;
  /** UPN for users, application (client) ID for service principals. */
  login: string;
  principalType: "User" | "Application";
};

/**
 * Read the caller's identity from an access token's claims. The signature is
 * not checked: the token came straight from the credential.
 */
export function principalFromToken(token: string): SignedInPrincipal {
  const payload = token.split(".")[1];
  let claims: unknown;
  try {
    claims = JSON.parse(Buffer.from(payload ?? "", "base64url").toString("utf8"));
  } catch (error) {
    throw new ProvisioningError("AUTHENTICATION", "The access token is not a JWT", { cause: error });
  }
  if (!Value.Check(tokenClaimsSchema, claims)) {
    throw new ProvisioningError("AUTHENTICATION", "The access token carries no object ID (oid) claim");
  }
  return toPrincipal(claims);
}

function toPrincipal(claims: TokenClaims): SignedInPrincipal {
  const userName = claims.upn ?? claims.unique_name ?? claims.preferred_username;
  if (claims.idtyp === "app" || (!userName && claims.appid)) {
    return { objectId: claims.oid, login: claims.appid ?? claims.oid, principalType: "Application" };
  }
  return { objectId: claims.oid, login: userName ?? claims.oid, principalType: "User" };
}

// =============================================================================
// Credentials Manager
// =============================================================================

export class CredentialsManager {
  private options: Required<CredentialsManagerOptions>;
  private credential: TokenCredential | null = null;
  private tokens = new Map<string, AccessToken>();

  constructor(options: CredentialsManagerOptions) {
    this.options = {
      credentialMethod: "default",
      refreshWindowMs: 5 * 60_000,
      ...options,
    };
  }

  async getCredential(): Promise<TokenCredential> {
    if (!this.credential) {
      this.credential = await this.createCredential(this.options.credentialMethod);
    }
    return this.credential;
  }

  /**
   * The explicit session value threaded through every manager. Tenant and
   * subscription come from configuration, never from a CLI login session.
   */
  async getContext(): Promise<ProvisioningContext> {
    return {
      tenantId: this.options.tenantId,
      subscriptionId: this.options.subscriptionId,
      credential: await this.getCredential(),
    };
  }

  /**
   * Get a bearer token for an audience, reusing a cached token until it is
   * inside the refresh window.
   */
  async getAccessToken(audience: TokenAudience): Promise<string> {
    const cached = this.tokens.get(audience);
    if (cached && cached.expiresOnTimestamp - Date.now() > this.options.refreshWindowMs) {
      return cached.token;
    }
    const token = await this.requestToken(audience);
    return token.token;
  }

  /**
   * Refresh tokens for the given audiences before they are used. A failed
   * refresh aborts; it is not retried.
   */
  async refreshTokens(audiences: readonly TokenAudience[]): Promise<void> {
    for (const audience of audiences) {
      await this.requestToken(audience);
    }
  }

  /** Identity of the signed-in caller, read from a management token. */
  async getSignedInPrincipal(): Promise<SignedInPrincipal> {
    return principalFromToken(await this.getAccessToken(TOKEN_AUDIENCES.management));
  }

  clearCache(): void {
    this.credential = null;
    this.tokens.clear();
  }

  private async requestToken(audience: TokenAudience): Promise<AccessToken> {
    const credential = await this.getCredential();
    let token: AccessToken | null;
    try {
      token = await credential.getToken(`${audience}/.default`, { tenantId: this.options.tenantId });
    } catch (error) {
      throw new ProvisioningError(
        "AUTHENTICATION",
        `Could not acquire a token for ${audience}: ${errorMessageOf(error)}`,
        { operation: "get-token", remediation: "sign in again (az login) or check the service principal", cause: error },
      );
    }
    if (!token) {
      throw new ProvisioningError("AUTHENTICATION", `No token was returned for ${audience}`, {
        operation: "get-token",
      });
    }
    this.tokens.set(audience, token);
    emitDiagnosticEvent({
      type: "azure.credential.refresh",
      service: "identity",
      operation: "get-token",
      metadata: { audience, expiresOn: new Date(token.expiresOnTimestamp).toISOString() },
    });
    return token;
  }

  private async createCredential(method: CredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");
    const tenantId = this.options.tenantId;

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential({ tenantId });

      case "service-principal": {
        const clientId = process.env.AZURE_CLIENT_ID;
        const clientSecret = process.env.AZURE_CLIENT_SECRET;
        if (!clientId || !clientSecret) {
          throw new ProvisioningError(
            "AUTHENTICATION",
            "Service principal auth requires AZURE_CLIENT_ID and AZURE_CLIENT_SECRET",
          );
        }
        return new identity.ClientSecretCredential(tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = process.env.AZURE_CLIENT_ID;
        return clientId
          ? new identity.ManagedIdentityCredential({ clientId })
          : new identity.ManagedIdentityCredential();
      }

      case "default":
      default:
        return new identity.DefaultAzureCredential({ tenantId });
    }
  }
}

export function createCredentialsManager(options: CredentialsManagerOptions): CredentialsManager {
  return new CredentialsManager(options);
}
