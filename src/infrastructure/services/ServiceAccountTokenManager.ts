import jwt from "jsonwebtoken";
import { z } from "zod";
import { AccessToken } from "../../domain/value-objects/AccessToken";
import { ServiceAccountCredentials } from "../../domain/value-objects/ServiceAccountCredentials";
import { TokenProvider, TokenState } from "../../domain/services/TokenProvider";
import { TokenRequestError, describeError } from "../../domain/errors/ShipperErrors";
import { Logger } from "../../application/interfaces/Logger";
import { backendErrorSchema } from "./backendErrors";

export const LOGGING_WRITE_SCOPE = "https://www.googleapis.com/auth/logging.write";
export const JWT_BEARER_GRANT_TYPE = "urn:ietf:params:oauth:grant-type:jwt-bearer";

const ASSERTION_LIFETIME_SECONDS = 3600;
const DEFAULT_TIMEOUT_MS = 30000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().nonnegative(),
  token_type: z.string(),
});

export interface TokenManagerOptions {
  scopes?: string[];
  timeoutMs?: number;
  clock?: () => number;
}

/**
 * Exchanges a signed service-account assertion for a short-lived bearer
 * token and caches it. While a refresh is running every caller waits on
 * the same promise.
 */
export class ServiceAccountTokenManager implements TokenProvider {
  private cachedToken?: AccessToken;
  private refreshing?: Promise<AccessToken>;
  private readonly scopes: string[];
  private readonly timeoutMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly credentials: ServiceAccountCredentials,
    private readonly logger: Logger,
    options: TokenManagerOptions = {}
  ) {
    this.scopes = options.scopes ?? [LOGGING_WRITE_SCOPE];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;
  }

  public getState(): TokenState {
    if (!this.cachedToken) {
      return "noToken";
    }
    return this.cachedToken.isExpired(this.clock()) ? "expired" : "valid";
  }

  public getToken(): Promise<AccessToken> {
    if (this.cachedToken && !this.cachedToken.isExpired(this.clock())) {
      return Promise.resolve(this.cachedToken);
    }
    if (!this.refreshing) {
      this.refreshing = this.requestToken()
        .then((token) => {
          this.cachedToken = token;
          return token;
        })
        .finally(() => {
          this.refreshing = undefined;
        });
    }
    return this.refreshing;
  }

  /**
   * Builds the RS256 assertion posted to the token endpoint.
   */
  public createAssertion(): string {
    const issuedAt = Math.floor(this.clock() / 1000);
    try {
      return jwt.sign(
        {
          iss: this.credentials.clientEmail,
          aud: this.credentials.tokenUri,
          scope: this.scopes.join(" "),
          iat: issuedAt,
          exp: issuedAt + ASSERTION_LIFETIME_SECONDS,
        },
        this.credentials.privateKey,
        { algorithm: "RS256", header: { alg: "RS256", typ: "JWT" } }
      );
    } catch (error) {
      throw new TokenRequestError(`Failed to sign token assertion: ${describeError(error)}`, "signingFailed", {
        originalError: error instanceof Error ? error : undefined,
      });
    }
  }

  private async requestToken(): Promise<AccessToken> {
    const tokenUri = this.credentials.tokenUri;
    let url: URL;
    try {
      url = new URL(tokenUri);
    } catch {
      throw new TokenRequestError(`Invalid token endpoint URL: ${tokenUri}`, "invalidUrl");
    }

    const assertion = this.createAssertion();

    this.logger.debug("Requesting access token", { tokenUri });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    timeout.unref?.();

    let response: Response;
    let body: string;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ grant_type: JWT_BEARER_GRANT_TYPE, assertion }),
        signal: controller.signal,
      });
      body = await response.text();
    } catch (error) {
      this.logger.warn("Token request transport failure", { error: describeError(error) });
      throw new TokenRequestError(`Token request failed: ${describeError(error)}`, "transport", {
        originalError: error instanceof Error ? error : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    const token = this.parseTokenResponse(response.status, response.ok, body);
    this.logger.info("Access token refreshed", { expiresIn: token.expiresIn });
    return token;
  }

  private parseTokenResponse(status: number, ok: boolean, body: string): AccessToken {
    if (body.trim().length === 0) {
      throw new TokenRequestError(`No data received from token endpoint (HTTP ${status})`, "noDataReceived", {
        httpStatus: status,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch {
      throw new TokenRequestError(`Unreadable token response (HTTP ${status})`, "noDataReceived", {
        httpStatus: status,
      });
    }

    const backendError = backendErrorSchema.safeParse(payload);
    if (backendError.success) {
      const details = backendError.data;
      throw new TokenRequestError(`Token request rejected: ${details.message}`, "errorReceived", {
        httpStatus: status,
        backendError: details,
      });
    }

    if (!ok) {
      throw new TokenRequestError(`Token request failed with HTTP ${status}`, "noDataReceived", {
        httpStatus: status,
      });
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenRequestError(`Unexpected token response (HTTP ${status})`, "noDataReceived", {
        httpStatus: status,
      });
    }

    if (parsed.data.token_type !== "Bearer") {
      throw new TokenRequestError(`Wrong token type: ${parsed.data.token_type}`, "wrongTokenType", {
        tokenType: parsed.data.token_type,
      });
    }

    return AccessToken.issue(parsed.data.access_token, parsed.data.expires_in, this.clock());
  }
}
