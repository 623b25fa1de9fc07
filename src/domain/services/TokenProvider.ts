import { AccessToken } from "../value-objects/AccessToken";

export type TokenState = "noToken" | "valid" | "expired";

export interface TokenProvider {
  /**
   * Resolve a usable access token, refreshing it when needed. Concurrent
   * callers share one refresh.
   */
  getToken(): Promise<AccessToken>;

  getState(): TokenState;
}
