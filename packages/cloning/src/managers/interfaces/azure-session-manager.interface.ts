/**
 * Azure Session Manager Interface
 *
 * Verifies that the ambient credential chain (Azure CLI login, environment,
 * managed identity) can obtain a token for Azure Resource Manager.
 */

export interface SessionInfo {
  subscriptionId: string;
  /** When the acquired token expires */
  expiresOn: Date;
}

export interface IAzureSessionManager {
  /**
   * Acquire a management token.
   *
   * @throws CloneError with kind "Unauthenticated" when no session is available
   */
  verifySession(): Promise<SessionInfo>;
}
