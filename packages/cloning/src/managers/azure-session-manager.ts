/**
 * Azure Session Manager
 *
 * Checks the credential chain for a usable Azure Resource Manager token.
 */

import type { TokenCredential } from "@azure/identity";
import { CloneError, errorMessage } from "../errors";
import type { CloneLogCallback } from "../types";
import type { IAzureSessionManager, SessionInfo } from "./interfaces";

export const ARM_SCOPE = "https://management.azure.com/.default";

export class AzureSessionManager implements IAzureSessionManager {
  constructor(
    private readonly credential: TokenCredential,
    private readonly subscriptionId: string,
    private readonly log: CloneLogCallback
  ) {}

  async verifySession(): Promise<SessionInfo> {
    const token = await this.credential.getToken(ARM_SCOPE).catch((error: unknown) => {
      throw new CloneError(
        "Unauthenticated",
        `No active Azure session: ${errorMessage(error)}`,
        { cause: error }
      );
    });

    if (!token) {
      throw new CloneError("Unauthenticated", "No active Azure session: credential returned no token");
    }

    this.log(`  Authenticated for subscription ${this.subscriptionId}`);
    return {
      subscriptionId: this.subscriptionId,
      expiresOn: new Date(token.expiresOnTimestamp),
    };
  }
}
