// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Account registration for SSO just-in-time provisioning.
 */

import type { AccountStore } from "../storage/account-store.js";
import { RegistrationError } from "./errors.js";
import { MAX_USER_ID_LENGTH, formatUserId, isValidLocalpart } from "./user-id.js";

export interface ProvisionAccountRequest {
  localpart: string;
  displayName?: string;
  emails: readonly string[];
}

export interface AccountRegistrar {
  /**
   * Create a new local account.
   * @returns the full user ID of the new account.
   */
  provisionAccount(request: ProvisionAccountRequest): Promise<string>;
}

/**
 * Registrar that writes straight to the account store. The display name
 * defaults to the localpart.
 */
export class StoreAccountRegistrar implements AccountRegistrar {
  constructor(
    private readonly store: AccountStore,
    private readonly serverName: string,
  ) {}

  async provisionAccount(request: ProvisionAccountRequest): Promise<string> {
    const { localpart } = request;
    if (!isValidLocalpart(localpart)) {
      throw new RegistrationError(
        "invalid-localpart",
        `User ID can only contain characters a-z, 0-9, or '=_-./': ${localpart}`,
      );
    }

    const userId = formatUserId(localpart, this.serverName);
    if (userId.length > MAX_USER_ID_LENGTH) {
      throw new RegistrationError(
        "invalid-localpart",
        `User ID may not be longer than ${MAX_USER_ID_LENGTH} characters`,
      );
    }

    const existing = await this.store.findAccountsByCaseInsensitiveId(userId);
    if (existing.size > 0) {
      throw new RegistrationError("user-id-taken", `User ID already taken: ${userId}`);
    }

    const account = await this.store.createAccount({
      userId,
      displayName: request.displayName ?? localpart,
      emails: request.emails,
    });
    console.info(`[saml] Registered new user ${account.userId}`);
    return account.userId;
  }
}
