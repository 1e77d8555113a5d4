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
 * Resolves a validated SAML assertion to exactly one local user.
 *
 * Under the provider's lane of the mapping lock, in order:
 *   1. extract the remote user ID;
 *   2. reuse an existing external-ID binding;
 *   3. adopt a pre-existing account named after the grandfathered attribute;
 *   4. allocate a free localpart, register it and bind it.
 * The binding row is written only after registration succeeds.
 */

import type { AccountStore } from "../storage/account-store.js";
import { firstAttributeValue } from "./assertion.js";
import { ClientProtocolError, MappingProviderError, ResourceExhaustionError } from "./errors.js";
import type { KeyedLock } from "./keyed-lock.js";
import { hexEncode } from "./mapping/normalizer.js";
import type { UserMappingProvider } from "./mapping/provider.js";
import type { AccountRegistrar } from "./registration.js";
import type { MappingAttributes, ResolvedIdentity, ValidatedAssertion } from "./types.js";
import { formatUserId } from "./user-id.js";

export const MAX_LOCALPART_ATTEMPTS = 1000;

export type IdentityStore = Pick<
  AccountStore,
  "findBindingByExternalId" | "findAccountsByCaseInsensitiveId" | "createBinding"
>;

export type LocalpartAllocation =
  | { ok: true; attributes: MappingAttributes; attempt: number }
  | { ok: false; reason: "exhausted"; attempts: number };

export interface IdentityResolverOptions {
  authProviderId: string;
  serverName: string;
  store: IdentityStore;
  registrar: AccountRegistrar;
  mappingProvider: UserMappingProvider;
  lock: KeyedLock;
  grandfatheredMxidSourceAttribute?: string;
  maxAttempts?: number;
}

export class IdentityResolver {
  private readonly authProviderId: string;
  private readonly serverName: string;
  private readonly store: IdentityStore;
  private readonly registrar: AccountRegistrar;
  private readonly mappingProvider: UserMappingProvider;
  private readonly lock: KeyedLock;
  private readonly grandfatheredAttribute?: string;
  private readonly maxAttempts: number;

  constructor(options: IdentityResolverOptions) {
    this.authProviderId = options.authProviderId;
    this.serverName = options.serverName;
    this.store = options.store;
    this.registrar = options.registrar;
    this.mappingProvider = options.mappingProvider;
    this.lock = options.lock;
    this.grandfatheredAttribute = options.grandfatheredMxidSourceAttribute;
    this.maxAttempts = options.maxAttempts ?? MAX_LOCALPART_ATTEMPTS;
  }

  resolve(assertion: ValidatedAssertion, clientRedirectUrl: string): Promise<ResolvedIdentity> {
    return this.lock.runExclusive(this.authProviderId, () =>
      this.resolveLocked(assertion, clientRedirectUrl),
    );
  }

  /**
   * Ask the mapping provider for candidates until one names no existing
   * account (case-insensitively) or the attempt cap is reached.
   */
  async allocateLocalpart(
    assertion: ValidatedAssertion,
    clientRedirectUrl: string,
  ): Promise<LocalpartAllocation> {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const attributes = this.mappingProvider.toAttributes(assertion, attempt, clientRedirectUrl);
      console.debug(
        `[saml] Retrieved SAML attributes from user mapping provider: ${JSON.stringify(attributes)} (attempt ${attempt})`,
      );

      if (!attributes.localpart) {
        throw new MappingProviderError(
          "Error parsing SAML2 response: SAML mapping provider did not return a localpart value",
        );
      }

      const taken = await this.store.findAccountsByCaseInsensitiveId(
        formatUserId(attributes.localpart, this.serverName),
      );
      if (taken.size === 0) {
        return { ok: true, attributes, attempt };
      }
    }
    return { ok: false, reason: "exhausted", attempts: this.maxAttempts };
  }

  private async resolveLocked(
    assertion: ValidatedAssertion,
    clientRedirectUrl: string,
  ): Promise<ResolvedIdentity> {
    const remoteUserId = this.mappingProvider.toUserId(assertion, clientRedirectUrl);
    if (!remoteUserId) {
      throw new ClientProtocolError(
        "missing-attribute",
        "Failed to extract remote user id from SAML response",
      );
    }

    console.info(
      `[saml] Looking for existing mapping for user ${this.authProviderId}:${remoteUserId}`,
    );
    const boundUserId = await this.store.findBindingByExternalId(this.authProviderId, remoteUserId);
    if (boundUserId !== null) {
      console.info(`[saml] Found existing mapping ${boundUserId}`);
      return { userId: boundUserId, remoteUserId, outcome: "existing-binding" };
    }

    const adopted = await this.adoptGrandfatheredAccount(assertion, remoteUserId);
    if (adopted !== null) {
      return { userId: adopted, remoteUserId, outcome: "grandfathered" };
    }

    const allocation = await this.allocateLocalpart(assertion, clientRedirectUrl);
    if (!allocation.ok) {
      console.error(
        `[saml] Unable to allocate a localpart for ${this.authProviderId}:${remoteUserId} after ${allocation.attempts} attempts`,
      );
      throw new ResourceExhaustionError(allocation.attempts);
    }

    const { localpart, displayName, emails } = allocation.attributes;
    console.info(`[saml] Mapped SAML user to local part ${localpart}`);

    const userId = await this.registrar.provisionAccount({ localpart, displayName, emails });
    try {
      await this.store.createBinding(this.authProviderId, remoteUserId, userId);
    } catch (error) {
      console.error(
        `[saml] Registered ${userId} but could not bind ${this.authProviderId}:${remoteUserId}; the account has no external id`,
      );
      throw error;
    }
    return { userId, remoteUserId, outcome: "registered" };
  }

  /**
   * Accounts created before external-ID bindings existed were named after an
   * assertion attribute. Bind the remote user to such an account when exactly
   * one matches.
   */
  private async adoptGrandfatheredAccount(
    assertion: ValidatedAssertion,
    remoteUserId: string,
  ): Promise<string | null> {
    if (!this.grandfatheredAttribute) return null;

    const value = firstAttributeValue(assertion, this.grandfatheredAttribute);
    if (value === undefined) return null;

    const candidate = formatUserId(hexEncode(value), this.serverName);
    console.info(
      `[saml] Looking for existing account based on mapped ${this.grandfatheredAttribute} ${candidate}`,
    );

    const matches = await this.store.findAccountsByCaseInsensitiveId(candidate);
    if (matches.size !== 1) {
      if (matches.size > 1) {
        console.warn(
          `[saml] ${matches.size} accounts match ${candidate} case-insensitively; not grandfathering`,
        );
      }
      return null;
    }

    const [userId] = matches.keys();
    if (userId === undefined) return null;

    console.info(`[saml] Grandfathering mapping to ${userId}`);
    await this.store.createBinding(this.authProviderId, remoteUserId, userId);
    return userId;
  }
}
