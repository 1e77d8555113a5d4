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
 * SAML2 SSO handler: redirect initiation and assertion-response processing.
 */

import type { SamlClient } from "./adapters/saml-client.js";
import { ClientProtocolError } from "./errors.js";
import type { IdentityResolver } from "./identity-resolver.js";
import type { PendingSessionStore } from "./session/pending-session-store.js";
import type { ResolvedIdentity, ValidatedAssertion } from "./types.js";

export const AUTH_PROVIDER_ID = "saml";

/** Log pipelines truncate long fields; assertions are logged in pieces this size. */
export const ASSERTION_LOG_CHUNK_SIZE = 10000;

/** Hand-off to the login machinery once a local user is known. */
export interface LoginCompletionHandler<TRequest> {
  completeSsoUiAuth(userId: string, uiAuthSessionId: string, request: TRequest): Promise<void>;
  completeSsoLogin(userId: string, request: TRequest, relayState: string): Promise<void>;
}

export interface SamlHandlerOptions<TRequest> {
  samlClient: SamlClient;
  resolver: Pick<IdentityResolver, "resolve">;
  pendingSessions: PendingSessionStore;
  loginCompleter: LoginCompletionHandler<TRequest>;
  sessionLifetimeMs: number;
  allowUnsolicited?: boolean;
  /** Epoch milliseconds. */
  clock?: () => number;
}

export function chunkAssertionXml(xml: string, size = ASSERTION_LOG_CHUNK_SIZE): string[] {
  const chunks: string[] = [];
  for (let offset = 0; offset < xml.length; offset += size) {
    const index = offset / size;
    const chunk = xml.slice(offset, offset + size);
    chunks.push(index === 0 ? chunk : `(${index})...${chunk}`);
  }
  return chunks;
}

export class SamlHandler<TRequest> {
  private readonly samlClient: SamlClient;
  private readonly resolver: Pick<IdentityResolver, "resolve">;
  private readonly pendingSessions: PendingSessionStore;
  private readonly loginCompleter: LoginCompletionHandler<TRequest>;
  private readonly sessionLifetimeMs: number;
  private readonly allowUnsolicited: boolean;
  private readonly clock: () => number;

  constructor(options: SamlHandlerOptions<TRequest>) {
    this.samlClient = options.samlClient;
    this.resolver = options.resolver;
    this.pendingSessions = options.pendingSessions;
    this.loginCompleter = options.loginCompleter;
    this.sessionLifetimeMs = options.sessionLifetimeMs;
    this.allowUnsolicited = options.allowUnsolicited ?? false;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Start a login: record a pending session and return the IdP URL to
   * redirect the browser to. `clientRedirectUrl` comes back as the relay state.
   */
  async initiateRedirect(clientRedirectUrl: string, uiAuthSessionId?: string): Promise<string> {
    const request = await this.samlClient.prepareForAuthenticate(clientRedirectUrl);

    const location = request.headers.find(([name]) => name.toLowerCase() === "location");
    if (!location) {
      throw new Error("prepareForAuthenticate didn't return a Location header");
    }

    this.pendingSessions.create(request.requestId, this.clock(), uiAuthSessionId);
    return location[1];
  }

  /**
   * Process a POSTed SAMLResponse: verify it, map it to a local user
   * (registering one if needed) and complete the login.
   */
  async handleAssertionResponse(
    samlResponse: string,
    relayState: string,
    request: TRequest,
  ): Promise<void> {
    this.pendingSessions.sweepExpired(this.clock(), this.sessionLifetimeMs);

    let assertion: ValidatedAssertion;
    try {
      assertion = await this.samlClient.parseAndVerify(
        samlResponse,
        this.pendingSessions.outstandingRequestIds(),
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ClientProtocolError(
        "unparseable-response",
        `Unable to parse SAML2 response: ${message}`,
      );
    }

    if (!assertion.signed) {
      console.warn("[saml] SAML2 response was not signed");
      throw new ClientProtocolError("unsigned-response", "SAML2 response was not signed");
    }

    for (const xml of assertion.assertionXml) {
      for (const chunk of chunkAssertionXml(xml)) {
        console.debug(`[saml] SAML2 response: ${chunk}`);
      }
    }
    console.debug(`[saml] SAML2 mapped attributes: ${JSON.stringify(assertion.attributes)}`);

    const session =
      assertion.inResponseTo === undefined
        ? undefined
        : this.pendingSessions.popIfPresent(assertion.inResponseTo);
    if (!session && !this.allowUnsolicited) {
      console.warn(
        `[saml] SAML2 response answers no outstanding request (in_response_to=${assertion.inResponseTo ?? "none"})`,
      );
      throw new ClientProtocolError("unsolicited-response", "Unexpected SAML2 login");
    }

    const identity: ResolvedIdentity = await this.resolver.resolve(assertion, relayState);

    if (session?.uiAuthSessionId !== undefined) {
      await this.loginCompleter.completeSsoUiAuth(
        identity.userId,
        session.uiAuthSessionId,
        request,
      );
    } else {
      await this.loginCompleter.completeSsoLogin(identity.userId, request, relayState);
    }
  }
}
