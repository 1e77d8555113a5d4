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
 * SAML SSO entity types.
 */

/** An outstanding authentication request, keyed by the request ID the SAML library issued. */
export interface PendingSession {
  readonly requestId: string;
  /** Creation time in epoch milliseconds. */
  readonly creationTimeMs: number;
  /**
   * Set when this login attempt completes a step of an in-progress
   * user-interactive auth flow rather than a fresh login.
   */
  readonly uiAuthSessionId?: string;
}

/** Multi-valued attribute statement, as an IdP asserts it. */
export type AssertionAttributes = Readonly<Record<string, readonly string[]>>;

/** An assertion the SAML library has parsed and whose signature it has checked. */
export interface ValidatedAssertion {
  /** The request ID this response answers, absent for unsolicited responses. */
  inResponseTo?: string;
  signed: boolean;
  nameId?: string;
  attributes: AssertionAttributes;
  /** Raw assertion XML documents, for logging. */
  assertionXml: readonly string[];
}

/** New-user attributes proposed by a mapping provider for one allocation attempt. */
export interface MappingAttributes {
  localpart: string;
  displayName?: string;
  emails: readonly string[];
}

export interface SamlAttributeRequirements {
  required: ReadonlySet<string>;
  optional: ReadonlySet<string>;
}

export type ResolutionOutcome = "existing-binding" | "grandfathered" | "registered";

export interface ResolvedIdentity {
  userId: string;
  remoteUserId: string;
  outcome: ResolutionOutcome;
}
