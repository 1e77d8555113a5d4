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
 * SamlClient interface: the SAML protocol library seen through the two
 * calls the SSO flow needs. Implementations own XML, bindings and signature
 * verification.
 */

import type { ValidatedAssertion } from "../types.js";

export type HttpHeader = readonly [name: string, value: string];

export interface AuthnRequest {
  /** Unique ID of the outgoing request; echoed back as InResponseTo. */
  requestId: string;
  /** Headers of the redirect to send the browser; carries `Location`. */
  headers: readonly HttpHeader[];
}

export interface SamlClient {
  prepareForAuthenticate(relayState: string): Promise<AuthnRequest>;

  /**
   * Parse and verify a base64 `SAMLResponse`. Responses answering a request
   * that is not in `outstandingRequestIds` are rejected.
   * @throws on malformed XML, bad signatures, expired or unexpected responses.
   */
  parseAndVerify(
    samlResponse: string,
    outstandingRequestIds: ReadonlySet<string>,
  ): Promise<ValidatedAssertion>;
}
