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
 * SSO error taxonomy. Each error carries the HTTP status the surrounding
 * request layer should answer with and a stable code for audit and metrics.
 * Configuration problems use ConfigError from the config module instead.
 */

export type ClientProtocolErrorCode =
  | "unparseable-response"
  | "unsigned-response"
  | "missing-attribute"
  | "unsolicited-response"
  | "missing-parameter";

export type ServerErrorCode = "localpart-exhausted" | "mapping-provider-failed";

export type SsoErrorCode = ClientProtocolErrorCode | ServerErrorCode;

export class SsoError extends Error {
  constructor(
    public readonly httpStatus: number,
    public readonly code: SsoErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "SsoError";
  }
}

/** The browser or IdP sent something we cannot accept. No state was changed. */
export class ClientProtocolError extends SsoError {
  constructor(code: ClientProtocolErrorCode, message: string) {
    super(400, code, message);
    this.name = "ClientProtocolError";
  }
}

/** A mapping provider kept proposing taken localparts until the attempt cap. */
export class ResourceExhaustionError extends SsoError {
  constructor(public readonly attempts: number) {
    super(500, "localpart-exhausted", "Unable to generate a user ID from the SAML response");
    this.name = "ResourceExhaustionError";
  }
}

/** A mapping provider broke its contract (e.g. returned no localpart). */
export class MappingProviderError extends SsoError {
  constructor(message: string) {
    super(500, "mapping-provider-failed", message);
    this.name = "MappingProviderError";
  }
}

export type RegistrationErrorReason = "invalid-localpart" | "user-id-taken";

/** Raised by the registration collaborator; propagated to the caller unchanged. */
export class RegistrationError extends Error {
  readonly httpStatus = 400;

  constructor(
    public readonly reason: RegistrationErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "RegistrationError";
  }
}
