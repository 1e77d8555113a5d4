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
 * Auth module public API.
 */

export { NodeSamlClient } from "./adapters/node-saml-client.js";
export type {
  NodeSamlClientOptions,
  SamlFactory,
  SamlOptions,
  SamlProtocolClient,
} from "./adapters/node-saml-client.js";
export type { AuthnRequest, HttpHeader, SamlClient } from "./adapters/saml-client.js";
export { attributeValues, firstAttributeValue } from "./assertion.js";
export { createSamlHandler } from "./bootstrap.js";
export type { SamlHandlerDependencies, SamlSso } from "./bootstrap.js";
export {
  ClientProtocolError,
  MappingProviderError,
  RegistrationError,
  ResourceExhaustionError,
  SsoError,
} from "./errors.js";
export type {
  ClientProtocolErrorCode,
  RegistrationErrorReason,
  ServerErrorCode,
  SsoErrorCode,
} from "./errors.js";
export { IdentityResolver, MAX_LOCALPART_ATTEMPTS } from "./identity-resolver.js";
export type {
  IdentityResolverOptions,
  IdentityStore,
  LocalpartAllocation,
} from "./identity-resolver.js";
export { KeyedLock } from "./keyed-lock.js";
export { DefaultUserMappingProvider, defaultMappingProviderModule } from "./mapping/default-provider.js";
export type { DefaultMappingConfig } from "./mapping/default-provider.js";
export { MXID_MAPPINGS, dotReplace, hexEncode, isMxidMappingName } from "./mapping/normalizer.js";
export type { MxidMappingName, Normalizer } from "./mapping/normalizer.js";
export {
  loadMappingProvider,
  registerMappingProvider,
  registeredMappingProviders,
} from "./mapping/provider.js";
export type {
  LoadedMappingProvider,
  UserMappingProvider,
  UserMappingProviderModule,
} from "./mapping/provider.js";
export { StoreAccountRegistrar } from "./registration.js";
export type { AccountRegistrar, ProvisionAccountRequest } from "./registration.js";
export { parseAssertionPost } from "./request-params.js";
export type { AssertionPost } from "./request-params.js";
export {
  ASSERTION_LOG_CHUNK_SIZE,
  AUTH_PROVIDER_ID,
  SamlHandler,
  chunkAssertionXml,
} from "./saml-handler.js";
export type { LoginCompletionHandler, SamlHandlerOptions } from "./saml-handler.js";
export { PendingSessionStore } from "./session/pending-session-store.js";
export {
  LOCALPART_ALLOWED_CHARACTERS,
  MAX_USER_ID_LENGTH,
  formatUserId,
  isValidLocalpart,
  parseUserId,
} from "./user-id.js";
export type { UserId } from "./user-id.js";
export type {
  AssertionAttributes,
  MappingAttributes,
  PendingSession,
  ResolutionOutcome,
  ResolvedIdentity,
  SamlAttributeRequirements,
  ValidatedAssertion,
} from "./types.js";
