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
 * Loaded SSO configuration types (camelCase view of the validated file).
 */

export interface ServiceProviderSettings {
  entryPoint: string;
  issuer: string;
  callbackUrl: string;
  /** One PEM string, or several when the IdP is rotating signing keys. */
  idpCert: string | string[];
  allowUnsolicited: boolean;
  acceptedClockSkewMs: number;
}

export interface MappingProviderSettings {
  module: string;
  config: Readonly<Record<string, unknown>>;
}

export interface SsoConfig {
  serverName: string;
  sp: ServiceProviderSettings;
  sessionLifetimeMs: number;
  grandfatheredMxidSourceAttribute?: string;
  userMappingProvider: MappingProviderSettings;
}

export interface LoadedSsoConfig {
  config: SsoConfig;
  configHash: string;
  sensitiveVars: ReadonlySet<string>;
}
