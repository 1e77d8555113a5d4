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
 * Wires a SamlHandler from loaded configuration and an account store.
 */

import type { SsoConfig } from "../config/types.js";
import type { AccountStore } from "../storage/account-store.js";
import { NodeSamlClient } from "./adapters/node-saml-client.js";
import type { SamlClient } from "./adapters/saml-client.js";
import { IdentityResolver } from "./identity-resolver.js";
import { KeyedLock } from "./keyed-lock.js";
import { type LoadedMappingProvider, loadMappingProvider } from "./mapping/provider.js";
import { type AccountRegistrar, StoreAccountRegistrar } from "./registration.js";
import { AUTH_PROVIDER_ID, type LoginCompletionHandler, SamlHandler } from "./saml-handler.js";
import { PendingSessionStore } from "./session/pending-session-store.js";

export interface SamlHandlerDependencies<TRequest> {
  config: SsoConfig;
  store: AccountStore;
  loginCompleter: LoginCompletionHandler<TRequest>;
  samlClient?: SamlClient;
  registrar?: AccountRegistrar;
  mappingProvider?: LoadedMappingProvider;
  clock?: () => number;
}

export interface SamlSso<TRequest> {
  handler: SamlHandler<TRequest>;
  mappingProvider: LoadedMappingProvider;
  pendingSessions: PendingSessionStore;
}

/** @throws ConfigError when the mapping provider config is invalid. */
export function createSamlHandler<TRequest>(
  deps: SamlHandlerDependencies<TRequest>,
): SamlSso<TRequest> {
  const { config, store } = deps;
  const mappingProvider = deps.mappingProvider ?? loadMappingProvider(config.userMappingProvider);

  const resolver = new IdentityResolver({
    authProviderId: AUTH_PROVIDER_ID,
    serverName: config.serverName,
    store,
    registrar: deps.registrar ?? new StoreAccountRegistrar(store, config.serverName),
    mappingProvider: mappingProvider.provider,
    lock: new KeyedLock("saml_mapping"),
    grandfatheredMxidSourceAttribute: config.grandfatheredMxidSourceAttribute,
  });

  const pendingSessions = new PendingSessionStore();
  const handler = new SamlHandler<TRequest>({
    samlClient:
      deps.samlClient ??
      new NodeSamlClient({ sp: config.sp, requestLifetimeMs: config.sessionLifetimeMs }),
    resolver,
    pendingSessions,
    loginCompleter: deps.loginCompleter,
    sessionLifetimeMs: config.sessionLifetimeMs,
    allowUnsolicited: config.sp.allowUnsolicited,
    clock: deps.clock,
  });

  return { handler, mappingProvider, pendingSessions };
}
