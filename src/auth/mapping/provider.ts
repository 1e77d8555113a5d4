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
 * UserMappingProvider interface: pluggable SAML-assertion-to-user mapping.
 * Providers are registered by module name and selected in config.
 */

import { ConfigError } from "../../config/errors.js";
import type { MappingProviderSettings } from "../../config/types.js";
import type { MappingAttributes, SamlAttributeRequirements, ValidatedAssertion } from "../types.js";
import { defaultMappingProviderModule } from "./default-provider.js";

export interface UserMappingProvider {
  /**
   * Stable remote identifier for the asserted user.
   * @throws ClientProtocolError when the assertion lacks the identifying attribute.
   */
  toUserId(assertion: ValidatedAssertion, clientRedirectUrl: string): string;

  /**
   * Proposed attributes for a new user. `failures` counts how many earlier
   * proposals for this assertion were already taken.
   */
  toAttributes(
    assertion: ValidatedAssertion,
    failures: number,
    clientRedirectUrl: string,
  ): MappingAttributes;
}

export interface UserMappingProviderModule<TConfig> {
  readonly name: string;
  /** @throws ConfigError on invalid module config. */
  parseConfig(config: Readonly<Record<string, unknown>>): TConfig;
  getSamlAttributes(config: TConfig): SamlAttributeRequirements;
  create(config: TConfig): UserMappingProvider;
}

export interface LoadedMappingProvider {
  module: string;
  provider: UserMappingProvider;
  attributes: SamlAttributeRequirements;
}

type ProviderLoader = (
  config: Readonly<Record<string, unknown>>,
) => Omit<LoadedMappingProvider, "module">;

function toLoader<TConfig>(module: UserMappingProviderModule<TConfig>): ProviderLoader {
  return (rawConfig) => {
    const parsed = module.parseConfig(rawConfig);
    return {
      provider: module.create(parsed),
      attributes: module.getSamlAttributes(parsed),
    };
  };
}

const registry = new Map<string, ProviderLoader>([
  [defaultMappingProviderModule.name, toLoader(defaultMappingProviderModule)],
]);

export function registerMappingProvider<TConfig>(module: UserMappingProviderModule<TConfig>): void {
  if (registry.has(module.name)) {
    throw new Error(`User mapping provider '${module.name}' is already registered`);
  }
  registry.set(module.name, toLoader(module));
}

export function registeredMappingProviders(): string[] {
  return [...registry.keys()].sort();
}

/**
 * Instantiate the configured provider.
 * @throws ConfigError for unknown modules or invalid module config.
 */
export function loadMappingProvider(settings: MappingProviderSettings): LoadedMappingProvider {
  const loader = registry.get(settings.module);
  if (!loader) {
    throw new ConfigError({
      path: "saml2_config.user_mapping_provider.module",
      message: `Unknown user mapping provider '${settings.module}' (available: ${registeredMappingProviders().join(", ")})`,
    });
  }
  return { module: settings.module, ...loader(settings.config) };
}
