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
 * The default SAML mapping provider.
 *
 * The remote user ID is the `uid` attribute. New localparts come from the
 * configured source attribute, normalized with the configured policy; on a
 * collision the attempt number is appended (`alice`, `alice1`, `alice2`, ...).
 */

import { z } from "zod";
import { ConfigError } from "../../config/errors.js";
import { attributeValues, firstAttributeValue } from "../assertion.js";
import { ClientProtocolError } from "../errors.js";
import type { MappingAttributes, SamlAttributeRequirements, ValidatedAssertion } from "../types.js";
import { MXID_MAPPINGS, type MxidMappingName, type Normalizer, isMxidMappingName } from "./normalizer.js";
import type { UserMappingProvider, UserMappingProviderModule } from "./provider.js";

const CONFIG_PATH = "saml2_config.user_mapping_provider.config";

const REMOTE_USER_ID_ATTRIBUTE = "uid";

const DefaultMappingConfigSchema = z
  .object({
    mxid_source_attribute: z.string().min(1).default("uid"),
    mxid_mapping: z.string().default("hexencode"),
  })
  .strict();

export interface DefaultMappingConfig {
  mxidSourceAttribute: string;
  mxidMapping: MxidMappingName;
}

function requireAttribute(assertion: ValidatedAssertion, name: string): string {
  const value = firstAttributeValue(assertion, name);
  if (value === undefined) {
    console.warn(`[saml] SAML2 response lacks a '${name}' attestation`);
    throw new ClientProtocolError("missing-attribute", `'${name}' not in SAML2 response`);
  }
  return value;
}

export class DefaultUserMappingProvider implements UserMappingProvider {
  private readonly mxidSourceAttribute: string;
  private readonly normalize: Normalizer;

  constructor(config: DefaultMappingConfig) {
    this.mxidSourceAttribute = config.mxidSourceAttribute;
    this.normalize = MXID_MAPPINGS[config.mxidMapping];
  }

  /**
   * @throws ConfigError when `mxid_mapping` names no known policy.
   */
  static parseConfig(config: Readonly<Record<string, unknown>>): DefaultMappingConfig {
    const result = DefaultMappingConfigSchema.safeParse(config);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConfigError({
        path: [CONFIG_PATH, ...(issue?.path ?? [])].join("."),
        message: issue?.message ?? "Invalid user mapping provider config",
      });
    }

    const mapping = result.data.mxid_mapping;
    if (!isMxidMappingName(mapping)) {
      throw new ConfigError({
        path: `${CONFIG_PATH}.mxid_mapping`,
        message: `'${mapping}' is not a valid mxid_mapping value`,
      });
    }

    return { mxidSourceAttribute: result.data.mxid_source_attribute, mxidMapping: mapping };
  }

  static getSamlAttributes(config: DefaultMappingConfig): SamlAttributeRequirements {
    return {
      required: new Set([REMOTE_USER_ID_ATTRIBUTE, config.mxidSourceAttribute]),
      optional: new Set(["displayName", "email"]),
    };
  }

  toUserId(assertion: ValidatedAssertion, _clientRedirectUrl: string): string {
    return requireAttribute(assertion, REMOTE_USER_ID_ATTRIBUTE);
  }

  toAttributes(
    assertion: ValidatedAssertion,
    failures: number,
    _clientRedirectUrl: string,
  ): MappingAttributes {
    const source = requireAttribute(assertion, this.mxidSourceAttribute);
    const base = this.normalize(source);

    return {
      localpart: failures > 0 ? `${base}${failures}` : base,
      displayName: firstAttributeValue(assertion, "displayName"),
      emails: attributeValues(assertion, "email"),
    };
  }
}

export const defaultMappingProviderModule: UserMappingProviderModule<DefaultMappingConfig> = {
  name: "default",
  parseConfig: (config) => DefaultUserMappingProvider.parseConfig(config),
  getSamlAttributes: (config) => DefaultUserMappingProvider.getSamlAttributes(config),
  create: (config) => new DefaultUserMappingProvider(config),
};
