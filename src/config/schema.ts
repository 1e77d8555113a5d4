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
 * Zod schemas for the SSO configuration file.
 * All object schemas are strict: unknown keys are configuration mistakes.
 */

import { z } from "zod";

export const DEFAULT_SESSION_LIFETIME_MS = 5 * 60 * 1000;

const PEM_CERT_PATTERN = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/;

export const ServiceProviderConfigSchema = z
  .object({
    entry_point: z.string().url(),
    issuer: z.string().min(1),
    callback_url: z.string().url(),
    idp_cert: z
      .string()
      .regex(PEM_CERT_PATTERN, "idp_cert must contain at least one PEM certificate block"),
    allow_unsolicited: z.boolean().default(false),
    accepted_clock_skew_ms: z.number().int().min(-1).default(0),
  })
  .strict();

export const UserMappingProviderConfigSchema = z
  .object({
    module: z.string().min(1).default("default"),
    config: z.record(z.string(), z.unknown()).default({}),
  })
  .strict();

export const Saml2ConfigSchema = z
  .object({
    sp: ServiceProviderConfigSchema,
    session_lifetime_ms: z.number().int().positive().default(DEFAULT_SESSION_LIFETIME_MS),
    grandfathered_mxid_source_attribute: z.string().min(1).optional(),
    user_mapping_provider: UserMappingProviderConfigSchema.default({}),
  })
  .strict();

export const SsoConfigSchema = z
  .object({
    server_name: z
      .string()
      .min(1, "server_name is required")
      .refine((name) => !name.includes("@"), { message: "server_name must not contain '@'" }),
    saml2_config: Saml2ConfigSchema,
  })
  .strict();

export type SsoConfigParsed = z.output<typeof SsoConfigSchema>;
