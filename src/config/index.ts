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
 * Public config API.
 * Orchestrates: read → substitute → parse → validate → normalize → hash → freeze.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import type { ZodError } from "zod";
import { redactSensitiveValues, substituteEnvVars } from "./env-substitute.js";
import { type ConfigErrorDetail, ConfigError, ConfigValidationError } from "./errors.js";
import { computeConfigHash } from "./hasher.js";
import { type SsoConfigParsed, SsoConfigSchema } from "./schema.js";
import type { LoadedSsoConfig, SsoConfig } from "./types.js";

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
}

const CERT_BLOCK_PATTERN = /-----BEGIN CERTIFICATE-----[\s\S]*?-----END CERTIFICATE-----/g;

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.SSO_CONFIG_PATH ?? join(process.cwd(), "config", "sso.yaml");
}

function zodErrorToDetails(error: ZodError, sourceFile: string): ConfigErrorDetail[] {
  return error.issues.map((issue) => ({
    file: sourceFile,
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function splitCertificates(pem: string): string | string[] {
  const blocks = [...pem.matchAll(CERT_BLOCK_PATTERN)].map((match) => match[0].trim());
  return blocks.length > 1 ? blocks : pem.trim();
}

/**
 * Convert the validated snake_case document into the frozen runtime shape.
 */
export function toSsoConfig(parsed: SsoConfigParsed): SsoConfig {
  const saml2 = parsed.saml2_config;
  const config: SsoConfig = {
    serverName: parsed.server_name,
    sp: {
      entryPoint: saml2.sp.entry_point,
      issuer: saml2.sp.issuer,
      callbackUrl: saml2.sp.callback_url,
      idpCert: splitCertificates(saml2.sp.idp_cert),
      allowUnsolicited: saml2.sp.allow_unsolicited,
      acceptedClockSkewMs: saml2.sp.accepted_clock_skew_ms,
    },
    sessionLifetimeMs: saml2.session_lifetime_ms,
    grandfatheredMxidSourceAttribute: saml2.grandfathered_mxid_source_attribute,
    userMappingProvider: {
      module: saml2.user_mapping_provider.module,
      config: Object.freeze({ ...saml2.user_mapping_provider.config }),
    },
  };
  return config;
}

/**
 * Parse and validate raw config text (before env substitution).
 */
export function parseSsoConfig(
  rawText: string,
  sourceFile: string,
  options: LoadConfigOptions = {},
): LoadedSsoConfig {
  const sub = substituteEnvVars(rawText, sourceFile, options.env);

  let document: unknown;
  try {
    document = parseYaml(sub.text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError({
      file: sourceFile,
      message: `Failed to parse YAML: ${redactSensitiveValues(message, sub)}`,
    });
  }

  const result = SsoConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigValidationError(zodErrorToDetails(result.error, sourceFile));
  }

  const config = toSsoConfig(result.data);
  Object.freeze(config.sp);
  Object.freeze(config.userMappingProvider);

  return Object.freeze({
    config: Object.freeze(config),
    configHash: computeConfigHash(config),
    sensitiveVars: sub.sensitiveVars,
  });
}

/**
 * Load the SSO config file: the full pipeline from disk to frozen config.
 */
export async function loadSsoConfig(
  filePath: string,
  options: LoadConfigOptions = {},
): Promise<LoadedSsoConfig> {
  let rawText: string;
  try {
    rawText = await readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigError({ file: filePath, message: `Config file not found: ${filePath}` });
    }
    throw error;
  }
  return parseSsoConfig(rawText, filePath, options);
}

export { ConfigError, ConfigValidationError } from "./errors.js";
export type { LoadedSsoConfig, SsoConfig } from "./types.js";
