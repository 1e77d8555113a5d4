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
 * Environment variable substitution for the SSO config file.
 * Supports ${VAR} and ${VAR:-default}; runs on raw YAML text before parsing.
 */

import { ConfigError } from "./errors.js";

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

const SENSITIVE_PATTERNS = [/_SECRET$/i, /_KEY$/i, /_PASSWORD$/i, /_TOKEN$/i, /_CERT$/i];

export interface SubstitutionResult {
  text: string;
  /** Names of substituted variables that look like credentials. */
  sensitiveVars: ReadonlySet<string>;
  /** The values those variables resolved to, for redaction. */
  sensitiveValues: readonly string[];
}

function isSensitiveVar(varName: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(varName));
}

function splitExpression(expr: string): { varName: string; defaultValue?: string } {
  const sep = expr.indexOf(":-");
  if (sep === -1) return { varName: expr };
  return { varName: expr.slice(0, sep), defaultValue: expr.slice(sep + 2) };
}

/**
 * Substitute ${VAR} and ${VAR:-default} references in raw text.
 * @throws ConfigError naming every variable that has neither a value nor a default.
 */
export function substituteEnvVars(
  text: string,
  sourceFile: string,
  env: NodeJS.ProcessEnv = process.env,
): SubstitutionResult {
  const missing: string[] = [];
  const sensitiveVars = new Set<string>();
  const sensitiveValues: string[] = [];

  const substituted = text.replace(ENV_VAR_PATTERN, (match, expr: string) => {
    const { varName, defaultValue } = splitExpression(expr);
    const value = env[varName] ?? defaultValue;

    if (value === undefined) {
      missing.push(varName);
      return match;
    }
    if (isSensitiveVar(varName)) {
      sensitiveVars.add(varName);
      if (value.length > 0) sensitiveValues.push(value);
    }
    return value;
  });

  if (missing.length > 0) {
    const names = [...new Set(missing)].map((name) => `\${${name}}`).join(", ");
    throw new ConfigError({
      file: sourceFile,
      message: `Unresolved environment variable(s): ${names}`,
    });
  }

  return { text: substituted, sensitiveVars, sensitiveValues };
}

/**
 * Replace every occurrence of a sensitive substituted value in `text`.
 * Used on parser error messages, which may quote the offending line.
 */
export function redactSensitiveValues(text: string, result: SubstitutionResult): string {
  let redacted = text;
  for (const value of result.sensitiveValues) {
    redacted = redacted.split(value).join("[REDACTED]");
  }
  return redacted;
}
