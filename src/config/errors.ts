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
 * Configuration errors. Both are startup-fatal: the service refuses to start
 * rather than run with a mapping policy it does not understand.
 */

export interface ConfigErrorDetail {
  file?: string;
  path?: string;
  message: string;
}

function describeDetail(detail: ConfigErrorDetail, separator: string): string {
  const parts: string[] = [];
  if (detail.file) parts.push(`File: ${detail.file}`);
  if (detail.path) parts.push(`Field: ${detail.path}`);
  parts.push(`Message: ${detail.message}`);
  return parts.join(separator);
}

export class ConfigError extends Error {
  readonly file?: string;
  readonly path?: string;

  constructor(detail: ConfigErrorDetail) {
    super(detail.message);
    this.name = "ConfigError";
    this.file = detail.file;
    this.path = detail.path;
  }

  override toString(): string {
    return describeDetail(this, "\n  ");
  }
}

export class ConfigValidationError extends Error {
  readonly errors: readonly ConfigErrorDetail[];

  constructor(errors: ConfigErrorDetail[]) {
    const lines = errors.map((e) => `  - ${describeDetail(e, ", ")}`);
    super(`SSO config validation failed with ${errors.length} error(s):\n${lines.join("\n")}`);
    this.name = "ConfigValidationError";
    this.errors = Object.freeze([...errors]);
  }
}
