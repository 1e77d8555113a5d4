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
 * Attribute accessors for validated assertions.
 */

import type { ValidatedAssertion } from "./types.js";

export function attributeValues(assertion: ValidatedAssertion, name: string): readonly string[] {
  return Object.hasOwn(assertion.attributes, name) ? (assertion.attributes[name] ?? []) : [];
}

/** First asserted value of `name`, or undefined when the IdP did not assert it. */
export function firstAttributeValue(
  assertion: ValidatedAssertion,
  name: string,
): string | undefined {
  return attributeValues(assertion, name)[0];
}
