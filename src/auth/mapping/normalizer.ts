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
 * Localpart normalizers: turn an arbitrary IdP attribute value into a string
 * that is a valid localpart. Both are pure and total.
 */

import { LOCALPART_ALLOWED_CHARACTERS } from "../user-id.js";

export type Normalizer = (value: string) => string;

const utf8 = new TextEncoder();

/**
 * Lower-case ASCII letters, then escape every byte of the UTF-8 encoding that
 * is not an allowed localpart character as `=xx`. `=` itself is escaped, so
 * the transform introduces no collisions beyond ASCII case folding. A leading
 * underscore (reserved namespace) is escaped too.
 */
export function hexEncode(value: string): string {
  let out = "";
  for (const byte of utf8.encode(value)) {
    const lowered = byte >= 0x41 && byte <= 0x5a ? byte + 0x20 : byte;
    const ch = String.fromCharCode(lowered);
    if (lowered < 0x80 && ch !== "=" && LOCALPART_ALLOWED_CHARACTERS.has(ch)) {
      out += ch;
    } else {
      out += `=${lowered.toString(16).padStart(2, "0")}`;
    }
  }
  return out.startsWith("_") ? `=5f${out.slice(1)}` : out;
}

const DOT_REPLACE_PATTERN = /[^_\-./=a-z0-9]/gu;

/**
 * Lower-case the value, replace each disallowed code point with `.` and drop a
 * single leading underscore. Lossy: `a b` and `a+b` both become `a.b`.
 */
export function dotReplace(value: string): string {
  return value.toLowerCase().replace(DOT_REPLACE_PATTERN, ".").replace(/^_/, "");
}

export const MXID_MAPPINGS = {
  hexencode: hexEncode,
  dotreplace: dotReplace,
} as const satisfies Record<string, Normalizer>;

export type MxidMappingName = keyof typeof MXID_MAPPINGS;

export function isMxidMappingName(name: string): name is MxidMappingName {
  return Object.hasOwn(MXID_MAPPINGS, name);
}
