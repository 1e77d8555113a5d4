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
 * Local user identifiers: `@localpart:server_name`.
 */

/** Characters a localpart may contain. `=` is reserved for hex escapes. */
export const LOCALPART_ALLOWED_CHARACTERS: ReadonlySet<string> = new Set(
  "_-./=abcdefghijklmnopqrstuvwxyz0123456789",
);

export const MAX_USER_ID_LENGTH = 255;

export interface UserId {
  localpart: string;
  serverName: string;
}

export function formatUserId(localpart: string, serverName: string): string {
  return `@${localpart}:${serverName}`;
}

/**
 * Split a full user ID into its parts. The server name may itself contain a
 * colon (a port), so the split happens on the first colon.
 */
export function parseUserId(userId: string): UserId | null {
  if (!userId.startsWith("@")) return null;
  const colon = userId.indexOf(":");
  if (colon < 2 || colon === userId.length - 1) return null;
  return { localpart: userId.slice(1, colon), serverName: userId.slice(colon + 1) };
}

export function isValidLocalpart(localpart: string): boolean {
  if (localpart.length === 0) return false;
  for (const ch of localpart) {
    if (!LOCALPART_ALLOWED_CHARACTERS.has(ch)) return false;
  }
  return true;
}
