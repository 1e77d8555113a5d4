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
 * In-memory table of outstanding SAML authentication requests.
 *
 * Entries are created when we redirect the browser to the IdP and consumed
 * when the matching response arrives. Nothing is persisted: after a restart
 * an in-flight login is simply not found.
 *
 * Every method is synchronous, so each runs to completion without
 * interleaving; a request ID can be popped at most once.
 */

import type { PendingSession } from "../types.js";

export class PendingSessionStore {
  private readonly sessions = new Map<string, PendingSession>();

  /**
   * @throws Error if `requestId` is already tracked. The SAML library issues a
   * fresh ID per request, so a duplicate is a bug, not a client error.
   */
  create(requestId: string, nowMs: number, uiAuthSessionId?: string): PendingSession {
    if (this.sessions.has(requestId)) {
      throw new Error(`Duplicate SAML request ID: ${requestId}`);
    }
    const session: PendingSession = Object.freeze(
      uiAuthSessionId === undefined
        ? { requestId, creationTimeMs: nowMs }
        : { requestId, creationTimeMs: nowMs, uiAuthSessionId },
    );
    this.sessions.set(requestId, session);
    return session;
  }

  /** Remove and return the session for `requestId`, if still tracked. */
  popIfPresent(requestId: string): PendingSession | undefined {
    const session = this.sessions.get(requestId);
    if (session) {
      this.sessions.delete(requestId);
    }
    return session;
  }

  /**
   * Drop every session created strictly before `nowMs - lifetimeMs`.
   * @returns the request IDs that were expired.
   */
  sweepExpired(nowMs: number, lifetimeMs: number): string[] {
    const expireBefore = nowMs - lifetimeMs;
    const expired: string[] = [];
    for (const [requestId, session] of this.sessions) {
      if (session.creationTimeMs < expireBefore) {
        expired.push(requestId);
      }
    }
    for (const requestId of expired) {
      console.debug(`[saml] Expiring session id ${requestId}`);
      this.sessions.delete(requestId);
    }
    return expired;
  }

  outstandingRequestIds(): ReadonlySet<string> {
    return new Set(this.sessions.keys());
  }

  get size(): number {
    return this.sessions.size;
  }
}
