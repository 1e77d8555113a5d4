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
 * Keyed mutual exclusion: one FIFO lane per key.
 *
 * Callers for the same key run one at a time in arrival order; callers for
 * different keys never wait on each other. The lane is released on every exit
 * path, including a rejected callback.
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly name: string) {}

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const waiting = this.tails.get(key);
    if (waiting) {
      console.debug(`[saml] Waiting for ${this.name} lock on '${key}'`);
    }
    const previous = waiting ?? Promise.resolve();

    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any caller currently holds or waits for the lane for `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
