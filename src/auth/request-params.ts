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
 * Parsing of the IdP's HTTP-POST binding form body.
 */

import { z } from "zod";
import { ClientProtocolError } from "./errors.js";

const AssertionPostSchema = z.object({
  SAMLResponse: z.string().min(1),
  RelayState: z.string(),
});

export type AssertionPost = z.infer<typeof AssertionPostSchema>;

/**
 * @throws ClientProtocolError("missing-parameter") when either field is absent.
 */
export function parseAssertionPost(form: Readonly<Record<string, unknown>>): AssertionPost {
  const result = AssertionPostSchema.safeParse(form);
  if (!result.success) {
    const fields = [...new Set(result.error.issues.map((issue) => issue.path.join(".")))];
    throw new ClientProtocolError(
      "missing-parameter",
      `Missing or invalid form parameter(s): ${fields.join(", ")}`,
    );
  }
  return result.data;
}
