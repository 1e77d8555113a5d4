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
 * SamlClient implementation on @node-saml/node-saml.
 *
 * node-saml keeps its own request-ID cache; here the pending-session store is
 * the source of truth, so each call gets a SAML instance whose cache provider
 * answers from the caller's outstanding request IDs and records which one the
 * response claimed.
 */

import crypto from "node:crypto";
import { type CacheProvider, SAML, ValidateInResponseTo } from "@node-saml/node-saml";
import { z } from "zod";
import type { ServiceProviderSettings } from "../../config/types.js";
import type { AssertionAttributes, ValidatedAssertion } from "../types.js";
import type { AuthnRequest, SamlClient } from "./saml-client.js";

export type SamlOptions = ConstructorParameters<typeof SAML>[0];
export type SamlProtocolClient = Pick<SAML, "getAuthorizeUrlAsync" | "validatePostResponseAsync">;
export type SamlFactory = (options: SamlOptions) => SamlProtocolClient;

type SamlProfile = NonNullable<
  Awaited<ReturnType<SAML["validatePostResponseAsync"]>>["profile"]
>;

export interface NodeSamlClientOptions {
  sp: ServiceProviderSettings;
  /** Lifetime of a pending request; responses to older requests are refused. */
  requestLifetimeMs: number;
  createSaml?: SamlFactory;
}

const ProfileAttributesSchema = z.record(z.string(), z.unknown());

function generateRequestId(): string {
  return `_${crypto.randomBytes(20).toString("hex")}`;
}

function toStringValues(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string");
  }
  return [];
}

function extractAttributes(profile: SamlProfile): AssertionAttributes {
  const parsed = ProfileAttributesSchema.safeParse(profile.attributes ?? {});
  if (!parsed.success) return {};

  const attributes: Record<string, readonly string[]> = {};
  for (const [name, value] of Object.entries(parsed.data)) {
    const values = toStringValues(value);
    if (values.length > 0) attributes[name] = values;
  }
  return attributes;
}

export class NodeSamlClient implements SamlClient {
  private readonly sp: ServiceProviderSettings;
  private readonly requestLifetimeMs: number;
  private readonly createSaml: SamlFactory;

  constructor(options: NodeSamlClientOptions) {
    this.sp = options.sp;
    this.requestLifetimeMs = options.requestLifetimeMs;
    this.createSaml = options.createSaml ?? ((samlOptions) => new SAML(samlOptions));
  }

  async prepareForAuthenticate(relayState: string): Promise<AuthnRequest> {
    const requestId = generateRequestId();
    const saml = this.createSaml({
      ...this.baseOptions(),
      generateUniqueId: () => requestId,
      validateInResponseTo: ValidateInResponseTo.never,
    });

    const location = await saml.getAuthorizeUrlAsync(relayState, undefined, {});
    return { requestId, headers: [["Location", location]] };
  }

  async parseAndVerify(
    samlResponse: string,
    outstandingRequestIds: ReadonlySet<string>,
  ): Promise<ValidatedAssertion> {
    let inResponseTo: string | undefined;
    const cacheProvider: CacheProvider = {
      saveAsync: async (_key, value) => ({ value, createdAt: Date.now() }),
      getAsync: async (key) => {
        if (!outstandingRequestIds.has(key)) return null;
        inResponseTo = key;
        return new Date().toISOString();
      },
      removeAsync: async (key) => key,
    };

    const saml = this.createSaml({
      ...this.baseOptions(),
      validateInResponseTo: this.sp.allowUnsolicited
        ? ValidateInResponseTo.ifPresent
        : ValidateInResponseTo.always,
      cacheProvider,
    });

    const { profile } = await saml.validatePostResponseAsync({ SAMLResponse: samlResponse });
    if (!profile) {
      throw new Error("SAML response carried no assertion");
    }

    const assertionXml = profile.getAssertionXml?.();
    return {
      inResponseTo,
      // node-saml refuses unsigned documents when the want*Signed options are set.
      signed: true,
      nameId: profile.nameID,
      attributes: extractAttributes(profile),
      assertionXml: assertionXml ? [assertionXml] : [],
    };
  }

  private baseOptions(): SamlOptions {
    return {
      entryPoint: this.sp.entryPoint,
      issuer: this.sp.issuer,
      callbackUrl: this.sp.callbackUrl,
      audience: this.sp.issuer,
      idpCert: this.sp.idpCert,
      wantAssertionsSigned: true,
      wantAuthnResponseSigned: true,
      acceptedClockSkewMs: this.sp.acceptedClockSkewMs,
      requestIdExpirationPeriodMs: this.requestLifetimeMs,
    };
  }
}
