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

import { ValidateInResponseTo } from "@node-saml/node-saml";
import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import {
  NodeSamlClient,
  type SamlOptions,
  type SamlProtocolClient,
} from "../../../../src/auth/adapters/node-saml-client.js";
import type { ServiceProviderSettings } from "../../../../src/config/types.js";

const SP: ServiceProviderSettings = {
  entryPoint: "https://idp.example.org/sso",
  issuer: "https://sp.example.org/metadata.xml",
  callbackUrl: "https://sp.example.org/acs",
  idpCert: "-----BEGIN CERTIFICATE-----\nAAAA\n-----END CERTIFICATE-----",
  allowUnsolicited: false,
  acceptedClockSkewMs: 500,
};

type Profile = NonNullable<
  Awaited<ReturnType<SamlProtocolClient["validatePostResponseAsync"]>>["profile"]
>;

function makeProfile(attributes: Record<string, unknown>): Profile {
  return {
    issuer: "https://idp.example.org",
    nameID: "alice@example.org",
    nameIDFormat: "urn:oasis:names:tc:SAML:1.1:nameid-format:emailAddress",
    attributes,
    getAssertionXml: () => "<saml:Assertion/>",
  };
}

describe("NodeSamlClient", () => {
  let created: SamlOptions[];
  let getAuthorizeUrlAsync: Mock<SamlProtocolClient["getAuthorizeUrlAsync"]>;
  let containers: Record<string, string>[];
  let profile: Profile | null;
  let claimedRequestId: string | undefined;

  function createSaml(options: SamlOptions): SamlProtocolClient {
    created.push(options);
    return {
      getAuthorizeUrlAsync,
      validatePostResponseAsync: vi.fn(async (container: Record<string, string>) => {
        containers.push(container);
        if (claimedRequestId !== undefined) {
          const found = await options.cacheProvider?.getAsync(claimedRequestId);
          if (!found) throw new Error("InResponseTo is not valid");
        }
        return { profile, loggedOut: false };
      }),
    };
  }

  beforeEach(() => {
    created = [];
    containers = [];
    getAuthorizeUrlAsync = vi.fn<SamlProtocolClient["getAuthorizeUrlAsync"]>(
      async () => "https://idp.example.org/sso?SAMLRequest=abc",
    );
    profile = makeProfile({ uid: "alice" });
    claimedRequestId = "_req1";
  });

  describe("prepareForAuthenticate", () => {
    it("returns a fresh request ID and the Location header", async () => {
      const client = new NodeSamlClient({ sp: SP, requestLifetimeMs: 60000, createSaml });

      const request = await client.prepareForAuthenticate("https://client/cb");

      expect(request.requestId).toMatch(/^_[0-9a-f]{40}$/);
      expect(request.headers).toEqual([["Location", "https://idp.example.org/sso?SAMLRequest=abc"]]);
      expect(getAuthorizeUrlAsync).toHaveBeenCalledWith("https://client/cb", undefined, {});
    });

    it("issues the returned request ID to the library", async () => {
      const client = new NodeSamlClient({ sp: SP, requestLifetimeMs: 60000, createSaml });

      const request = await client.prepareForAuthenticate("https://client/cb");

      expect(created[0]?.generateUniqueId?.()).toBe(request.requestId);
    });

    it("configures the service provider", async () => {
      const client = new NodeSamlClient({ sp: SP, requestLifetimeMs: 60000, createSaml });

      await client.prepareForAuthenticate("https://client/cb");

      expect(created[0]).toMatchObject({
        entryPoint: "https://idp.example.org/sso",
        issuer: "https://sp.example.org/metadata.xml",
        callbackUrl: "https://sp.example.org/acs",
        audience: "https://sp.example.org/metadata.xml",
        idpCert: SP.idpCert,
        wantAssertionsSigned: true,
        wantAuthnResponseSigned: true,
        acceptedClockSkewMs: 500,
        requestIdExpirationPeriodMs: 60000,
        validateInResponseTo: ValidateInResponseTo.never,
      });
    });

    it("generates distinct request IDs", async () => {
      const client = new NodeSamlClient({ sp: SP, requestLifetimeMs: 60000, createSaml });

      const first = await client.prepareForAuthenticate("https://client/cb");
      const second = await client.prepareForAuthenticate("https://client/cb");

      expect(first.requestId).not.toBe(second.requestId);
    });
  });

  describe("parseAndVerify", () => {
    it("returns the verified assertion and the request it answers", async () => {
      profile = makeProfile({ uid: "alice", email: ["a@example.org", "b@example.org"], age: 42 });
      const client = new NodeSamlClient({ sp: SP, requestLifetimeMs: 60000, createSaml });

      const assertion = await client.parseAndVerify("PHNhbWw+", new Set(["_req1", "_req2"]));

      expect(assertion).toEqual({
        inResponseTo: "_req1",
        signed: true,
        nameId: "alice@example.org",
        attributes: { uid: ["alice"], email: ["a@example.org", "b@example.org"] },
        assertionXml: ["<saml:Assertion/>"],
      });
      expect(created[0]?.validateInResponseTo).toBe(ValidateInResponseTo.always);
    });

    it("passes the raw response to the library", async () => {
      const client = new NodeSamlClient({ sp: SP, requestLifetimeMs: 60000, createSaml });

      await client.parseAndVerify("PHNhbWw+", new Set(["_req1"]));

      expect(containers).toEqual([{ SAMLResponse: "PHNhbWw+" }]);
    });

    it("rejects a response to a request that is not outstanding", async () => {
      const client = new NodeSamlClient({ sp: SP, requestLifetimeMs: 60000, createSaml });

      await expect(client.parseAndVerify("PHNhbWw+", new Set(["_other"]))).rejects.toThrow(
        "InResponseTo is not valid",
      );
    });

    it("accepts unsolicited responses when allowed", async () => {
      claimedRequestId = undefined;
      const client = new NodeSamlClient({
        sp: { ...SP, allowUnsolicited: true },
        requestLifetimeMs: 60000,
        createSaml,
      });

      const assertion = await client.parseAndVerify("PHNhbWw+", new Set());

      expect(assertion.inResponseTo).toBeUndefined();
      expect(created[0]?.validateInResponseTo).toBe(ValidateInResponseTo.ifPresent);
    });

    it("fails when the library returns no profile", async () => {
      profile = null;
      const client = new NodeSamlClient({ sp: SP, requestLifetimeMs: 60000, createSaml });

      await expect(client.parseAndVerify("PHNhbWw+", new Set(["_req1"]))).rejects.toThrow(
        "SAML response carried no assertion",
      );
    });

    it("returns no attributes when the profile has none", async () => {
      profile = makeProfile({});
      const client = new NodeSamlClient({ sp: SP, requestLifetimeMs: 60000, createSaml });

      const assertion = await client.parseAndVerify("PHNhbWw+", new Set(["_req1"]));

      expect(assertion.attributes).toEqual({});
    });
  });
});
