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
 * Startup check: loads .env and the SSO config, builds the user mapping
 * provider and opens the account store. Exits non-zero on any config error.
 */

import { config as loadDotenv } from "dotenv";
import { loadMappingProvider } from "./auth/mapping/provider.js";
import { defaultConfigPath, loadSsoConfig } from "./config/index.js";
import { getAccountStore } from "./storage/factory.js";

async function main(): Promise<void> {
  loadDotenv();

  const configPath = defaultConfigPath();

  try {
    const loaded = await loadSsoConfig(configPath);
    const { config } = loaded;

    console.log(`[config] Loaded SSO config from ${configPath}`);
    console.log(`[config] Config hash: ${loaded.configHash} (SHA-256)`);

    const mapping = loadMappingProvider(config.userMappingProvider);
    console.log(
      `[saml] User mapping provider '${mapping.module}' requires attributes [${[...mapping.attributes.required].join(", ")}], optional [${[...mapping.attributes.optional].join(", ")}]`,
    );

    const store = await getAccountStore();
    const metadata = store.getMetadata();
    console.log(`[storage] Account store ready (${metadata.adapterName} ${metadata.adapterVersion})`);
    console.log(`[saml] SAML2 SSO ready for ${config.serverName}`);
  } catch (error) {
    console.error("ERROR: SSO startup failed");
    console.error(error instanceof Error ? error.toString() : String(error));
    process.exit(1);
  }
}

void main();
