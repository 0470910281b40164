/**
 * Translate validated configuration into the service's shape.
 */

import type { AppConfig, EquityFile } from "./config.js";
import type { MintsplitServiceConfig } from "./services/mintsplit-service.js";

export function serviceConfigFrom(config: AppConfig, equity: EquityFile): MintsplitServiceConfig {
  return {
    mintDomain: {
      name: config.MINT_NAME,
      version: config.MINT_VERSION,
      chainId: config.CHAIN_ID,
      verifyingContract: config.MINT_CONTRACT_ADDRESS,
    },
    mintAuthority: config.MINT_AUTHORITY_ADDRESS,
    ...(config.BASE_TOKEN_URI !== "" ? { baseTokenUri: config.BASE_TOKEN_URI } : {}),
    equityDomain: {
      name: config.EQUITY_NAME,
      version: "1",
      chainId: config.CHAIN_ID,
      verifyingContract: config.EQUITY_CONTRACT_ADDRESS,
    },
    payees: equity.payees,
    groupSize: config.EQUITY_GROUP_SIZE,
  };
}
