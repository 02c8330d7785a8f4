/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { hasChainLedger, loadConfig } from "../src/config.js";

const REQUIRED = { LEDGER_ORGANIZATION: "test-org" };

describe("loadConfig", () => {
  it("returns defaults when only the organization is set", () => {
    const config = loadConfig(REQUIRED);

    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.LEDGER_NETWORK).toBe("testnet");
    expect(config.LEDGER_CHAIN_ID).toBe("eip155:11155111");
    expect(config.STORAGE_REGION).toBe("us-west-2");
    expect(config.REQUEST_TIMEOUT_MS).toBe(30_000);
    expect(config.CACHE_TTL_MS).toBe(300_000);
    expect(config.RETRY_MAX_ATTEMPTS).toBe(3);
    expect(config.VERIFY_CONCURRENCY).toBe(8);
    expect(config.SEARCH_MAX_CANDIDATES).toBe(100);
    expect(config.AMBIGUITY_TIE_MARGIN).toBe(0);
    expect(config.VERIFY_MAX_TIED_FETCHES).toBe(8);
    expect(hasChainLedger(config)).toBe(false);
  });

  it("requires the organization", () => {
    expect(() => loadConfig({})).toThrow();
    expect(() => loadConfig({ LEDGER_ORGANIZATION: "  " })).toThrow("LEDGER_ORGANIZATION is required");
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      ...REQUIRED,
      PORT: "8080",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      LEDGER_NETWORK: "mainnet",
      LEDGER_CHAIN_ID: "eip155:1",
      LEDGER_RPC_URL: "http://rpc.local:8545",
      LEDGER_CONTRACT_ADDRESS: "0x1234567890abcdef1234567890abcdef12345678",
      CACHE_TTL_MS: "1000",
      AMBIGUITY_TIE_MARGIN: "1.5",
    });

    expect(config.PORT).toBe(8080);
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.LEDGER_NETWORK).toBe("mainnet");
    expect(config.LEDGER_CHAIN_ID).toBe("eip155:1");
    expect(config.CACHE_TTL_MS).toBe(1000);
    expect(config.AMBIGUITY_TIE_MARGIN).toBe(1.5);
    expect(hasChainLedger(config)).toBe(true);
  });

  it("requires an anchor contract in production", () => {
    expect(() => loadConfig({ ...REQUIRED, NODE_ENV: "production" })).toThrow(
      "LEDGER_RPC_URL and LEDGER_CONTRACT_ADDRESS are required in production",
    );
    expect(() =>
      loadConfig({ ...REQUIRED, NODE_ENV: "production", LEDGER_RPC_URL: "http://rpc.local:8545" }),
    ).toThrow("LEDGER_RPC_URL and LEDGER_CONTRACT_ADDRESS are required in production");
    expect(hasChainLedger(loadConfig({ ...REQUIRED, NODE_ENV: "test" }))).toBe(false);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ ...REQUIRED, PORT: "0" })).toThrow();
    expect(() => loadConfig({ ...REQUIRED, PORT: "99999" })).toThrow();
    expect(() => loadConfig({ ...REQUIRED, LEDGER_CHAIN_ID: "solana:mainnet" })).toThrow();
    expect(() => loadConfig({ ...REQUIRED, LEDGER_CONTRACT_ADDRESS: "0x1234" })).toThrow();
    expect(() => loadConfig({ ...REQUIRED, AMBIGUITY_TIE_MARGIN: "-1" })).toThrow();
    expect(() => loadConfig({ ...REQUIRED, VERIFY_CONCURRENCY: "0" })).toThrow();
  });
});
