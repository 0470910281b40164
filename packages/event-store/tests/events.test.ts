/**
 * Tests for the domain event factory.
 */

import { describe, it, expect } from "vitest";
import { createEvent, MINTSPLIT_EVENTS } from "../src/events.js";

describe("createEvent", () => {
  it("derives the source from the event type", () => {
    const minted = createEvent(MINTSPLIT_EVENTS.VOUCHER_REDEEMED, "0xabc", {
      assetId: "1337",
      owner: "0x0000000000000000000000000000000000000001",
      signer: "0x0000000000000000000000000000000000000002",
      metadataUri: "ipfs://test",
      metadataHash: "0x00",
      payment: "1",
    });
    const received = createEvent(MINTSPLIT_EVENTS.FUNDS_RECEIVED, "0xabc", {
      from: "0x0000000000000000000000000000000000000001",
      amount: "1000",
    });

    expect(minted.metadata.source).toBe("minting");
    expect(received.metadata.source).toBe("equity");
    expect(minted.type).toBe("minting.voucher.redeemed");
    expect(minted.payload).toEqual({
      assetId: "1337",
      owner: "0x0000000000000000000000000000000000000001",
      signer: "0x0000000000000000000000000000000000000002",
      metadataUri: "ipfs://test",
      metadataHash: "0x00",
      payment: "1",
    });
  });

  it("uses the event ID as correlation ID", () => {
    const event = createEvent(MINTSPLIT_EVENTS.FUNDS_RECEIVED, "system", {
      from: "0x0000000000000000000000000000000000000001",
      amount: "5",
    });
    expect(event.metadata.correlationId).toBe(event.metadata.eventId);
  });

  it("takes a fixed timestamp", () => {
    const event = createEvent(
      MINTSPLIT_EVENTS.ADDRESS_ROTATED,
      "system",
      { payeeIndex: 0, enabledIndex: 1, enabledAddress: "0x0000000000000000000000000000000000000002" },
      { timestamp: "2026-01-01T00:00:00.000Z" },
    );
    expect(event.metadata).toMatchObject({
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "system",
      source: "equity",
    });
  });
});
