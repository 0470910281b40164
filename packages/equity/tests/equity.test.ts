/**
 * Tests for the Equity coordinator.
 *
 * Verifies:
 * - Proportional release with retained rounding dust
 * - Address rotation rules and check order
 * - Payouts follow the enabled address
 * - Rolled-back releases when the transfer is refused
 * - Serialization of concurrent releases
 * - Settled reads wait for in-flight releases
 * - Event emission
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryEventStore } from "@mintsplit/event-store";
import { Equity } from "../src/equity.js";
import { InMemoryPayoutTransport, PayoutTransportError } from "../src/payout-transport.js";
import type { PayoutTransport } from "../src/payout-transport.js";
import { EquityError } from "../src/types.js";
import {
  OUTSIDER,
  PAYEES,
  SHARES,
  addr,
  expectEquityError,
  expectRejection,
} from "./helpers.js";

function deferred(): {
  promise: Promise<void>;
  resolve: () => void;
  reject: (err: Error) => void;
} {
  let resolve: () => void = () => undefined;
  let reject: (err: Error) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("Equity", () => {
  let transport: InMemoryPayoutTransport;
  let eventStore: InMemoryEventStore;
  let equity: Equity;

  beforeEach(() => {
    transport = new InMemoryPayoutTransport();
    eventStore = new InMemoryEventStore();
    equity = new Equity(PAYEES, SHARES, { transport, eventStore });
  });

  // ─── Construction ──────────────────────────────────────────────────

  describe("construction", () => {
    it("exposes the registered payees", () => {
      expect(equity.payeeCount).toBe(3);
      expect(equity.totalShares).toBe(275n);
      expect(equity.totalReleased).toBe(0n);
      for (let i = 0; i < 3; i++) {
        expect(equity.payeeAddresses(i)).toEqual(PAYEES[i]);
        expect(equity.sharesOf(i)).toBe(SHARES[i]);
        expect(equity.released(i)).toBe(0n);
      }
    });

    it("enables the first address of every payee", () => {
      for (let i = 0; i < 3; i++) {
        expect(equity.payeeEnabledAddressIndex(i)).toBe(0);
        expect(equity.payeeEnabledAddress(i)).toBe(PAYEES[i]?.[0]);
      }
    });

    it("emits one payee-added event per payee", () => {
      const events = eventStore.read("equity");
      expect(events.map((e) => e.event.type)).toEqual([
        "equity.payee.added",
        "equity.payee.added",
        "equity.payee.added",
      ]);
      expect(events[1]?.event.payload).toEqual({
        payeeIndex: 1,
        addresses: [addr(4), addr(5), addr(6)],
        shares: "75",
      });
    });

    it("rejects out-of-range payee indices on every read", () => {
      expectEquityError(() => equity.sharesOf(3), "BAD_PAYEE_INDEX");
      expectEquityError(() => equity.released(3), "BAD_PAYEE_INDEX");
      expectEquityError(() => equity.releasable(3), "BAD_PAYEE_INDEX");
      expectEquityError(() => equity.payeeAddresses(3), "BAD_PAYEE_INDEX");
      expectEquityError(() => equity.payeeEnabledAddressIndex(3), "BAD_PAYEE_INDEX");
      expectEquityError(() => equity.payeeEnabledAddress(3), "BAD_PAYEE_INDEX");
    });
  });

  // ─── Receiving ─────────────────────────────────────────────────────

  describe("receive", () => {
    it("adds to the balance and logs the receipt", () => {
      const receipt = equity.receive(OUTSIDER, 1000n);

      expect(receipt.balance).toBe(1000n);
      expect(equity.balance).toBe(1000n);
      const last = eventStore.read("equity").at(-1);
      expect(last?.event.type).toBe("equity.funds.received");
      expect(last?.event.payload).toEqual({ from: OUTSIDER, amount: "1000" });
    });

    it("rejects a non-positive amount", () => {
      expectEquityError(() => equity.receive(OUTSIDER, 0n), "INVALID_AMOUNT");
      expect(equity.balance).toBe(0n);
    });
  });

  // ─── Releasing ─────────────────────────────────────────────────────

  describe("release", () => {
    it("splits 1000 units 363 / 272 / 363 and keeps 2 as dust", async () => {
      equity.receive(OUTSIDER, 1000n);

      await expect(equity.release(0)).resolves.toEqual({ payeeIndex: 0, to: addr(1), amount: 363n });
      await expect(equity.release(1)).resolves.toEqual({ payeeIndex: 1, to: addr(4), amount: 272n });
      await expect(equity.release(2)).resolves.toEqual({ payeeIndex: 2, to: addr(7), amount: 363n });

      expect(equity.totalReleased).toBe(998n);
      expect(equity.balance).toBe(2n);
      expect(transport.creditedTo(addr(1))).toBe(363n);
      expect(transport.creditedTo(addr(4))).toBe(272n);
      expect(transport.creditedTo(addr(7))).toBe(363n);
    });

    it("fails with NOTHING_DUE when there are no funds", async () => {
      const err = await expectRejection(equity.release(0), "NOTHING_DUE");
      expect(err.message).toBe("Payee 0 is not due payment");
    });

    it("fails with NOTHING_DUE once the payee is paid up", async () => {
      equity.receive(OUTSIDER, 1000n);
      await equity.release(0);

      await expectRejection(equity.release(0), "NOTHING_DUE");
      expect(equity.released(0)).toBe(363n);
    });

    it("pays only the newly accrued amount after further receipts", async () => {
      equity.receive(OUTSIDER, 1000n);
      await equity.release(0);
      equity.receive(OUTSIDER, 1750n);

      // floor(2750 × 100 / 275) = 1000, already released 363
      expect(equity.releasable(0)).toBe(637n);
      await expect(equity.release(0)).resolves.toMatchObject({ amount: 637n });
      expect(equity.released(0)).toBe(1000n);
    });

    it("is unaffected by the order of releases", async () => {
      equity.receive(OUTSIDER, 1000n);
      await equity.release(2);
      await equity.release(1);
      await equity.release(0);

      expect(equity.released(0)).toBe(363n);
      expect(equity.released(1)).toBe(272n);
      expect(equity.released(2)).toBe(363n);
    });

    it("rejects an out-of-range payee index", async () => {
      equity.receive(OUTSIDER, 1000n);
      await expectRejection(equity.release(3), "BAD_PAYEE_INDEX");
    });

    it("emits a payment-released event", async () => {
      equity.receive(OUTSIDER, 1000n);
      await equity.release(0);

      const last = eventStore.read("equity").at(-1);
      expect(last?.event.type).toBe("equity.payment.released");
      expect(last?.event.payload).toEqual({ payeeIndex: 0, to: addr(1), amount: "363" });
    });

    it("serializes concurrent releases of the same payee", async () => {
      equity.receive(OUTSIDER, 1000n);

      const [first, second] = await Promise.allSettled([equity.release(0), equity.release(0)]);

      expect(first.status).toBe("fulfilled");
      expect(second.status).toBe("rejected");
      if (second.status === "rejected") {
        expect(second.reason).toBeInstanceOf(EquityError);
      }
      expect(equity.totalReleased).toBe(363n);
      expect(transport.payouts).toHaveLength(1);
    });
  });

  // ─── Refused transfers ─────────────────────────────────────────────

  describe("refused transfers", () => {
    it("rolls back every change of the failed release", async () => {
      transport.refuse(addr(1));
      equity.receive(OUTSIDER, 1000n);
      const eventsBefore = eventStore.globalPosition();

      const err = await expectRejection(equity.release(0), "TRANSFER_REJECTED");

      expect(err.cause).toBeInstanceOf(PayoutTransportError);
      expect(equity.released(0)).toBe(0n);
      expect(equity.totalReleased).toBe(0n);
      expect(equity.balance).toBe(1000n);
      expect(eventStore.globalPosition()).toBe(eventsBefore);
    });

    it("pays the new address after a rotation away from the refusing one", async () => {
      transport.refuse(addr(1));
      equity.receive(OUTSIDER, 1000n);
      await expectRejection(equity.release(0), "TRANSFER_REJECTED");

      await equity.useNextAddress(addr(4), 0);
      await expect(equity.release(0)).resolves.toEqual({ payeeIndex: 0, to: addr(2), amount: 363n });
    });

    it("keeps receipts that land while the transfer is in flight", async () => {
      const gate = deferred();
      const send = vi.fn((): Promise<void> => gate.promise);
      const slow: PayoutTransport = { send };
      const gated = new Equity(PAYEES, SHARES, { transport: slow });
      gated.receive(OUTSIDER, 1000n);

      const pending = gated.release(0);
      await vi.waitFor(() => {
        expect(send).toHaveBeenCalledTimes(1);
      });

      // Accounting is applied before the transfer
      expect(gated.released(0)).toBe(363n);
      expect(gated.balance).toBe(637n);

      gated.receive(OUTSIDER, 100n);
      gate.reject(new Error("refused"));
      await expectRejection(pending, "TRANSFER_REJECTED");

      expect(gated.released(0)).toBe(0n);
      expect(gated.totalReleased).toBe(0n);
      expect(gated.balance).toBe(1100n);
      // floor(1100 × 100 / 275)
      expect(gated.releasable(0)).toBe(400n);
    });

    it("holds settled reads until the transfer finishes", async () => {
      const gate = deferred();
      const send = vi.fn((): Promise<void> => gate.promise);
      const slow: PayoutTransport = { send };
      const gated = new Equity(PAYEES, SHARES, { transport: slow });
      gated.receive(OUTSIDER, 1000n);

      const pending = gated.release(0);
      await vi.waitFor(() => {
        expect(send).toHaveBeenCalledTimes(1);
      });

      let answered = false;
      const read = gated.settled((e) => {
        answered = true;
        return e.snapshot();
      });
      await Promise.resolve();
      expect(answered).toBe(false);

      gate.reject(new Error("refused"));
      await expectRejection(pending, "TRANSFER_REJECTED");

      const snapshot = await read;
      expect(answered).toBe(true);
      expect(snapshot.totalReleased).toBe(0n);
      expect(snapshot.balance).toBe(1000n);
      expect(snapshot.payees[0]?.released).toBe(0n);
      expect(snapshot.payees[0]?.releasable).toBe(363n);
    });

    it("answers settled reads at once when nothing is pending", async () => {
      equity.receive(OUTSIDER, 1000n);
      await expect(equity.settled((e) => e.releasable(1))).resolves.toBe(272n);
    });
  });

  // ─── Rotation ──────────────────────────────────────────────────────

  describe("useNextAddress", () => {
    it("moves funds to the next address after a rotation", async () => {
      await expect(equity.useNextAddress(addr(4), 0)).resolves.toEqual({
        payeeIndex: 0,
        enabledIndex: 1,
        enabledAddress: addr(2),
      });

      equity.receive(OUTSIDER, 1000n);
      await equity.release(0);

      expect(transport.creditedTo(addr(2))).toBe(363n);
      expect(transport.creditedTo(addr(1))).toBe(0n);
    });

    it("fails with ALL_ADDRESSES_USED after the last address", async () => {
      await equity.useNextAddress(addr(4), 0);
      await equity.useNextAddress(addr(4), 0);
      expect(equity.payeeEnabledAddressIndex(0)).toBe(2);

      const err = await expectRejection(equity.useNextAddress(addr(4), 0), "ALL_ADDRESSES_USED");
      expect(err.message).toBe("All addresses of payee 0 already used");
      expect(equity.payeeEnabledAddressIndex(0)).toBe(2);
    });

    it("forbids a payee from rotating its own addresses", async () => {
      await expectRejection(equity.useNextAddress(addr(1), 0), "SELF_ROTATION_FORBIDDEN");
      await expectRejection(equity.useNextAddress(addr(3), 0), "SELF_ROTATION_FORBIDDEN");
      expect(equity.payeeEnabledAddressIndex(0)).toBe(0);
    });

    it("rejects a caller outside the payee set", async () => {
      await expectRejection(equity.useNextAddress(OUTSIDER, 0), "CALLER_NOT_PAYEE");
    });

    it("rejects a caller whose address was rotated away", async () => {
      await equity.useNextAddress(addr(1), 1);

      await expectRejection(equity.useNextAddress(addr(4), 0), "CALLER_ADDRESS_DISABLED");
      await expect(equity.useNextAddress(addr(5), 0)).resolves.toMatchObject({ enabledIndex: 1 });
    });

    it("lets a later backup address of the caller act", async () => {
      await expect(equity.useNextAddress(addr(9), 0)).resolves.toMatchObject({ enabledIndex: 1 });
    });

    it("checks the payee index first", async () => {
      await expectRejection(equity.useNextAddress(OUTSIDER, 3), "BAD_PAYEE_INDEX");
    });

    it("checks exhaustion before the caller", async () => {
      await equity.useNextAddress(addr(4), 0);
      await equity.useNextAddress(addr(4), 0);
      await expectRejection(equity.useNextAddress(OUTSIDER, 0), "ALL_ADDRESSES_USED");
    });

    it("checks self-rotation before the caller's enabled status", async () => {
      await equity.useNextAddress(addr(4), 0);
      // addr(1) is now disabled and also belongs to payee 0
      await expectRejection(equity.useNextAddress(addr(1), 0), "SELF_ROTATION_FORBIDDEN");
    });

    it("matches the caller case-insensitively", async () => {
      const lower = "0x52908400098527886e0f7030069857d2e4169ee7";
      const mixed = new Equity([[lower, addr(2), addr(3)], [addr(4), addr(5), addr(6)]], [1n, 1n]);

      await expect(mixed.useNextAddress("0x52908400098527886E0F7030069857D2E4169EE7", 1))
        .resolves.toMatchObject({ enabledIndex: 1 });
    });

    it("hands the whole accrued amount to the new address", async () => {
      equity.receive(OUTSIDER, 550n);
      await expect(equity.release(0)).resolves.toMatchObject({ to: addr(1), amount: 200n });

      await equity.useNextAddress(addr(7), 0);
      equity.receive(OUTSIDER, 550n);

      await expect(equity.release(0)).resolves.toMatchObject({ to: addr(2), amount: 200n });
    });

    it("emits an address-rotated event", async () => {
      await equity.useNextAddress(addr(4), 0);

      const last = eventStore.read("equity").at(-1);
      expect(last?.event.type).toBe("equity.address.rotated");
      expect(last?.event.metadata.actor).toBe(addr(4));
      expect(last?.event.payload).toEqual({ payeeIndex: 0, enabledIndex: 1, enabledAddress: addr(2) });
    });
  });

  // ─── Snapshot ──────────────────────────────────────────────────────

  describe("snapshot", () => {
    it("summarizes totals and payees", async () => {
      equity.receive(OUTSIDER, 1000n);
      await equity.release(1);

      const snapshot = equity.snapshot();
      expect(snapshot).toMatchObject({
        groupSize: 3,
        payeeCount: 3,
        totalShares: 275n,
        totalReleased: 272n,
        totalReceived: 1000n,
        balance: 728n,
      });
      expect(snapshot.payees[1]).toEqual({
        index: 1,
        addresses: [addr(4), addr(5), addr(6)],
        shares: 75n,
        released: 272n,
        releasable: 0n,
        enabledIndex: 0,
        enabledAddress: addr(4),
      });
      expect(snapshot.payees[0]?.releasable).toBe(363n);
    });

    it("finds the payee owning an address", () => {
      expect(equity.payeeIndexOf(addr(8))).toBe(2);
      expect(equity.payeeIndexOf(OUTSIDER)).toBeUndefined();
    });
  });
});
