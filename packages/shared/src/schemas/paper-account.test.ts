import { describe, expect, it } from "vitest";

import type { PaperAccount } from "./paper-account";
import { defaultPaperAccount, deserializePaperAccount, serializePaperAccount } from "./paper-account";

describe("paper account serialization", () => {
  it("round-trips an account with three trades", () => {
    const account: PaperAccount = {
      version: 1,
      createdAt: "2026-01-02T15:00:00.000Z",
      cash: 9_012.5,
      holdings: { AAPL: 3, MSFT: 0.25 },
      ledger: [
        { id: "t1", ts: "2026-01-02T15:01:00.000Z", symbol: "AAPL", side: "BUY", quantity: 5, fillPrice: 190.1 },
        { id: "t2", ts: "2026-01-02T15:02:00.000Z", symbol: "MSFT", side: "BUY", quantity: 0.25, fillPrice: 410 },
        {
          id: "t3",
          ts: "2026-01-02T15:03:00.000Z",
          symbol: "AAPL",
          side: "SELL",
          quantity: 2,
          fillPrice: 195.75,
          clientOrderId: "ref-1"
        }
      ]
    };

    expect(deserializePaperAccount(serializePaperAccount(account))).toEqual(account);
  });

  it("starts a fresh account with the given cash and nothing else", () => {
    const account = defaultPaperAccount(2_500);

    expect(account.cash).toBe(2_500);
    expect(account.holdings).toEqual({});
    expect(account.ledger).toEqual([]);
  });

  it("rejects negative cash", () => {
    const raw = JSON.stringify({ ...defaultPaperAccount(0), cash: -1 });
    expect(() => deserializePaperAccount(raw)).toThrow();
  });
});
