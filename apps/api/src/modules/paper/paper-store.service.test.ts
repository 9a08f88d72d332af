import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { InsufficientFundsError, InsufficientSharesError } from "../common/errors";
import { ConfigService } from "../config/config.service";
import { PaperStoreService } from "./paper-store.service";

describe("PaperStoreService", () => {
  let dataDir: string;
  let config: ConfigService;
  let store: PaperStoreService;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "autopilot-paper-"));
    config = new ConfigService(dataDir);
    config.update({ paper: { initialCash: 1_000 } });
    store = new PaperStoreService(config);
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("starts from the configured initial cash", () => {
    expect(store.getAccount()).toMatchObject({ cash: 1_000, holdings: {}, ledger: [] });
  });

  it("applies a buy to cash, holdings and ledger together and persists it", async () => {
    const entry = await store.apply({ symbol: "aapl", side: "BUY", quantity: 3 }, 100);

    expect(entry).toMatchObject({ symbol: "AAPL", side: "BUY", quantity: 3, fillPrice: 100 });
    const reopened = new PaperStoreService(config).getAccount();
    expect(reopened.cash).toBe(700);
    expect(reopened.holdings).toEqual({ AAPL: 3 });
    expect(reopened.ledger).toEqual([entry]);
  });

  it("drops a holding sold down to zero", async () => {
    await store.apply({ symbol: "AAPL", side: "BUY", quantity: 2 }, 100);
    await store.apply({ symbol: "AAPL", side: "SELL", quantity: 2 }, 110);

    const account = store.getAccount();
    expect(account.cash).toBe(1_020);
    expect(account.holdings).toEqual({});
    expect(account.ledger).toHaveLength(2);
  });

  it("refuses a buy above cash and leaves the account unchanged", async () => {
    await expect(store.apply({ symbol: "AAPL", side: "BUY", quantity: 11 }, 100)).rejects.toBeInstanceOf(InsufficientFundsError);

    expect(store.getAccount()).toMatchObject({ cash: 1_000, holdings: {}, ledger: [] });
  });

  it("refuses a sell above holdings", async () => {
    await store.apply({ symbol: "AAPL", side: "BUY", quantity: 1 }, 100);

    await expect(store.apply({ symbol: "AAPL", side: "SELL", quantity: 2 }, 100)).rejects.toBeInstanceOf(InsufficientSharesError);
    expect(store.getAccount().holdings).toEqual({ AAPL: 1 });
  });

  it("serializes concurrent applies so cash is never overspent", async () => {
    const results = await Promise.allSettled(
      Array.from({ length: 11 }, () => store.apply({ symbol: "AAPL", side: "BUY", quantity: 1 }, 100))
    );

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(10);
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.reason).toBeInstanceOf(InsufficientFundsError);
    expect(store.getAccount()).toMatchObject({ cash: 0, holdings: { AAPL: 10 } });
  });

  it("applies a client order id at most once", async () => {
    await store.apply({ symbol: "AAPL", side: "BUY", quantity: 2 }, 100);
    const first = await store.apply({ symbol: "AAPL", side: "SELL", quantity: 2 }, 105, "ref-1");
    const retry = await store.apply({ symbol: "AAPL", side: "SELL", quantity: 2 }, 99, "ref-1");

    expect(retry).toEqual(first);
    expect(store.getAccount().ledger).toHaveLength(2);
    expect(store.getAccount().cash).toBe(1_010);
  });

  it("starts fresh from a malformed file and keeps the bad copy", () => {
    fs.writeFileSync(store.accountPath, "{ not json");

    expect(store.getAccount()).toMatchObject({ cash: 1_000, holdings: {}, ledger: [] });
    const leftovers = fs.readdirSync(dataDir).filter((f) => f.startsWith("paper-account.json.corrupt-"));
    expect(leftovers).toHaveLength(1);
  });

  it("resets to the initial cash", async () => {
    await store.apply({ symbol: "AAPL", side: "BUY", quantity: 1 }, 100);

    const fresh = await store.reset();

    expect(fresh).toMatchObject({ cash: 1_000, holdings: {}, ledger: [] });
    expect(new PaperStoreService(config).getAccount().ledger).toEqual([]);
  });
});
