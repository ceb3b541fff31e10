import { strict as assert } from "assert";
import { QUERY_PRICE } from "@matchproof/core";
import { splitPayment } from "./RevenueDistributor";
import { averageOf, computeWinRate } from "./Analytics";
import { Coin } from "./Coin";

describe("splitPayment", () => {
  it("splits the query price 70/20/10 with nothing left over", () => {
    assert.deepEqual(splitPayment(QUERY_PRICE), {
      provider: 35_000_000n,
      protocol: 10_000_000n,
      validator: 5_000_000n,
      burned: 0n,
    });
  });

  it("loses less than 3 units to rounding", () => {
    const payments = [QUERY_PRICE, QUERY_PRICE + 1n, QUERY_PRICE + 99n, 123_456_789n, 987_654_321_987n];
    for (const payment of payments) {
      const split = splitPayment(payment);
      const distributed = split.provider + split.protocol + split.validator;
      assert.ok(distributed <= payment);
      assert.ok(payment - distributed < 3n, `remainder ${payment - distributed} for ${payment}`);
      assert.equal(split.burned, payment - distributed);
    }
  });

  it("truncates each share independently", () => {
    const split = splitPayment(123_456_789n);
    assert.equal(split.provider, 86_419_752n);
    assert.equal(split.protocol, 24_691_357n);
    assert.equal(split.validator, 12_345_678n);
    assert.equal(split.burned, 2n);
  });
});

describe("computeWinRate", () => {
  it("is 0 with no submissions", () => {
    assert.equal(computeWinRate(0, 0), 0);
  });

  it("floors the percentage", () => {
    assert.equal(computeWinRate(1, 3), 33);
    assert.equal(computeWinRate(2, 3), 66);
    assert.equal(computeWinRate(7, 7), 100);
    assert.equal(computeWinRate(0, 4), 0);
  });

  it("matches floor(100*W/N) across a range", () => {
    for (let n = 1; n <= 25; n++) {
      for (let w = 0; w <= n; w++) {
        assert.equal(computeWinRate(w, n), Math.floor((100 * w) / n));
      }
    }
  });
});

describe("averageOf", () => {
  it("is 0 for an empty count and truncates otherwise", () => {
    assert.equal(averageOf(100n, 0), 0n);
    assert.equal(averageOf(100n, 3), 33n);
  });
});

describe("Coin", () => {
  it("splits and merges without creating value", () => {
    const coin = new Coin(100n);
    const part = coin.split(30n);
    assert.equal(coin.value(), 70n);
    assert.equal(part.value(), 30n);

    coin.merge(part);
    assert.equal(coin.value(), 100n);
    assert.equal(part.value(), 0n);
  });

  it("refuses to split more than it holds", () => {
    const coin = new Coin(10n);
    assert.throws(() => coin.split(11n), /Cannot split 11/);
    assert.throws(() => coin.split(-1n), /Cannot split -1/);
    assert.equal(coin.value(), 10n);
  });

  it("drains to zero", () => {
    const coin = new Coin(42n);
    assert.equal(coin.drain(), 42n);
    assert.equal(coin.value(), 0n);
    assert.equal(Coin.zero().value(), 0n);
  });

  it("rejects a negative value", () => {
    assert.throws(() => new Coin(-1n), /cannot be negative/);
  });
});
