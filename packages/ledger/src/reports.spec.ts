import { strict as assert } from "assert";
import { MatchResult, NO_WINNER, RevenueEntry } from "@matchproof/core";
import {
  DAY_MS,
  bucketRevenueByDay,
  buildPerformance,
  formMark,
  startOfUtcDay,
  sumProviderShareSince,
} from "./Reports";
import { emptyProviderAnalytics } from "./Analytics";

const A = "0x" + "a".repeat(40);
const B = "0x" + "b".repeat(40);

const T = 1_700_000_000_000;
const T_DAY = 1_699_920_000_000;

function entry(createdAt: number, providerShare: bigint): RevenueEntry {
  return {
    id: `rev-${createdAt}`,
    resultId: "r1",
    matchId: "m1",
    provider: A,
    consumer: B,
    providerShare,
    protocolShare: 0n,
    validatorShare: 0n,
    createdAt,
  };
}

function result(id: string, winner: string): MatchResult {
  return {
    id,
    matchId: id,
    scheduledMatchId: `s-${id}`,
    submitter: A,
    winner,
    statsA: { kills: 0, deaths: 0, score: 0 },
    statsB: { kills: 0, deaths: 0, score: 0 },
    contentBlobId: "blob",
    proofHash: "0xproof",
    verified: true,
    verifier: B,
    queryCount: 0,
    revenueEarned: 0n,
    submittedAt: T,
    verifiedAt: T,
  };
}

describe("startOfUtcDay", () => {
  it("truncates to midnight UTC", () => {
    assert.equal(startOfUtcDay(T), T_DAY);
    assert.equal(startOfUtcDay(T_DAY), T_DAY);
    assert.equal(startOfUtcDay(T_DAY - 1), T_DAY - DAY_MS);
  });
});

describe("bucketRevenueByDay", () => {
  it("sums provider share per day and zero-fills the rest", () => {
    const first = T_DAY - 2 * DAY_MS;
    const points = bucketRevenueByDay(
      [entry(first - 1, 99n), entry(first, 7n), entry(T - DAY_MS, 10n), entry(T, 30n), entry(T, 5n)],
      3,
      T
    );
    assert.deepEqual(points, [
      { timestamp: first, value: 7n },
      { timestamp: first + DAY_MS, value: 10n },
      { timestamp: T_DAY, value: 35n },
    ]);
  });

  it("ignores entries after now", () => {
    const points = bucketRevenueByDay([entry(T + 1, 5n)], 1, T);
    assert.deepEqual(points, [{ timestamp: T_DAY, value: 0n }]);
  });
});

describe("sumProviderShareSince", () => {
  it("counts entries at or after the cutoff", () => {
    const entries = [entry(T - 2 * DAY_MS, 1n), entry(T - DAY_MS, 2n), entry(T, 4n)];
    assert.equal(sumProviderShareSince(entries, T - DAY_MS), 6n);
    assert.equal(sumProviderShareSince(entries, T + 1), 0n);
  });
});

describe("formMark", () => {
  it("reads the result from the submitter's side", () => {
    assert.equal(formMark(result("w", A)), "W");
    assert.equal(formMark(result("l", B)), "L");
    assert.equal(formMark(result("d", NO_WINNER)), "D");
  });
});

describe("buildPerformance", () => {
  it("keeps the last ten marks and groups games in first-seen order", () => {
    const history = Array.from({ length: 12 }, (_, i) => ({
      result: result(`m${i}`, i % 3 === 0 ? B : A),
      gameId: i < 2 ? "duel" : "arena",
    }));
    const analytics = { ...emptyProviderAnalytics(A), winCount: 8, lossCount: 4, winRate: 66, totalMatchesSubmitted: 12 };

    const performance = buildPerformance(analytics, history);

    assert.deepEqual(performance.recentForm, ["L", "W", "W", "L", "W", "W", "L", "W", "W", "L"]);
    assert.deepEqual(performance.byGame, [
      { gameId: "duel", matches: 2, winRate: 50 },
      { gameId: "arena", matches: 10, winRate: 70 },
    ]);
    assert.equal(performance.wins, 8);
    assert.equal(performance.losses, 4);
    assert.equal(performance.draws, 0);
    assert.equal(performance.winRate, 66);
    assert.equal(performance.totalMatches, 12);
  });

  it("is empty for a provider without results", () => {
    const performance = buildPerformance(emptyProviderAnalytics(A), []);
    assert.deepEqual(performance.recentForm, []);
    assert.deepEqual(performance.byGame, []);
    assert.equal(performance.totalMatches, 0);
  });
});
