import { strict as assert } from "assert";
import http from "http";
import WebSocket from "ws";
import { HDNodeWallet, Wallet } from "ethers";
import {
  LedgerErrorCode,
  LedgerErrorKind,
  MatchData,
  MemoryBlobStore,
  ScheduledMatch,
  isLedgerError,
} from "@matchproof/core";
import { FanoutEventSink, Ledger, MemoryEventSink, MemoryLedgerStore } from "@matchproof/ledger";
import { ApiError, ApiScheduledMatch, HttpClient, ProofBuilder } from "@matchproof/sdk";
import { OracleService } from "./services/OracleService";
import { EventFeed, parseEventFilter } from "./ws/feed";
import { createHttpWsServer } from "./ws/server";
import { STATUS_BY_KIND } from "./routes/index";

const STATS_A = { kills: 12, deaths: 3, score: 1200 };
const STATS_B = { kills: 3, deaths: 12, score: 300 };

function client(baseUrl: string, wallet: HDNodeWallet): HttpClient {
  return new HttpClient({
    serverUrl: baseUrl,
    address: wallet.address,
    signMessage: (msg) => wallet.signMessage(msg),
  });
}

function matchDataFor(match: ScheduledMatch | ApiScheduledMatch, playedAt: number): MatchData {
  return {
    gameId: match.gameId,
    matchId: match.matchId,
    playerA: match.playerA,
    playerB: match.playerB,
    winner: match.playerA,
    statsA: STATS_A,
    statsB: STATS_B,
    playedAt,
  };
}

function apiErrorWith(status: number, code?: string) {
  return (err: unknown) => {
    if (!(err instanceof ApiError)) return false;
    assert.equal(err.status, status);
    assert.equal(err.code, code);
    return true;
  };
}

function ledgerErrorWith(code: LedgerErrorCode, message?: RegExp) {
  return (err: unknown) => {
    if (!isLedgerError(err)) return false;
    assert.equal(err.code, code);
    if (message) assert.match(err.message, message);
    return true;
  };
}

describe("HTTP API", () => {
  let now = 1_700_000_000_000;
  const alice = Wallet.createRandom();
  const bob = Wallet.createRandom();
  const carol = Wallet.createRandom();
  const validator = Wallet.createRandom();

  const events = new MemoryEventSink();
  const feed = new EventFeed();
  const ledger = new Ledger({
    store: new MemoryLedgerStore(),
    clock: () => now,
    events: new FanoutEventSink(feed, events),
  });
  const oracle = new OracleService(ledger, new MemoryBlobStore());

  let httpServer: http.Server;
  let baseUrl = "";
  let provider: HttpClient;
  let consumer: HttpClient;

  let match: ApiScheduledMatch;
  let resultId = "";

  before(async () => {
    ({ httpServer } = createHttpWsServer(oracle, feed, { storeKind: "memory" }));
    await new Promise<void>((resolve) => httpServer.listen(0, "127.0.0.1", resolve));
    const address = httpServer.address();
    if (!address || typeof address === "string") throw new Error("server is not listening on TCP");
    baseUrl = `http://127.0.0.1:${address.port}`;
    provider = client(baseUrl, alice);
    consumer = client(baseUrl, carol);
  });

  after(async () => {
    feed.closeAll();
    httpServer.closeAllConnections();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  });

  it("reports health with an empty registry", async () => {
    const health = await provider.health();
    assert.equal(health.status, "ok");
    assert.equal(health.store, "memory");
    assert.equal(health.registry.totalMatchesScheduled, 0);
    assert.equal(health.registry.protocolBalance, "0");
  });

  it("schedules and locks a match", async () => {
    const scheduled = await provider.scheduleMatch({
      matchId: "m-1",
      gameId: "arena",
      opponent: bob.address,
      scheduledTime: now + 60_000,
    });
    assert.equal(scheduled.playerA, alice.address.toLowerCase());
    assert.equal(scheduled.playerB, bob.address.toLowerCase());
    assert.equal(scheduled.locked, false);

    await assert.rejects(provider.lockMatch(scheduled.id), apiErrorWith(412, "NOT_YET_STARTABLE"));

    now += 60_000;
    match = await provider.lockMatch(scheduled.id);
    assert.equal(match.locked, true);
    assert.equal(match.state, "scheduled");
  });

  it("rejects a second schedule under the same matchId", async () => {
    await assert.rejects(
      provider.scheduleMatch({
        matchId: "m-1",
        gameId: "arena",
        opponent: bob.address,
        scheduledTime: now + 60_000,
      }),
      apiErrorWith(409, "DUPLICATE_MATCH")
    );
  });

  it("refuses writes with a signature from another key", async () => {
    const timestamp = Date.now();
    const res = await fetch(`${baseUrl}/api/matches`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        address: alice.address,
        timestamp,
        signature: await bob.signMessage(`matchproof authentication for ${alice.address} at ${timestamp}`),
        matchId: "m-forged",
        gameId: "arena",
        opponent: bob.address,
        scheduledTime: now + 60_000,
      }),
    });
    assert.equal(res.status, 401);
    assert.deepEqual(await res.json(), { error: "Invalid signature or expired timestamp" });
  });

  it("stores the proof and records the result", async () => {
    const builder = new ProofBuilder(alice.address, (m) => alice.signMessage(m), () => now);
    const proof = await builder.build(matchDataFor(match, now));

    const { result, blobId } = await provider.submitResult(match.id, proof);
    resultId = result.id;
    assert.equal(result.contentBlobId, blobId);
    assert.equal(result.proofHash, proof.proofHash);
    assert.equal(result.submitter, alice.address.toLowerCase());
    assert.equal(result.winner, alice.address.toLowerCase());
    assert.equal(result.verified, false);
    assert.equal(result.revenueEarned, "0");

    assert.deepEqual(await provider.getProof(result.id), proof);
    assert.equal((await provider.getMatch(match.id)).state, "completed");
  });

  it("refuses paid queries before verification", async () => {
    await assert.rejects(
      consumer.queryPaid(resultId, 50_000_000n, "outcome"),
      apiErrorWith(412, "UNVERIFIED")
    );
  });

  it("verifies the result", async () => {
    const result = await client(baseUrl, validator).verifyResult(match.id, resultId);
    assert.equal(result.verified, true);
    assert.equal(result.verifier, validator.address.toLowerCase());
    assert.equal(result.verifiedAt, now);
    assert.equal((await provider.getMatch(match.id)).state, "verified");
  });

  it("splits a paid query and pushes it to event subscribers", async () => {
    const ws = new WebSocket(`${baseUrl.replace("http", "ws")}/ws/events?types=query.paid`);
    await new Promise<void>((resolve, reject) => {
      ws.once("open", () => resolve());
      ws.once("error", reject);
    });
    const pushed = new Promise<string>((resolve) => ws.once("message", (data) => resolve(data.toString())));

    const receipt = await consumer.queryPaid(resultId, 50_000_000n, "stats");
    assert.equal(receipt.payment, "50000000");
    assert.equal(receipt.providerShare, "35000000");
    assert.equal(receipt.protocolShare, "10000000");
    assert.equal(receipt.validatorShare, "5000000");
    assert.equal(receipt.burned, "0");
    assert.equal(receipt.data.kind, "stats");
    assert.deepEqual(receipt.data.statsA, STATS_A);

    const message: unknown = JSON.parse(await pushed);
    assert.deepEqual(message, {
      type: "query.paid",
      timestamp: now,
      payload: {
        resultId,
        matchId: "m-1",
        consumer: carol.address.toLowerCase(),
        provider: alice.address.toLowerCase(),
        queryKind: "stats",
        payment: "50000000",
        providerShare: "35000000",
        protocolShare: "10000000",
        validatorShare: "5000000",
      },
    });
    ws.close();

    assert.equal(await provider.getBalance(), 35_000_000n);
  });

  it("maps short payments to 402", async () => {
    await assert.rejects(
      consumer.queryPaid(resultId, 49_999_999n, "outcome"),
      apiErrorWith(402, "INSUFFICIENT_PAYMENT")
    );
  });

  it("sells a subscription and serves queries from it", async () => {
    await assert.rejects(consumer.createSubscription("gold", 5_000_000_000n), apiErrorWith(400, "INVALID_TIER"));

    const sub = await consumer.createSubscription("basic", 5_000_000_000n);
    assert.equal(sub.tier, "basic");
    assert.equal(sub.queriesRemaining, 200);
    assert.equal(sub.pricePaid, "5000000000");

    const receipt = await consumer.querySubscribed(resultId, sub.id, "outcome");
    assert.equal(receipt.queriesRemaining, 199);
    assert.deepEqual(receipt.data, {
      kind: "outcome",
      matchId: "m-1",
      winner: alice.address.toLowerCase(),
      draw: false,
      verified: true,
    });

    await assert.rejects(
      client(baseUrl, bob).querySubscribed(resultId, sub.id, "outcome"),
      apiErrorWith(403, "NOT_OWNER")
    );
    assert.equal((await consumer.getSubscription(sub.id)).queriesRemaining, 199);
  });

  it("looks matches and results up by matchId", async () => {
    const { match: found, result } = await consumer.lookupMatch("m-1");
    assert.equal(found.id, match.id);
    assert.equal(result?.id, resultId);
    assert.equal(result?.queryCount, 2);
    assert.equal(result?.revenueEarned, "35000000");

    await assert.rejects(consumer.lookupMatch("m-404"), apiErrorWith(404, "MATCH_NOT_FOUND"));
    await assert.rejects(consumer.getResult("missing"), apiErrorWith(404, "RESULT_NOT_FOUND"));
  });

  it("filters result listings", async () => {
    assert.equal((await consumer.listResults({ verified: true })).length, 1);
    assert.equal((await consumer.listResults({ verified: false })).length, 0);
    assert.equal((await consumer.listResults({ submitter: alice.address })).length, 1);
    assert.equal((await consumer.listMatches({ state: "verified" })).length, 1);
  });

  it("serves analytics", async () => {
    const providerStats = await consumer.getProviderAnalytics(alice.address);
    assert.equal(providerStats.totalMatchesSubmitted, 1);
    assert.equal(providerStats.totalMatchesVerified, 1);
    assert.equal(providerStats.winCount, 1);
    assert.equal(providerStats.winRate, 100);
    assert.equal(providerStats.totalRevenueEarned, "35000000");
    assert.equal(providerStats.totalQueriesServed, 2);

    const consumerStats = await consumer.getConsumerAnalytics();
    assert.equal(consumerStats.totalQueriesMade, 2);
    assert.equal(consumerStats.paidQueries, 1);
    assert.equal(consumerStats.subscribedQueries, 1);
    assert.equal(consumerStats.uniqueMatchesQueried, 1);
    assert.equal(consumerStats.totalSpent, "50000000");
    assert.equal(consumerStats.subscriptionTier, "basic");

    const protocol = await consumer.getProtocolAnalytics();
    assert.equal(protocol.paidQueries, 1);
    assert.equal(protocol.subscribedQueries, 1);
    assert.equal(protocol.basicSubscribers, 1);
    assert.equal(protocol.subscriptionRevenue, "5000000000");
    assert.equal(protocol.totalProtocolRevenue, "5010000000");

    const top = await consumer.getTopProviders();
    assert.deepEqual(
      top.map((p) => p.provider),
      [alice.address.toLowerCase()]
    );
  });

  it("serves provider earnings and performance", async () => {
    const day = 1_699_920_000_000;
    const earnings = await consumer.getProviderEarnings(alice.address);
    assert.equal(earnings.totalEarned, "35000000");
    assert.equal(earnings.queriesServed, 2);
    assert.equal(earnings.averagePerQuery, "17500000");
    assert.equal(earnings.highestMatchRevenue, "35000000");
    assert.equal(earnings.today, "35000000");
    assert.equal(earnings.thisMonth, "35000000");
    assert.deepEqual(earnings.topMatches, [
      { resultId, matchId: "m-1", gameId: "arena", revenue: "35000000", queries: 2 },
    ]);
    assert.equal(earnings.revenueOverTime.length, 30);
    assert.deepEqual(earnings.revenueOverTime[29], { timestamp: day, value: "35000000" });

    assert.deepEqual(await consumer.getProviderPerformance(alice.address), {
      provider: alice.address.toLowerCase(),
      wins: 1,
      losses: 0,
      draws: 0,
      winRate: 100,
      totalMatches: 1,
      recentForm: ["W"],
      byGame: [{ gameId: "arena", matches: 1, winRate: 100 }],
    });

    const top = await consumer.getTopEarningMatches(alice.address, 1);
    assert.deepEqual(top.map((m) => m.resultId), [resultId]);

    assert.deepEqual(await consumer.getRevenueOverTime({ days: 2 }), [
      { timestamp: day - 86_400_000, value: "0" },
      { timestamp: day, value: "35000000" },
    ]);
    const forBob = await consumer.getRevenueOverTime({ days: 2, provider: bob.address });
    assert.deepEqual(forBob.map((p) => p.value), ["0", "0"]);
    await assert.rejects(consumer.getRevenueOverTime({ days: 0 }), apiErrorWith(400, "INVALID_INPUT"));
  });

  it("published every committed operation", () => {
    assert.deepEqual(
      events.events.map((e) => e.type),
      [
        "match.scheduled",
        "match.locked",
        "result.submitted",
        "result.verified",
        "query.paid",
        "subscription.created",
        "query.subscribed",
      ]
    );
  });
});

describe("OracleService", () => {
  const alice = Wallet.createRandom();
  const bob = Wallet.createRandom();
  let now = 1_000_000;
  let ledger: Ledger;
  let oracle: OracleService;
  let scheduled: ScheduledMatch;

  beforeEach(async () => {
    now = 1_000_000;
    ledger = new Ledger({ store: new MemoryLedgerStore(), clock: () => now });
    oracle = new OracleService(ledger, new MemoryBlobStore());
    scheduled = await ledger.schedule(alice.address, {
      matchId: "m-svc",
      gameId: "arena",
      opponent: bob.address,
      scheduledTime: now + 1000,
    });
    now += 1000;
    await ledger.lock(alice.address, scheduled.id);
  });

  function proofFrom(wallet: HDNodeWallet, data: MatchData) {
    return new ProofBuilder(wallet.address, (m) => wallet.signMessage(m)).build(data);
  }

  it("rejects bodies that are not proofs", async () => {
    await assert.rejects(
      oracle.submitProof(alice.address, scheduled.id, { winner: alice.address }),
      ledgerErrorWith(LedgerErrorCode.INVALID_INPUT, /does not contain a match proof/)
    );
  });

  it("rejects a proof whose data was changed after signing", async () => {
    const proof = await proofFrom(alice, matchDataFor(scheduled, now));
    const tampered = { ...proof, matchData: { ...proof.matchData, statsB: STATS_A } };
    await assert.rejects(
      oracle.submitProof(alice.address, scheduled.id, tampered),
      ledgerErrorWith(LedgerErrorCode.INVALID_INPUT, /does not verify/)
    );
  });

  it("rejects a proof signed by someone other than the caller", async () => {
    const proof = await proofFrom(bob, matchDataFor(scheduled, now));
    await assert.rejects(
      oracle.submitProof(alice.address, scheduled.id, proof),
      ledgerErrorWith(LedgerErrorCode.INVALID_INPUT, /not signed by the caller/)
    );
  });

  it("rejects a proof describing another match", async () => {
    const proof = await proofFrom(alice, { ...matchDataFor(scheduled, now), matchId: "m-other" });
    await assert.rejects(
      oracle.submitProof(alice.address, scheduled.id, proof),
      ledgerErrorWith(LedgerErrorCode.INVALID_INPUT, /different match than m-svc/)
    );
  });

  it("lets the opponent submit a proof they signed", async () => {
    const proof = await proofFrom(bob, { ...matchDataFor(scheduled, now), winner: scheduled.playerB });
    const { result, blobId } = await oracle.submitProof(bob.address, scheduled.id, proof);
    assert.equal(result.submitter, bob.address.toLowerCase());
    assert.equal(result.winner, bob.address.toLowerCase());
    assert.equal(result.contentBlobId, blobId);

    const stored = await oracle.getProof(result.id);
    assert.equal(stored.proofHash, proof.proofHash);
  });

  it("reports a missing result when fetching its proof", async () => {
    await assert.rejects(oracle.getProof("nope"), ledgerErrorWith(LedgerErrorCode.RESULT_NOT_FOUND));
  });

  it("leaves nothing recorded when the match is unknown", async () => {
    const proof = await proofFrom(alice, matchDataFor(scheduled, now));
    await assert.rejects(
      oracle.submitProof(alice.address, "no-such-match", proof),
      ledgerErrorWith(LedgerErrorCode.MATCH_NOT_FOUND)
    );
    assert.equal((await ledger.getRegistry()).totalMatchesCompleted, 0);
  });
});

describe("routing helpers", () => {
  it("parses type filters and drops unknown names", () => {
    assert.equal(parseEventFilter(null), null);
    assert.equal(parseEventFilter("nope"), null);
    assert.deepEqual(
      [...(parseEventFilter("query.paid, nope,result.verified") ?? [])],
      ["query.paid", "result.verified"]
    );
  });

  it("maps every error kind to an HTTP status", () => {
    assert.equal(STATUS_BY_KIND[LedgerErrorKind.DUPLICATE_ENTITY], 409);
    assert.equal(STATUS_BY_KIND[LedgerErrorKind.INSUFFICIENT_PAYMENT], 402);
    assert.equal(STATUS_BY_KIND[LedgerErrorKind.RESOURCE_EXHAUSTED], 429);
    assert.equal(STATUS_BY_KIND[LedgerErrorKind.RESOURCE_EXPIRED], 410);
  });
});
