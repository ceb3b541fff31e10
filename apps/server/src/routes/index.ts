import { Request, Response, Express } from "express";
import {
  LedgerError,
  LedgerErrorCode,
  LedgerErrorKind,
  MatchState,
  isEvmAddress,
  isLedgerError,
  isQueryKind,
  parseAmount,
  serialize,
  validateAuth,
} from "@matchproof/core";
import { Ledger } from "@matchproof/ledger";
import { OracleService } from "../services/OracleService";
import log from "../logger";

export const STATUS_BY_KIND: Record<LedgerErrorKind, number> = {
  [LedgerErrorKind.DUPLICATE_ENTITY]: 409,
  [LedgerErrorKind.NOT_AUTHORIZED]: 403,
  [LedgerErrorKind.PRECONDITION_NOT_MET]: 412,
  [LedgerErrorKind.INSUFFICIENT_PAYMENT]: 402,
  [LedgerErrorKind.RESOURCE_EXHAUSTED]: 429,
  [LedgerErrorKind.RESOURCE_EXPIRED]: 410,
  [LedgerErrorKind.NOT_FOUND]: 404,
  [LedgerErrorKind.INVALID_ARGUMENT]: 400,
};

const MAX_PAGE_SIZE = 200;
const MAX_REVENUE_DAYS = 365;

function field(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return Reflect.get(body, key);
}

function requireString(body: unknown, key: string): string {
  const value = field(body, key);
  if (typeof value !== "string" || value.length === 0) {
    throw new LedgerError(LedgerErrorCode.INVALID_INPUT, `${key} required`);
  }
  return value;
}

function requireAmount(body: unknown, key: string): bigint {
  const amount = parseAmount(field(body, key));
  if (amount === null) {
    throw new LedgerError(LedgerErrorCode.INVALID_INPUT, `${key} must be a non-negative integer amount`);
  }
  return amount;
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function queryInt(value: unknown, fallback: number, max: number = MAX_PAGE_SIZE): number {
  const parsed = typeof value === "string" ? parseInt(value, 10) : NaN;
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return Math.min(parsed, max);
}

function queryBool(value: unknown): boolean | undefined {
  if (value === "true") return true;
  if (value === "false") return false;
  return undefined;
}

function parseMatchState(value: unknown): MatchState | undefined {
  return Object.values(MatchState).find((state) => state === value);
}

/**
 * Validate address + signature + timestamp from the request body.
 * Returns the authenticated address or null (after sending an error response).
 */
function requireAuth(req: Request, res: Response): { address: string } | null {
  const body: unknown = req.body;
  const address = field(body, "address");
  const signature = field(body, "signature");
  const timestamp = field(body, "timestamp");
  if (typeof address !== "string" || !address) {
    res.status(400).json({ error: "address required" });
    return null;
  }
  if (!isEvmAddress(address)) {
    res.status(400).json({ error: "address must be a valid EVM address (0x followed by 40 hex characters)" });
    return null;
  }
  if (typeof signature !== "string" || typeof timestamp !== "number") {
    res.status(400).json({ error: "signature and timestamp required for authentication" });
    return null;
  }
  if (!validateAuth(address, signature, timestamp)) {
    res.status(401).json({ error: "Invalid signature or expired timestamp" });
    return null;
  }
  return { address };
}

function sendError(res: Response, err: unknown): void {
  if (isLedgerError(err)) {
    res.status(STATUS_BY_KIND[err.kind]).json({ error: err.message, code: err.code, kind: err.kind });
    return;
  }
  log.error({ err: err instanceof Error ? err.message : String(err) }, "Request failed");
  res.status(500).json({ error: "Internal server error" });
}

function notFound(code: LedgerErrorCode, message: string): never {
  throw new LedgerError(code, message);
}

type Handler = (req: Request, res: Response) => Promise<void>;

function handle(fn: Handler): (req: Request, res: Response) => void {
  return (req, res) => {
    fn(req, res).catch((err: unknown) => sendError(res, err));
  };
}

export interface RouteOptions {
  /** Reported by the health check */
  storeKind: string;
}

export function bindRoutes(app: Express, oracle: OracleService, opts: RouteOptions) {
  const ledger: Ledger = oracle.ledger;

  // Health check
  app.get("/api/health", handle(async (_req, res) => {
    const registry = await ledger.getRegistry();
    res.json({ status: "ok", store: opts.storeKind, registry: serialize(registry) });
  }));

  // ---- matches ----

  app.get("/api/matches", handle(async (req, res) => {
    const matches = await ledger.listScheduledMatches({
      state: parseMatchState(req.query.state),
      limit: queryInt(req.query.limit, 50),
      offset: queryInt(req.query.offset, 0, Number.MAX_SAFE_INTEGER),
    });
    res.json({ matches: serialize(matches) });
  }));

  app.get("/api/matches/lookup/:matchId", handle(async (req, res) => {
    const { matchId } = req.params;
    const match =
      (await ledger.findScheduledMatch(matchId)) ??
      notFound(LedgerErrorCode.MATCH_NOT_FOUND, `No match registered under ${matchId}`);
    const result = await ledger.findMatchResult(matchId);
    res.json({ match: serialize(match), result: result ? serialize(result) : null });
  }));

  app.get("/api/matches/:id", handle(async (req, res) => {
    const match =
      (await ledger.getScheduledMatch(req.params.id)) ??
      notFound(LedgerErrorCode.MATCH_NOT_FOUND, `Scheduled match ${req.params.id} not found`);
    res.json({ match: serialize(match) });
  }));

  app.post("/api/matches", handle(async (req, res) => {
    const auth = requireAuth(req, res);
    if (!auth) return;
    const body: unknown = req.body;
    const opponent = requireString(body, "opponent");
    if (!isEvmAddress(opponent)) {
      throw new LedgerError(LedgerErrorCode.INVALID_INPUT, "opponent must be a valid EVM address");
    }
    const scheduledTime = field(body, "scheduledTime");
    if (typeof scheduledTime !== "number") {
      throw new LedgerError(LedgerErrorCode.INVALID_INPUT, "scheduledTime must be epoch milliseconds");
    }
    const match = await ledger.schedule(auth.address, {
      matchId: requireString(body, "matchId"),
      gameId: requireString(body, "gameId"),
      opponent,
      scheduledTime,
    });
    log.info({ id: match.id, matchId: match.matchId }, "Match scheduled");
    res.status(201).json({ match: serialize(match) });
  }));

  app.post("/api/matches/:id/lock", handle(async (req, res) => {
    const auth = requireAuth(req, res);
    if (!auth) return;
    const match = await ledger.lock(auth.address, req.params.id);
    res.json({ match: serialize(match) });
  }));

  app.post("/api/matches/:id/result", handle(async (req, res) => {
    const auth = requireAuth(req, res);
    if (!auth) return;
    const { result, blobId } = await oracle.submitProof(auth.address, req.params.id, field(req.body, "proof"));
    log.info({ resultId: result.id, matchId: result.matchId }, "Result submitted");
    res.status(201).json({ result: serialize(result), blobId });
  }));

  app.post("/api/matches/:id/verify", handle(async (req, res) => {
    const auth = requireAuth(req, res);
    if (!auth) return;
    const result = await ledger.verify(auth.address, req.params.id, requireString(req.body, "resultId"));
    log.info({ resultId: result.id, verifier: result.verifier }, "Result verified");
    res.json({ result: serialize(result) });
  }));

  // ---- results & queries ----

  app.get("/api/results", handle(async (req, res) => {
    const results = await ledger.listMatchResults({
      submitter: queryString(req.query.submitter),
      verified: queryBool(req.query.verified),
      limit: queryInt(req.query.limit, 50),
      offset: queryInt(req.query.offset, 0, Number.MAX_SAFE_INTEGER),
    });
    res.json({ results: serialize(results) });
  }));

  app.get("/api/results/:id", handle(async (req, res) => {
    const result =
      (await ledger.getMatchResult(req.params.id)) ??
      notFound(LedgerErrorCode.RESULT_NOT_FOUND, `Result ${req.params.id} not found`);
    res.json({ result: serialize(result) });
  }));

  app.get("/api/results/:id/proof", handle(async (req, res) => {
    res.json(await oracle.getProof(req.params.id));
  }));

  app.post("/api/results/:id/query", handle(async (req, res) => {
    const auth = requireAuth(req, res);
    if (!auth) return;
    const queryKind = field(req.body, "queryKind") ?? "outcome";
    if (!isQueryKind(queryKind)) {
      throw new LedgerError(LedgerErrorCode.INVALID_INPUT, "queryKind must be outcome, stats or full");
    }
    const receipt = await oracle.queryPaid(
      auth.address,
      req.params.id,
      requireAmount(req.body, "payment"),
      queryKind
    );
    res.json(serialize(receipt));
  }));

  app.post("/api/results/:id/query/subscribed", handle(async (req, res) => {
    const auth = requireAuth(req, res);
    if (!auth) return;
    const queryKind = field(req.body, "queryKind") ?? "outcome";
    if (!isQueryKind(queryKind)) {
      throw new LedgerError(LedgerErrorCode.INVALID_INPUT, "queryKind must be outcome, stats or full");
    }
    const receipt = await ledger.querySubscribed(
      auth.address,
      req.params.id,
      requireString(req.body, "subscriptionId"),
      queryKind
    );
    res.json(serialize(receipt));
  }));

  // ---- subscriptions & accounts ----

  app.post("/api/subscriptions", handle(async (req, res) => {
    const auth = requireAuth(req, res);
    if (!auth) return;
    const subscription = await oracle.createSubscription(
      auth.address,
      requireString(req.body, "tier"),
      requireAmount(req.body, "payment")
    );
    log.info({ id: subscription.id, tier: subscription.tier }, "Subscription created");
    res.status(201).json({ subscription: serialize(subscription) });
  }));

  app.get("/api/subscriptions/:id", handle(async (req, res) => {
    const subscription =
      (await ledger.getSubscription(req.params.id)) ??
      notFound(LedgerErrorCode.SUBSCRIPTION_NOT_FOUND, `Subscription ${req.params.id} not found`);
    res.json({ subscription: serialize(subscription) });
  }));

  app.get("/api/accounts/:address/balance", handle(async (req, res) => {
    const { address } = req.params;
    const balance = await ledger.getBalance(address);
    res.json({ address: address.toLowerCase(), balance: balance.toString() });
  }));

  app.get("/api/accounts/:address/subscriptions", handle(async (req, res) => {
    const subscriptions = await ledger.listSubscriptions(req.params.address);
    res.json({ subscriptions: serialize(subscriptions) });
  }));

  // ---- analytics ----

  app.get("/api/analytics/protocol", handle(async (_req, res) => {
    res.json({ analytics: serialize(await ledger.getProtocolAnalytics()) });
  }));

  app.get("/api/analytics/providers", handle(async (req, res) => {
    const providers = await ledger.listTopProviders(queryInt(req.query.limit, 10, 100));
    res.json({ providers: serialize(providers) });
  }));

  app.get("/api/analytics/providers/:address", handle(async (req, res) => {
    res.json({ analytics: serialize(await ledger.getProviderAnalytics(req.params.address)) });
  }));

  app.get("/api/analytics/providers/:address/earnings", handle(async (req, res) => {
    res.json({ earnings: serialize(await ledger.getProviderEarnings(req.params.address)) });
  }));

  app.get("/api/analytics/providers/:address/performance", handle(async (req, res) => {
    res.json({ performance: await ledger.getProviderPerformance(req.params.address) });
  }));

  app.get("/api/analytics/providers/:address/top-matches", handle(async (req, res) => {
    const matches = await ledger.getTopEarningMatches(req.params.address, queryInt(req.query.limit, 3, 50));
    res.json({ matches: serialize(matches) });
  }));

  // Daily provider revenue, across providers unless ?provider= is given
  app.get("/api/analytics/revenue", handle(async (req, res) => {
    const revenue = await ledger.getRevenueOverTime(
      queryInt(req.query.days, 30, MAX_REVENUE_DAYS),
      queryString(req.query.provider)
    );
    res.json({ revenue: serialize(revenue) });
  }));

  app.get("/api/analytics/consumers/:address", handle(async (req, res) => {
    res.json({ analytics: serialize(await ledger.getConsumerAnalytics(req.params.address)) });
  }));
}
