import { MatchProof, QueryKind, buildAuthMessage } from "@matchproof/core";
import {
  ApiConsumerAnalytics,
  ApiMatchResult,
  ApiProtocolAnalytics,
  ApiProviderAnalytics,
  ApiProviderEarnings,
  ApiProviderPerformance,
  ApiRevenuePoint,
  ApiScheduledMatch,
  ApiSubscription,
  ApiTopEarningMatch,
  ClientConfig,
  HealthResponse,
  PaidQueryResponse,
  ScheduleRequest,
  SubmitResultResponse,
  SubscribedQueryResponse,
} from "./types";

/** A non-2xx response from the oracle API. */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string,
    readonly kind?: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function readString(body: unknown, key: string): string | undefined {
  if (typeof body !== "object" || body === null) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
}

function query(params: Record<string, string | number | boolean | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, String(value));
  }
  const qs = search.toString();
  return qs ? `?${qs}` : "";
}

export class HttpClient {
  private readonly baseUrl: string;
  private readonly address: string;
  private readonly signMessage: (message: string) => Promise<string>;
  private readonly fetchFn: typeof fetch;

  constructor(config: ClientConfig) {
    this.baseUrl = config.serverUrl.replace(/\/$/, "");
    this.address = config.address;
    this.signMessage = config.signMessage;
    this.fetchFn = config.fetch ?? fetch;
  }

  /**
   * Build the authentication payload (address, signature, timestamp) for
   * any endpoint that acts on the caller's behalf.
   */
  private async buildAuthPayload() {
    const timestamp = Date.now();
    const message = buildAuthMessage(this.address, timestamp);
    const signature = await this.signMessage(message);
    return { address: this.address, signature, timestamp };
  }

  async health(): Promise<HealthResponse> {
    return this.request<HealthResponse>("/api/health");
  }

  // ---- matches ----

  async listMatches(opts: { state?: string; limit?: number; offset?: number } = {}): Promise<ApiScheduledMatch[]> {
    const res = await this.request<{ matches: ApiScheduledMatch[] }>(`/api/matches${query(opts)}`);
    return res.matches;
  }

  async getMatch(id: string): Promise<ApiScheduledMatch> {
    const res = await this.request<{ match: ApiScheduledMatch }>(`/api/matches/${encodeURIComponent(id)}`);
    return res.match;
  }

  /** Find a match and its result (if any) by the external matchId. */
  async lookupMatch(
    matchId: string
  ): Promise<{ match: ApiScheduledMatch; result: ApiMatchResult | null }> {
    return this.request<{ match: ApiScheduledMatch; result: ApiMatchResult | null }>(`/api/matches/lookup/${encodeURIComponent(matchId)}`);
  }

  async scheduleMatch(params: ScheduleRequest): Promise<ApiScheduledMatch> {
    const res = await this.post<{ match: ApiScheduledMatch }>("/api/matches", params);
    return res.match;
  }

  async lockMatch(id: string): Promise<ApiScheduledMatch> {
    const res = await this.post<{ match: ApiScheduledMatch }>(
      `/api/matches/${encodeURIComponent(id)}/lock`,
      {}
    );
    return res.match;
  }

  async submitResult(id: string, proof: MatchProof): Promise<SubmitResultResponse> {
    return this.post<SubmitResultResponse>(`/api/matches/${encodeURIComponent(id)}/result`, { proof });
  }

  async verifyResult(id: string, resultId: string): Promise<ApiMatchResult> {
    const res = await this.post<{ result: ApiMatchResult }>(
      `/api/matches/${encodeURIComponent(id)}/verify`,
      { resultId }
    );
    return res.result;
  }

  // ---- results & queries ----

  async listResults(
    opts: { submitter?: string; verified?: boolean; limit?: number; offset?: number } = {}
  ): Promise<ApiMatchResult[]> {
    const res = await this.request<{ results: ApiMatchResult[] }>(`/api/results${query(opts)}`);
    return res.results;
  }

  async getResult(id: string): Promise<ApiMatchResult> {
    const res = await this.request<{ result: ApiMatchResult }>(`/api/results/${encodeURIComponent(id)}`);
    return res.result;
  }

  /** The proof document stored for a result. */
  async getProof(resultId: string): Promise<unknown> {
    return this.request<unknown>(`/api/results/${encodeURIComponent(resultId)}/proof`);
  }

  /** Pay `payment` base units for one query. */
  async queryPaid(resultId: string, payment: bigint, queryKind: QueryKind): Promise<PaidQueryResponse> {
    return this.post<PaidQueryResponse>(`/api/results/${encodeURIComponent(resultId)}/query`, {
      payment: payment.toString(),
      queryKind,
    });
  }

  async querySubscribed(
    resultId: string,
    subscriptionId: string,
    queryKind: QueryKind
  ): Promise<SubscribedQueryResponse> {
    return this.post<SubscribedQueryResponse>(`/api/results/${encodeURIComponent(resultId)}/query/subscribed`, {
      subscriptionId,
      queryKind,
    });
  }

  // ---- subscriptions & accounts ----

  async createSubscription(tier: string, payment: bigint): Promise<ApiSubscription> {
    const res = await this.post<{ subscription: ApiSubscription }>("/api/subscriptions", {
      tier,
      payment: payment.toString(),
    });
    return res.subscription;
  }

  async getSubscription(id: string): Promise<ApiSubscription> {
    const res = await this.request<{ subscription: ApiSubscription }>(
      `/api/subscriptions/${encodeURIComponent(id)}`
    );
    return res.subscription;
  }

  async getBalance(address: string = this.address): Promise<bigint> {
    const res = await this.request<{ balance: string }>(
      `/api/accounts/${encodeURIComponent(address)}/balance`
    );
    return BigInt(res.balance);
  }

  // ---- analytics ----

  async getProviderAnalytics(address: string = this.address): Promise<ApiProviderAnalytics> {
    const res = await this.request<{ analytics: ApiProviderAnalytics }>(
      `/api/analytics/providers/${encodeURIComponent(address)}`
    );
    return res.analytics;
  }

  async getConsumerAnalytics(address: string = this.address): Promise<ApiConsumerAnalytics> {
    const res = await this.request<{ analytics: ApiConsumerAnalytics }>(
      `/api/analytics/consumers/${encodeURIComponent(address)}`
    );
    return res.analytics;
  }

  async getProtocolAnalytics(): Promise<ApiProtocolAnalytics> {
    const res = await this.request<{ analytics: ApiProtocolAnalytics }>("/api/analytics/protocol");
    return res.analytics;
  }

  async getTopProviders(limit?: number): Promise<ApiProviderAnalytics[]> {
    const res = await this.request<{ providers: ApiProviderAnalytics[] }>(
      `/api/analytics/providers${query({ limit })}`
    );
    return res.providers;
  }

  async getProviderEarnings(address: string = this.address): Promise<ApiProviderEarnings> {
    const res = await this.request<{ earnings: ApiProviderEarnings }>(
      `/api/analytics/providers/${encodeURIComponent(address)}/earnings`
    );
    return res.earnings;
  }

  async getProviderPerformance(address: string = this.address): Promise<ApiProviderPerformance> {
    const res = await this.request<{ performance: ApiProviderPerformance }>(
      `/api/analytics/providers/${encodeURIComponent(address)}/performance`
    );
    return res.performance;
  }

  async getTopEarningMatches(address: string = this.address, limit?: number): Promise<ApiTopEarningMatch[]> {
    const res = await this.request<{ matches: ApiTopEarningMatch[] }>(
      `/api/analytics/providers/${encodeURIComponent(address)}/top-matches${query({ limit })}`
    );
    return res.matches;
  }

  /** Daily provider revenue; across all providers unless one is given. */
  async getRevenueOverTime(options: { days?: number; provider?: string } = {}): Promise<ApiRevenuePoint[]> {
    const res = await this.request<{ revenue: ApiRevenuePoint[] }>(
      `/api/analytics/revenue${query(options)}`
    );
    return res.revenue;
  }

  // ---- transport ----

  private async post<T>(path: string, body: object): Promise<T> {
    const auth = await this.buildAuthPayload();
    return this.request<T>(path, {
      method: "POST",
      body: JSON.stringify({ ...auth, ...body }),
    });
  }

  private async request<T>(path: string, opts?: RequestInit): Promise<T> {
    const res = await this.fetchFn(`${this.baseUrl}${path}`, {
      ...opts,
      headers: { "Content-Type": "application/json", ...opts?.headers },
    });
    if (!res.ok) {
      const body: unknown = await res.json().catch(() => ({}));
      throw new ApiError(
        readString(body, "error") ?? `HTTP ${res.status}`,
        res.status,
        readString(body, "code"),
        readString(body, "kind")
      );
    }
    // Responses are trusted to match the declared API types.
    return (await res.json()) as T;
  }
}
