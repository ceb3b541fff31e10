import { randomUUID } from "crypto";
import { MatchData, NO_WINNER } from "@matchproof/core";
import { ApiError, HttpClient } from "./http";
import { ProofBuilder } from "./proof";
import { ClientConfig, MatchRunner, PlayOptions, PlayedMatch } from "./types";

const DEFAULT_START_DELAY_MS = 1000;
const LOCK_RETRY_MS = 250;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Plays matches against the oracle: schedules before the start, locks at
 * the start, runs the game and submits a signed proof of the result.
 */
export class GamePlayer {
  private readonly http: HttpClient;
  private readonly proofs: ProofBuilder;
  private readonly address: string;
  private readonly history: PlayedMatch[] = [];
  private aborted = false;

  constructor(config: ClientConfig, http: HttpClient = new HttpClient(config)) {
    this.http = http;
    this.address = config.address;
    this.proofs = new ProofBuilder(config.address, config.signMessage);
  }

  get client(): HttpClient {
    return this.http;
  }

  async play(runner: MatchRunner, opts: PlayOptions): Promise<PlayedMatch> {
    const log = opts.onLog || (() => {});
    const matchId = opts.matchId ?? randomUUID();
    const scheduledTime = Date.now() + (opts.startsInMs ?? DEFAULT_START_DELAY_MS);

    // 1. Commit to the match before it starts
    log("schedule", `Scheduling ${matchId} (${opts.gameId}) against ${opts.opponent}`);
    const scheduled = await this.http.scheduleMatch({
      matchId,
      gameId: opts.gameId,
      opponent: opts.opponent,
      scheduledTime,
    });

    // 2. Wait for the start time, then lock
    await sleep(Math.max(0, scheduledTime - Date.now()));
    const locked = await this.lockWhenStartable(scheduled.id, log);

    // 3. Play
    log("match", "Match locked, playing");
    const outcome = await Promise.resolve(runner.play(locked));

    // 4. Prove and submit
    const matchData: MatchData = {
      gameId: locked.gameId,
      matchId: locked.matchId,
      playerA: locked.playerA,
      playerB: locked.playerB,
      winner: outcome.winner,
      statsA: outcome.statsA,
      statsB: outcome.statsB,
      playedAt: Date.now(),
      details: outcome.details,
    };
    const proof = await this.proofs.build(matchData);
    if (!ProofBuilder.verify(proof)) {
      throw new Error("Generated proof failed local verification");
    }

    const { result, blobId } = await this.http.submitResult(locked.id, proof);
    log("submit", `Result ${result.id} stored as blob ${blobId}`);

    const played: PlayedMatch = { match: locked, result, matchData, blobId };
    this.history.push(played);
    return played;
  }

  getHistory(): PlayedMatch[] {
    return [...this.history];
  }

  /** Win/loss/draw tally over matches played by this instance. */
  getStats() {
    const wins = this.history.filter((m) => m.result.winner === this.address.toLowerCase()).length;
    const draws = this.history.filter((m) => m.result.winner === NO_WINNER).length;
    const total = this.history.length;
    return {
      totalMatches: total,
      wins,
      losses: total - wins - draws,
      draws,
      winRate: total > 0 ? Math.floor((wins * 100) / total) : 0,
    };
  }

  /** Stop retrying a pending lock. */
  close(): void {
    this.aborted = true;
  }

  private async lockWhenStartable(id: string, log: (tag: string, message: string) => void) {
    for (;;) {
      try {
        return await this.http.lockMatch(id);
      } catch (err) {
        // Clocks between client and server can disagree by a little.
        const tooEarly = err instanceof ApiError && err.code === "NOT_YET_STARTABLE";
        if (!tooEarly || this.aborted) throw err;
        log("lock", "Match not startable yet, retrying");
        await sleep(LOCK_RETRY_MS);
      }
    }
  }
}
