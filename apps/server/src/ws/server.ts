import http from "http";
import { parse as parseUrl } from "url";
import express from "express";
import { WebSocketServer, WebSocket } from "ws";
import { OracleService } from "../services/OracleService";
import { EventFeed, parseEventFilter } from "./feed";
import { bindRoutes } from "../routes/index";
import log from "../logger";

const HEARTBEAT_INTERVAL_MS = 30_000;
const PONG_TIMEOUT_MS = 10_000;

export interface HttpWsServerOptions {
  storeKind: string;
  /** Encoded recent events, newest first, sent to a subscriber on connect */
  recentEvents?: () => Promise<string[]>;
}

export function createHttpWsServer(
  oracle: OracleService,
  feed: EventFeed,
  opts: HttpWsServerOptions
): { app: express.Express; httpServer: http.Server; eventsWss: WebSocketServer } {
  const app = express();

  // CORS: allow cross-origin requests from any origin
  app.use((_req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
    if (_req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.use(express.json());

  // Bind REST routes
  bindRoutes(app, oracle, { storeKind: opts.storeKind });

  const httpServer = http.createServer(app);
  const eventsWss = new WebSocketServer({ noServer: true });

  // Handle HTTP upgrade for WebSocket
  httpServer.on("upgrade", (request, socket, head) => {
    const { pathname, query } = parseUrl(request.url || "", true);

    // /ws/events?types=query.paid,result.verified
    if (pathname === "/ws/events") {
      const types = parseEventFilter(typeof query.types === "string" ? query.types : null);
      eventsWss.handleUpgrade(request, socket, head, (ws) => {
        const sub = feed.add(ws, types);
        log.info({ types: types ? [...types] : "all", subscribers: feed.size() }, "Event feed connection");
        setupHeartbeat(ws);
        ws.on("close", () => feed.remove(sub));
        if (opts.recentEvents) {
          sendBackfill(ws, opts.recentEvents);
        }
      });
      return;
    }

    socket.destroy();
  });

  return { app, httpServer, eventsWss };
}

function sendBackfill(ws: WebSocket, recentEvents: () => Promise<string[]>): void {
  recentEvents()
    .then((encoded) => {
      for (const message of [...encoded].reverse()) {
        if (ws.readyState === WebSocket.OPEN) ws.send(message);
      }
    })
    .catch((err: Error) => log.error({ err: err.message }, "Failed to load recent events"));
}

function setupHeartbeat(ws: WebSocket): void {
  let alive = true;
  let pongTimer: ReturnType<typeof setTimeout> | null = null;

  const interval = setInterval(() => {
    if (!alive) {
      clearInterval(interval);
      ws.terminate();
      return;
    }
    alive = false;
    ws.ping();
    pongTimer = setTimeout(() => {
      if (!alive) {
        clearInterval(interval);
        ws.terminate();
      }
    }, PONG_TIMEOUT_MS);
  }, HEARTBEAT_INTERVAL_MS);

  ws.on("pong", () => {
    alive = true;
    if (pongTimer) {
      clearTimeout(pongTimer);
      pongTimer = null;
    }
  });

  ws.on("close", () => {
    clearInterval(interval);
    if (pongTimer) clearTimeout(pongTimer);
  });
}
