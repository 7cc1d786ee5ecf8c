import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { HttpOutcome } from "@deskmode/core";
import type { ModeReconciler } from "../reconcile/ModeReconciler.js";
import type { Logger } from "../utils/logger.js";
import { nullLogger } from "../utils/logger.js";

export type ControlRoute = "status" | "kiosk" | "show" | "restart";

export const ROUTES: Readonly<Record<string, ControlRoute>> = {
  "/": "status",
  "/debug": "status",
  "/mode": "status",
  "/kiosk": "kiosk",
  "/hide": "kiosk",
  "/show": "show",
  "/desktop": "show",
  "/restart": "restart",
  "/reset": "restart",
};

const RESPONSE_HEADERS = {
  "Content-Type": "application/json; charset=utf-8",
  "Cache-Control": "no-store, no-cache, must-revalidate, max-age=0",
  Pragma: "no-cache",
} as const;

export type ParsedRequest = {
  path: string;
  force: boolean;
};

export function parseRequestUrl(rawUrl: string): ParsedRequest {
  const url = new URL(rawUrl, "http://localhost");
  return {
    path: url.pathname,
    force: (url.searchParams.get("force") ?? "").trim() === "1",
  };
}

/** Maps a request onto the reconciler. Transport-free so it can be driven directly. */
export async function routeRequest(
  reconciler: ModeReconciler,
  method: string,
  rawUrl: string
): Promise<HttpOutcome<unknown>> {
  if (method !== "GET") {
    return { status: 405, body: { ok: false, error: "method_not_allowed", method } };
  }

  const { path, force } = parseRequestUrl(rawUrl);
  const route: ControlRoute | undefined = ROUTES[path];
  switch (route) {
    case "status":
      return { status: 200, body: { ...(await reconciler.status()), ok: true } };
    case "kiosk":
      return reconciler.ensureMode({ force, wantKiosk: true });
    case "show":
      return reconciler.ensureMode({ force, wantKiosk: false });
    case "restart":
      return reconciler.restartStack();
    case undefined:
      return { status: 404, body: { ok: false, error: "not_found", path } };
  }
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  const body = Buffer.from(JSON.stringify(payload, null, 2), "utf8");
  if (res.headersSent || res.destroyed) return;
  res.writeHead(status, { ...RESPONSE_HEADERS, "Content-Length": String(body.length) });
  res.end(body);
}

export type ControlServerOptions = {
  reconciler: ModeReconciler;
  logger?: Logger;
};

export function createControlServer(opts: ControlServerOptions): Server {
  const logger = opts.logger ?? nullLogger;

  const handle = async (req: IncomingMessage, res: ServerResponse) => {
    const method = req.method ?? "GET";
    const rawUrl = req.url ?? "/";
    let outcome: HttpOutcome<unknown>;
    try {
      outcome = await routeRequest(opts.reconciler, method, rawUrl);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`[http] ${method} ${rawUrl} failed: ${message}`);
      outcome = { status: 500, body: { ok: false, error: "exception", message } };
    }
    logger.info(`[http] ${method} ${rawUrl} -> ${outcome.status}`);
    sendJson(res, outcome.status, outcome.body);
  };

  return createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`[http] response failed: ${message}`);
    });
  });
}
