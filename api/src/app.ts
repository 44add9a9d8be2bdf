/**
 * app.ts — Express surface of the custody service (exported for testing).
 *
 * Server startup, the janitor timer and signal handling live in index.ts so
 * tests can build an app without binding a port.
 */

import { timingSafeEqual } from "node:crypto";
import express, { type NextFunction, type Request, type Response } from "express";
import { errors } from "jose";
import { z } from "zod";
import {
  KeyLengthError,
  MalformedResponseError,
  NotImplementedError,
  WeakKeyError
} from "../../secure-messaging/src/index.js";
import { callerOf, requireAuth } from "./auth.js";
import type { ServiceConfig } from "./config.js";
import { ApiError } from "./errors.js";
import { createServices, type CustodyServices } from "./services.js";
import { getToken, registerToken } from "./tokens.js";
import type { Token, TransferSession } from "./types.js";
import {
  beginAuthSchema,
  commitTransferSchema,
  confirmKeyChangeSchema,
  continueAuthSchema,
  decodeBytes,
  encodeBytes,
  finalizeTransferSchema,
  initiateTransferSchema,
  openSessionSchema,
  readFileSchema,
  registerTokenSchema,
  rollbackTransferSchema,
  sessionOnlySchema,
  stageTransferSchema,
  validateCardKeySchema,
  writeTransferDataSchema
} from "./validation.js";

export interface AppOptions {
  config: ServiceConfig;
  services?: CustodyServices;
}

const apdusOut = (apdus: readonly Uint8Array[]): string[] => apdus.map(encodeBytes);

const tokenView = (token: Token) => ({
  id: token.id,
  current_owner: token.current_owner,
  previous_owners: token.previous_owners,
  counter: token.counter,
  key_version: token.key_version,
  status: token.status,
  tag_uid: token.tag_uid,
  created_at: token.created_at,
  last_transfer_at: token.last_transfer_at
});

const sessionView = (session: TransferSession) => ({
  id: session.id,
  token_id: session.token_id,
  from_uid: session.from_uid,
  to_uid: session.to_uid,
  status: session.status,
  challenge: session.challenge,
  validated: session.validated,
  staged_transfer_id: session.staged_transfer_id,
  expires_at: session.expires_at
});

const keysMatch = (given: string, expected: string): boolean => {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};

export function createApp(options: AppOptions): express.Application {
  const { config } = options;
  const services = options.services ?? createServices(config);
  const { auth, card, legacy, twoPhase, janitor, gate, store, clock } = services;

  const app = express();
  app.use(express.json({ limit: "32kb" }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "desfire-custody" });
  });

  // ── Admin ──────────────────────────────────────────────────────────────────

  app.post("/v1/admin/sweep", async (req, res, next) => {
    try {
      const key = req.header("x-admin-api-key");
      if (!key || !keysMatch(key, config.adminApiKey)) {
        res.status(401).json({ error: "Invalid admin API key", code: "unauthenticated" });
        return;
      }
      const report = await janitor.runOnce();
      res.json({ report });
    } catch (e) { next(e); }
  });

  // ── Caller identity and admission ──────────────────────────────────────────

  app.use("/v1", requireAuth(config.sessionSigningSecret));
  app.use("/v1", async (_req, res, next) => {
    try {
      if (!(await gate.allow(callerOf(res)))) {
        res.status(429).json({ error: "Too many requests", code: "rate-limited" });
        return;
      }
      next();
    } catch (e) { next(e); }
  });

  // ── Authentication ─────────────────────────────────────────────────────────

  app.post("/v1/auth/begin", async (req, res, next) => {
    try {
      const body = beginAuthSchema.parse(req.body);
      const result = await auth.begin({
        tokenId: body.token_id,
        userId: callerOf(res),
        allowUnowned: body.allow_unowned,
        keyNo: body.key_no
      });
      res.status(201).json({ session_id: result.sessionId, apdus: apdusOut(result.apdus) });
    } catch (e) { next(e); }
  });

  app.post("/v1/auth/continue", async (req, res, next) => {
    try {
      const body = continueAuthSchema.parse(req.body);
      const result = await auth.continue(body.session_id, callerOf(res), decodeBytes(body.card_response));
      res.json({ session_id: result.sessionId, phase: result.phase, apdus: apdusOut(result.apdus) });
    } catch (e) { next(e); }
  });

  // ── Card commands ──────────────────────────────────────────────────────────

  app.post("/v1/card/provision", async (req, res, next) => {
    try {
      const body = sessionOnlySchema.parse(req.body);
      const result = await card.provisionCard(body.session_id, callerOf(res));
      res.json({ apdus: apdusOut(result.apdus), steps: result.steps });
    } catch (e) { next(e); }
  });

  app.post("/v1/card/change-key", async (req, res, next) => {
    try {
      const body = sessionOnlySchema.parse(req.body);
      const result = await card.changeKey(body.session_id, callerOf(res));
      res.json({ apdus: apdusOut(result.apdus), key_version: result.keyVersion, key_hash: result.keyHash });
    } catch (e) { next(e); }
  });

  app.post("/v1/card/change-key/confirm", async (req, res, next) => {
    try {
      const body = confirmKeyChangeSchema.parse(req.body);
      const result = await card.confirmKeyChange(body.session_id, callerOf(res), decodeBytes(body.card_response));
      res.json({ key_version: result.keyVersion });
    } catch (e) { next(e); }
  });

  app.post("/v1/card/write-transfer-data", async (req, res, next) => {
    try {
      const body = writeTransferDataSchema.parse(req.body);
      const result = await card.writeTransferData(
        body.session_id,
        callerOf(res),
        body.transfer_session_id,
        body.mode
      );
      res.json({ apdus: apdusOut(result.apdus), key_hash: result.keyHash });
    } catch (e) { next(e); }
  });

  app.post("/v1/card/read", async (req, res, next) => {
    try {
      const body = readFileSchema.parse(req.body);
      const result = await card.readFileData(body.session_id, callerOf(res), body.file_no, body.length, body.offset);
      res.json({ apdus: apdusOut(result.apdus) });
    } catch (e) { next(e); }
  });

  // ── Tokens ─────────────────────────────────────────────────────────────────

  app.post("/v1/tokens", async (req, res, next) => {
    try {
      const body = registerTokenSchema.parse(req.body);
      const token = await registerToken(
        { store, clock },
        {
          tokenId: body.token_id,
          caller: callerOf(res),
          keyHash: body.key_hash.toLowerCase(),
          tagUid: body.tag_uid,
          forceOverwrite: body.force_overwrite
        }
      );
      res.status(201).json({ token: tokenView(token) });
    } catch (e) { next(e); }
  });

  app.get("/v1/tokens/:id", async (req, res, next) => {
    try {
      const token = await getToken(store, req.params.id);
      res.json({ token: tokenView(token) });
    } catch (e) { next(e); }
  });

  // ── Legacy two-step transfers ──────────────────────────────────────────────

  app.post("/v1/transfers/initiate", async (req, res, next) => {
    try {
      const body = initiateTransferSchema.parse(req.body);
      const pending = await legacy.initiate(body.token_id, callerOf(res), body.to_uid);
      res.status(201).json({ pending });
    } catch (e) { next(e); }
  });

  app.post("/v1/transfers/finalize", async (req, res, next) => {
    try {
      const body = finalizeTransferSchema.parse(req.body);
      const result = await legacy.finalize(body.token_id, callerOf(res), body.tag_uid);
      res.json({ token: tokenView(result.token), reconciled: result.reconciled });
    } catch (e) { next(e); }
  });

  // ── Two-phase transfers ────────────────────────────────────────────────────

  app.post("/v1/transfers/sessions", async (req, res, next) => {
    try {
      const body = openSessionSchema.parse(req.body);
      const session = await twoPhase.openSession(body.token_id, callerOf(res), body.to_uid);
      res.status(201).json({ session: sessionView(session) });
    } catch (e) { next(e); }
  });

  app.post("/v1/transfers/sessions/:id/validate", async (req, res, next) => {
    try {
      const body = validateCardKeySchema.parse(req.body);
      const session = await twoPhase.validateCardKey(
        body.auth_session_id,
        req.params.id,
        callerOf(res),
        decodeBytes(body.card_response)
      );
      res.json({ session: sessionView(session) });
    } catch (e) { next(e); }
  });

  app.post("/v1/transfers/stage", async (req, res, next) => {
    try {
      const body = stageTransferSchema.parse(req.body);
      const staged = await twoPhase.stage(body.session_id, callerOf(res), body.new_key_hash.toLowerCase(), body.to_uid);
      res.status(201).json({ staged });
    } catch (e) { next(e); }
  });

  app.post("/v1/transfers/commit", async (req, res, next) => {
    try {
      const body = commitTransferSchema.parse(req.body);
      const token = await twoPhase.commit(body.staged_id, callerOf(res));
      res.json({ token: tokenView(token) });
    } catch (e) { next(e); }
  });

  app.post("/v1/transfers/rollback", async (req, res, next) => {
    try {
      const body = rollbackTransferSchema.parse(req.body);
      const staged = await twoPhase.rollback(body.staged_id, callerOf(res), body.reason);
      res.json({ staged });
    } catch (e) { next(e); }
  });

  // ── Error mapping ──────────────────────────────────────────────────────────

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof z.ZodError) {
      res.status(400).json({ error: "Validation error", code: "invalid-argument", details: error.flatten() });
      return;
    }
    if (isBodyTooLarge(error)) {
      res.status(413).json({ error: "Request body too large", code: "invalid-argument" });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", code: "invalid-argument" });
      return;
    }
    if (error instanceof errors.JOSEError) {
      res.status(401).json({ error: "Invalid or expired bearer token", code: "unauthenticated" });
      return;
    }
    if (error instanceof ApiError) {
      if (error.status >= 500) console.error("[api] internal error:", error);
      res.status(error.status).json({ error: error.message, code: error.code });
      return;
    }
    if (error instanceof WeakKeyError) {
      res.status(409).json({ error: error.message, code: "weak-key", hint: error.hint });
      return;
    }
    if (error instanceof KeyLengthError) {
      res.status(400).json({ error: error.message, code: "invalid-argument" });
      return;
    }
    if (error instanceof MalformedResponseError) {
      res.status(400).json({ error: error.message, code: "protocol" });
      return;
    }
    if (error instanceof NotImplementedError) {
      res.status(501).json({ error: error.message, code: "not-implemented" });
      return;
    }
    console.error("[api] unhandled error:", error);
    res.status(500).json({ error: "Internal server error", code: "internal" });
  });

  return app;
}

// body-parser tags its errors with a string `type`.
function isBodyTooLarge(error: unknown): boolean {
  return error instanceof Error && "type" in error && error.type === "entity.too.large";
}
