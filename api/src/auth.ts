import type { NextFunction, Request, Response } from "express";
import { SignJWT, jwtVerify } from "jose";
import { PermissionError } from "./errors.js";

const encoder = new TextEncoder();

export interface CallerClaims {
  sub: string;
}

export const signSessionToken = async (
  userId: string,
  secret: string,
  ttlSeconds: number
): Promise<string> => {
  return new SignJWT({})
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(userId)
    .setIssuedAt()
    .setExpirationTime(`${ttlSeconds}s`)
    .sign(encoder.encode(secret));
};

export const verifySessionToken = async (token: string, secret: string): Promise<CallerClaims> => {
  const { payload } = await jwtVerify(token, encoder.encode(secret), {
    algorithms: ["HS256"]
  });
  if (typeof payload.sub !== "string" || payload.sub.length === 0) {
    throw new PermissionError("Session token has no subject");
  }
  return { sub: payload.sub };
};

/** Resolves the bearer token to the caller id stored in res.locals.userId. */
export const requireAuth =
  (secret: string) =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const header = req.headers.authorization;
      if (!header?.startsWith("Bearer ")) {
        res.status(401).json({ error: "Missing bearer token", code: "unauthenticated" });
        return;
      }
      const claims = await verifySessionToken(header.slice("Bearer ".length), secret);
      res.locals.userId = claims.sub;
      next();
    } catch (err) {
      next(err);
    }
  };

export const callerOf = (res: Response): string => {
  const userId: unknown = res.locals.userId;
  if (typeof userId !== "string") throw new PermissionError("Caller is not authenticated");
  return userId;
};
