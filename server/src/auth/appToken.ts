import crypto from "node:crypto";
import type { Request } from "express";
import { UnauthorizedError } from "../errors.js";

function timingSafeEqual(a: string, b: string): boolean {
  const ba = Buffer.from(a);
  const bb = Buffer.from(b);
  if (ba.length !== bb.length) return false;
  return crypto.timingSafeEqual(ba, bb);
}

export function requireAppToken(req: Request, expected?: string) {
  if (!expected) return;
  const token = req.header("x-app-token") || undefined;
  if (!token || !timingSafeEqual(token, expected)) {
    throw new UnauthorizedError();
  }
}
