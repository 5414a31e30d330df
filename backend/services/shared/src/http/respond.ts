// backend/services/shared/src/http/respond.ts
import type { Response } from "express";

// res.json() stamps "application/json; charset=utf-8"
export function writeJSON(res: Response, status: number, data: unknown): void {
  res.status(status).json(data);
}

export function writeError(res: Response, status: number, msg: string): void {
  writeJSON(res, status, { error: msg });
}
