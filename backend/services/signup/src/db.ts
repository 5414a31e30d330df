// backend/services/signup/src/db.ts
/**
 * Why:
 * - Disable mongoose buffering so connection errors surface immediately.
 * - Log a redacted URI (no credentials).
 * - Wait until the connection is established before declaring ready.
 * - Sync indexes at boot so the unique username index exists before the
 *   first registration.
 */

import mongoose from "mongoose";
import { logger } from "@acct/shared/src/utils/logger";
import UserModel from "./models/user.model";

export function redactMongoUri(uri: string): string {
  try {
    const u = new URL(uri);
    if (u.password) u.password = "***";
    if (u.username) u.username = "***";
    return u.toString();
  } catch {
    return uri.replace(/\/\/([^@]+)@/, "//***:***@");
  }
}

let connected = false;

export async function connectDb(uri: string): Promise<void> {
  if (connected) return;

  mongoose.set("bufferCommands", false);
  mongoose.set("strictQuery", true);

  logger.info(
    { msg: "mongo:connect", uri: redactMongoUri(uri) },
    "[signup] connecting to Mongo"
  );

  await mongoose.connect(uri).catch((err: unknown) => {
    logger.error({ err }, "[signup] mongoose.connect failed");
    throw err;
  });

  if (mongoose.connection.readyState !== 1) {
    await mongoose.connection.asPromise();
  }

  await UserModel.syncIndexes();

  connected = true;
  logger.info("[signup] Mongo connected, indexes synced");
}

export async function disconnectDb(): Promise<void> {
  try {
    if (mongoose.connection.readyState !== 0) {
      await mongoose.disconnect();
    }
  } finally {
    connected = false;
  }
}

export function mongoReadiness(): { mongo: string } {
  const state = mongoose.connection.readyState;
  if (state !== 1) throw new Error(`mongo not connected (state=${state})`);
  return { mongo: "ok" };
}
