// backend/services/signup/src/index.ts
/**
 * Entrypoint: bootstrap env → init logger → connect DB → build service →
 * listen. SIGINT/SIGTERM close the server, then the DB connection.
 */

import { loadedEnvFiles } from "./bootstrap";
import type { Server } from "node:http";
import { initLogger, logger } from "@acct/shared";
import { createSignupApp, SERVICE_NAME } from "./app";
import { loadConfig } from "./config";
import { connectDb, disconnectDb, mongoReadiness } from "./db";
import { MongoUserRepo } from "./repo/userRepo";
import { BcryptHasher } from "./services/passwordHasher";
import { RegistrationService } from "./services/registrationService";

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function main(): Promise<void> {
  initLogger(SERVICE_NAME);
  const config = loadConfig();
  logger.info({ envFiles: loadedEnvFiles }, "[entrypoint] env loaded");

  await connectDb(config.mongoUri);

  const users = new RegistrationService({
    repo: new MongoUserRepo(),
    hasher: new BcryptHasher(),
  });
  const app = createSignupApp({ users, readiness: mongoReadiness });

  const server = app.listen(config.port, config.host, () => {
    logger.info(
      { host: config.host, port: config.port },
      "[entrypoint] http_listening"
    );
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "[entrypoint] shutting down");
    closeServer(server)
      .then(() => disconnectDb())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "[entrypoint] shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "[entrypoint] unhandled_bootstrap_error");
  process.exit(1);
});
