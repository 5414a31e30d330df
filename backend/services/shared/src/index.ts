// backend/services/shared/src/index.ts
// Services import most helpers by path (@acct/shared/src/...); the entrypoint
// only needs the process logger from here.
export { logger, initLogger } from "./utils/logger";
