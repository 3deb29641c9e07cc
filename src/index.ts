import * as dotenv from "dotenv";
import { Config } from "./Config";
import { SolenoidService } from "./SolenoidService";
import { WebServer } from "./WebServer";
import { toError } from "./errors";
import { logger, errorLogger } from "./utils/logger";

dotenv.config();

const config = new Config();
const service = new SolenoidService(config);
const webServer = new WebServer(service, config.webPort);

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  logger.warn(`\n[Solenoid] Received ${signal}`);
  webServer.stop();
  await service.shutdown();
}

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("uncaughtException", (error: Error) => {
  errorLogger.error("[Solenoid] Uncaught exception:", error);
  void shutdown("uncaughtException");
});

process.on("unhandledRejection", (reason: unknown) => {
  errorLogger.error("[Solenoid] Unhandled rejection:", toError(reason).message);
});

service
  .initialize()
  .then(() => webServer.start())
  .catch((error: unknown) => {
    errorLogger.error("[Solenoid] Failed to start:", toError(error).message);
    process.exit(1);
  });
