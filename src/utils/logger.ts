import log4js, { Appender } from "log4js";
import { join } from "path";
import { existsSync, mkdirSync } from "fs";

const level = process.env.LOG_LEVEL || "info";
const logToFile = process.env.LOG_TO_FILE !== "0";
const logsDir = process.env.LOG_DIR || join(process.cwd(), "logs");

const appenders: Record<string, Appender> = {
  console: {
    type: "console",
    layout: {
      type: "pattern",
      pattern: "%[%d{yyyy-MM-dd hh:mm:ss} %p%] %m",
    },
  },
};

if (logToFile) {
  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { recursive: true });
  }

  appenders.file = {
    type: "file",
    filename: join(logsDir, "solenoid.log"),
    maxLogSize: 10485760, // 10MB
    backups: 5,
    compress: true,
    layout: {
      type: "pattern",
      pattern: "%d{yyyy-MM-dd hh:mm:ss} [%p] %m",
    },
  };
  appenders.errorFile = {
    type: "file",
    filename: join(logsDir, "solenoid-error.log"),
    maxLogSize: 10485760, // 10MB
    backups: 5,
    compress: true,
    layout: {
      type: "pattern",
      pattern: "%d{yyyy-MM-dd hh:mm:ss} [%p] %m",
    },
  };
}

log4js.configure({
  appenders,
  categories: {
    default: {
      appenders: logToFile ? ["console", "file"] : ["console"],
      level,
    },
    error: {
      appenders: logToFile ? ["console", "file", "errorFile"] : ["console"],
      level: level === "off" ? "off" : "error",
    },
  },
});

// Export logger instance
export const logger = log4js.getLogger();

// Export error logger
export const errorLogger = log4js.getLogger("error");
