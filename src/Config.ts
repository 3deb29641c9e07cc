import { Attributes, BoardSettings, BoardType, ComponentConfig } from "./types";
import { Solenoid } from "./Solenoid";
import { logger } from "./utils/logger";

const SOLENOID_ATTRIBUTE_ENV: Record<string, string> = {
  board: "SOLENOID_BOARD",
  control_pin: "SOLENOID_CONTROL_PIN",
  pwm_pin: "SOLENOID_PWM_PIN",
  pwm_frequency: "SOLENOID_PWM_FREQUENCY",
  pin1: "SOLENOID_PIN1",
  pin2: "SOLENOID_PIN2",
};

export class Config {
  public startupTimestamp: number;
  public readonly webPort: number;
  public readonly board: BoardSettings;
  public readonly solenoid: ComponentConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.startupTimestamp = Date.now();
    this.webPort = parseInt(env.WEB_PORT || "8080", 10);

    this.board = {
      type: this.parseBoardType(env.BOARD_TYPE),
      name: env.BOARD_NAME || "local",
      gpioLegacyOffset: parseInt(env.GPIO_LEGACY_OFFSET || "512", 10),
    };

    this.solenoid = {
      name: env.SOLENOID_NAME || "solenoid",
      model: env.SOLENOID_MODEL || Solenoid.MODEL,
      attributes: this.parseAttributes(env),
    };

    this.validate();
  }

  private parseBoardType(value?: string): BoardType {
    if (!value) {
      return process.platform === "linux" ? "onoff" : "memory";
    }
    if (value === "onoff" || value === "memory") {
      return value;
    }
    throw new Error(`Invalid BOARD_TYPE configuration: ${value}`);
  }

  /**
   * Unset variables are left out so the driver's own validation reports
   * them by attribute name. The frequency stays text when it is not numeric,
   * for the same reason.
   */
  private parseAttributes(env: NodeJS.ProcessEnv): Attributes {
    const attributes: Attributes = {};

    for (const [attribute, variable] of Object.entries(SOLENOID_ATTRIBUTE_ENV)) {
      const raw = env[variable];
      if (raw === undefined || raw.trim() === "") {
        continue;
      }

      if (attribute === "pwm_frequency") {
        const parsed = Number(raw);
        attributes[attribute] = Number.isFinite(parsed) ? parsed : raw;
      } else {
        attributes[attribute] = raw.trim();
      }
    }

    return attributes;
  }

  private validate(): void {
    if (isNaN(this.webPort) || this.webPort <= 0 || this.webPort > 65535) {
      throw new Error("Invalid WEB_PORT configuration");
    }

    if (isNaN(this.board.gpioLegacyOffset) || this.board.gpioLegacyOffset < 0) {
      throw new Error("Invalid GPIO_LEGACY_OFFSET configuration");
    }

    if (!this.board.name) {
      throw new Error("BOARD_NAME is required in configuration");
    }
  }

  public getUptimeValue(): { days: number; hours: number } {
    const uptime = Date.now() - this.startupTimestamp;
    const days = Math.floor(uptime / (1000 * 60 * 60 * 24));
    const hours = Math.floor(
      (uptime % (1000 * 60 * 60 * 24)) / (1000 * 60 * 60)
    );
    return { days, hours };
  }

  public display(): void {
    const attributes = Object.entries(this.solenoid.attributes)
      .map(([key, value]) => `  ${key}: ${value}`)
      .join("\n");

    logger.info(
      `\n=== Solenoid Configuration ===\n` +
        `Web Port: ${this.webPort}\n` +
        `\nBoard:\n` +
        `  Name: ${this.board.name}\n` +
        `  Type: ${this.board.type}\n` +
        `  GPIO Legacy Offset: ${this.board.gpioLegacyOffset}\n` +
        `\nSolenoid:\n` +
        `  Name: ${this.solenoid.name}\n` +
        `  Model: ${this.solenoid.model}\n` +
        `${attributes || "  (no attributes)"}\n` +
        `==============================\n`
    );
  }
}
