import {
  Board,
  DigitalOutput,
  DigitalOutputFactory,
  GpioPin,
} from "./types";
import { assertDutyCycle, assertFrequency } from "./utils/pins";
import { toError } from "./errors";
import { logger, errorLogger } from "./utils/logger";

const DEFAULT_PWM_FREQUENCY_HZ = 60;
const PIN_NAME_PATTERN = /^(?:GPIO)?(\d+)$/i;

/**
 * Output pin on a sysfs GPIO line. PWM is generated in software by a single
 * timer that alternates between the high and low phase of each period, so at
 * most one edge is ever pending.
 */
export class OnoffPin implements GpioPin {
  public readonly name: string;
  private output: DigitalOutput;
  private frequencyHz: number = DEFAULT_PWM_FREQUENCY_HZ;
  private dutyCycle: number = 0;
  private pulseTimer: NodeJS.Timeout | null = null;

  constructor(name: string, output: DigitalOutput) {
    this.name = name;
    this.output = output;
  }

  public async set(high: boolean): Promise<void> {
    this.stopPwm();
    this.dutyCycle = high ? 1 : 0;
    this.output.writeSync(high ? 1 : 0);
  }

  public async setPwm(dutyCycle: number): Promise<void> {
    assertDutyCycle(this.name, dutyCycle);
    this.stopPwm();
    this.dutyCycle = dutyCycle;

    if (dutyCycle === 0 || dutyCycle === 1) {
      this.output.writeSync(dutyCycle === 1 ? 1 : 0);
      return;
    }
    this.startPwm();
  }

  public async setPwmFrequency(frequencyHz: number): Promise<void> {
    assertFrequency(this.name, frequencyHz);
    this.frequencyHz = frequencyHz;

    if (this.pulseTimer) {
      this.stopPwm();
      this.startPwm();
    }
  }

  public isPwmRunning(): boolean {
    return this.pulseTimer !== null;
  }

  private startPwm(): void {
    const periodMs = 1000 / this.frequencyHz;
    const onTimeMs = periodMs * this.dutyCycle;

    const lower = () => {
      if (this.writeDuringPwm(0)) {
        this.pulseTimer = setTimeout(raise, periodMs - onTimeMs);
      }
    };
    const raise = () => {
      if (this.writeDuringPwm(1)) {
        this.pulseTimer = setTimeout(lower, onTimeMs);
      }
    };

    // First edge is written directly so a dead line fails the caller.
    this.output.writeSync(1);
    this.pulseTimer = setTimeout(lower, onTimeMs);
  }

  private writeDuringPwm(value: 0 | 1): boolean {
    try {
      this.output.writeSync(value);
      return true;
    } catch (error) {
      errorLogger.error(
        `[OnoffBoard] Error writing pin ${this.name} during PWM, stopping:`,
        toError(error).message
      );
      this.stopPwm();
      return false;
    }
  }

  private stopPwm(): void {
    if (this.pulseTimer) {
      clearTimeout(this.pulseTimer);
      this.pulseTimer = null;
    }
  }

  public release(): void {
    this.stopPwm();
    this.output.writeSync(0);
    this.output.unexport();
  }
}

export class OnoffBoard implements Board {
  public readonly name: string;
  private createOutput: DigitalOutputFactory;
  private gpioLegacyOffset: number;
  private pins: Map<string, OnoffPin> = new Map();

  constructor(
    name: string,
    createOutput: DigitalOutputFactory,
    gpioLegacyOffset: number = 0
  ) {
    this.name = name;
    this.createOutput = createOutput;
    this.gpioLegacyOffset = gpioLegacyOffset;
  }

  /**
   * Opens the board on the local sysfs GPIO interface. Only available on
   * Linux; onoff is loaded lazily so other platforms never require it.
   */
  public static async open(
    name: string,
    gpioLegacyOffset: number
  ): Promise<OnoffBoard> {
    if (process.platform !== "linux") {
      throw new Error(
        `[OnoffBoard] GPIO is only supported on Linux. Current platform: ${process.platform}`
      );
    }

    const { Gpio } = await import("onoff");
    if (!Gpio.accessible) {
      throw new Error("[OnoffBoard] GPIO is not accessible on this system");
    }

    logger.info(
      `[OnoffBoard] ${name} opened (legacy offset ${gpioLegacyOffset})`
    );
    return new OnoffBoard(
      name,
      (gpio) => new Gpio(gpio, "out"),
      gpioLegacyOffset
    );
  }

  public async gpioPinByName(name: string): Promise<OnoffPin> {
    const existing = this.pins.get(name);
    if (existing) {
      return existing;
    }

    const match = PIN_NAME_PATTERN.exec(name.trim());
    if (!match) {
      throw new Error(
        `[OnoffBoard] ${this.name}: unknown pin "${name}", expected a BCM number such as "17" or "GPIO17"`
      );
    }

    const line = parseInt(match[1], 10) + this.gpioLegacyOffset;
    const pin = new OnoffPin(name, this.createOutput(line));
    this.pins.set(name, pin);
    logger.info(`[OnoffBoard] ${this.name}: exported pin ${name} (line ${line})`);
    return pin;
  }

  public async close(): Promise<void> {
    this.pins.forEach((pin) => {
      try {
        pin.release();
        logger.info(`[OnoffBoard] Unexported pin ${pin.name}`);
      } catch (error) {
        errorLogger.error(
          `[OnoffBoard] Error unexporting pin ${pin.name}:`,
          toError(error).message
        );
      }
    });
    this.pins.clear();
  }
}
