import { GpioPin } from "./types";
import { toError } from "./errors";
import { sleep } from "./utils/sleep";
import { attemptEach } from "./utils/pins";
import { logger, errorLogger } from "./utils/logger";

export const ALTERNATION_FREQUENCY_HZ = 60;
export const ALTERNATION_HALF_PERIOD_MS = 1000 / (ALTERNATION_FREQUENCY_HZ * 2);

export type LoopState = "idle" | "running" | "cancelling";

export type LoopExit =
  | { status: "cancelled" }
  | { status: "failed"; error: Error };

/**
 * Drives two pins in antiphase until cancelled:
 * pin1 high / pin2 low, half a period, pin1 low / pin2 high, half a period.
 *
 * Whatever ends the loop, both pins are driven low before `cancel()` resolves.
 * An instance runs at most once.
 */
export class AlternationLoop {
  private label: string;
  private pin1: GpioPin;
  private pin2: GpioPin;
  private halfPeriodMs: number;

  private currentState: LoopState = "idle";
  private controller: AbortController | null = null;
  private completion: Promise<LoopExit> | null = null;
  private halfCycles: number = 0;

  constructor(
    label: string,
    pin1: GpioPin,
    pin2: GpioPin,
    halfPeriodMs: number = ALTERNATION_HALF_PERIOD_MS
  ) {
    this.label = label;
    this.pin1 = pin1;
    this.pin2 = pin2;
    this.halfPeriodMs = halfPeriodMs;
  }

  public get state(): LoopState {
    return this.currentState;
  }

  /** Completed half cycles since start. */
  public get completedHalfCycles(): number {
    return this.halfCycles;
  }

  public start(): void {
    if (this.completion) {
      throw new Error(`[AlternationLoop] ${this.label}: loop already started`);
    }

    this.controller = new AbortController();
    this.currentState = "running";
    this.completion = this.run(this.controller.signal);
  }

  /**
   * Requests cancellation and waits until the loop has stopped and both pins
   * are low. Returns null if the loop was never started.
   */
  public async cancel(): Promise<LoopExit | null> {
    if (!this.completion || !this.controller) {
      return null;
    }

    if (this.currentState === "running") {
      this.currentState = "cancelling";
    }
    this.controller.abort();

    return await this.completion;
  }

  private async run(signal: AbortSignal): Promise<LoopExit> {
    logger.info(
      `[AlternationLoop] ${this.label}: alternating ${this.pin1.name}/${this.pin2.name} at ${ALTERNATION_FREQUENCY_HZ}Hz`
    );

    let exit: LoopExit = { status: "cancelled" };
    let deadline = Date.now();

    try {
      while (!signal.aborted) {
        const pin1High = this.halfCycles % 2 === 0;

        await this.pin1.set(pin1High);
        if (signal.aborted) break;
        await this.pin2.set(!pin1High);
        if (signal.aborted) break;

        deadline += this.halfPeriodMs;
        let remaining = deadline - Date.now();
        if (
          remaining < -this.halfPeriodMs ||
          remaining > 2 * this.halfPeriodMs
        ) {
          // Clock jumped or the event loop stalled; re-anchor.
          deadline = Date.now() + this.halfPeriodMs;
          remaining = this.halfPeriodMs;
        }

        const result = await sleep(remaining, signal);
        if (result === "cancelled") break;
        this.halfCycles++;
      }
    } catch (error) {
      const failure = toError(error);
      errorLogger.error(
        `[AlternationLoop] ${this.label}: pin write failed, stopping:`,
        failure.message
      );
      exit = { status: "failed", error: failure };
    }

    this.currentState = "cancelling";
    await this.driveLow();
    this.currentState = "idle";

    logger.info(
      `[AlternationLoop] ${this.label}: stopped after ${this.halfCycles} half cycles (${exit.status})`
    );
    return exit;
  }

  private async driveLow(): Promise<void> {
    await attemptEach(`[AlternationLoop] ${this.label}:`, [
      {
        description: `setting ${this.pin1.name} low`,
        run: () => this.pin1.set(false),
      },
      {
        description: `setting ${this.pin2.name} low`,
        run: () => this.pin2.set(false),
      },
    ]);
  }
}
