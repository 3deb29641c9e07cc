import { toError } from "../errors";
import { errorLogger } from "./logger";

export function assertDutyCycle(pin: string, dutyCycle: number): void {
  if (!Number.isFinite(dutyCycle) || dutyCycle < 0 || dutyCycle > 1) {
    throw new RangeError(
      `Duty cycle for pin ${pin} must be between 0 and 1, got ${dutyCycle}`
    );
  }
}

export function assertFrequency(pin: string, frequencyHz: number): void {
  if (!Number.isFinite(frequencyHz) || frequencyHz <= 0) {
    throw new RangeError(
      `PWM frequency for pin ${pin} must be greater than 0, got ${frequencyHz}`
    );
  }
}

export interface SafetyStep {
  description: string;
  run: () => Promise<void>;
}

/**
 * Runs every step even when earlier ones fail. Failures are logged under
 * `context`; returns how many failed.
 */
export async function attemptEach(
  context: string,
  steps: SafetyStep[]
): Promise<number> {
  let failures = 0;
  for (const step of steps) {
    try {
      await step.run();
    } catch (error) {
      failures++;
      errorLogger.error(
        `${context} error ${step.description}:`,
        toError(error).message
      );
    }
  }
  return failures;
}
