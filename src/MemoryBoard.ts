import { Board, GpioPin, PinOperation, PinOperationKind } from "./types";
import { assertDutyCycle, assertFrequency } from "./utils/pins";
import { logger } from "./utils/logger";

export class MemoryPin implements GpioPin {
  public readonly name: string;
  private board: MemoryBoard;
  private currentLevel: boolean = false;
  private currentDutyCycle: number = 0;
  private currentFrequency: number = 0;

  constructor(board: MemoryBoard, name: string) {
    this.board = board;
    this.name = name;
  }

  public get level(): boolean {
    return this.currentLevel;
  }

  public get dutyCycle(): number {
    return this.currentDutyCycle;
  }

  public get frequencyHz(): number {
    return this.currentFrequency;
  }

  public async set(high: boolean): Promise<void> {
    this.currentLevel = high;
    this.currentDutyCycle = high ? 1 : 0;
    this.board.record(this.name, "set", high);
  }

  public async setPwm(dutyCycle: number): Promise<void> {
    assertDutyCycle(this.name, dutyCycle);
    this.currentDutyCycle = dutyCycle;
    this.currentLevel = dutyCycle > 0;
    this.board.record(this.name, "pwm", dutyCycle);
  }

  public async setPwmFrequency(frequencyHz: number): Promise<void> {
    assertFrequency(this.name, frequencyHz);
    this.currentFrequency = frequencyHz;
    this.board.record(this.name, "pwmFrequency", frequencyHz);
  }
}

/**
 * Board without hardware. Pin writes only update in-memory state and are
 * kept in an operation log; used off the Pi and in tests.
 */
export class MemoryBoard implements Board {
  public readonly name: string;
  private pins: Map<string, MemoryPin> = new Map();
  private operations: PinOperation[] = [];

  constructor(name: string) {
    this.name = name;
  }

  public async gpioPinByName(name: string): Promise<MemoryPin> {
    return this.pin(name);
  }

  /** Synchronous lookup for inspection; creates the pin on first use. */
  public pin(name: string): MemoryPin {
    let pin = this.pins.get(name);
    if (!pin) {
      pin = new MemoryPin(this, name);
      this.pins.set(name, pin);
    }
    return pin;
  }

  public record(
    pin: string,
    operation: PinOperationKind,
    value: boolean | number
  ): void {
    this.operations.push({ pin, operation, value, at: Date.now() });
    logger.debug(`[MemoryBoard] ${this.name}: ${operation} ${pin} = ${value}`);
  }

  public getOperations(): PinOperation[] {
    return [...this.operations];
  }

  public clearOperations(): void {
    this.operations = [];
  }

  public async close(): Promise<void> {
    this.pins.forEach((pin) => {
      if (pin.level) {
        logger.warn(`[MemoryBoard] ${this.name}: pin ${pin.name} left high at close`);
      }
    });
    logger.info(`[MemoryBoard] ${this.name} closed`);
  }
}
