export interface GpioPin {
  readonly name: string;
  set(high: boolean): Promise<void>;
  /** Duty cycle in [0, 1]. */
  setPwm(dutyCycle: number): Promise<void>;
  setPwmFrequency(frequencyHz: number): Promise<void>;
}

export interface Board {
  readonly name: string;
  gpioPinByName(name: string): Promise<GpioPin>;
  close(): Promise<void>;
}

export type BoardType = "onoff" | "memory";

export type PinOperationKind = "set" | "pwm" | "pwmFrequency";

export interface PinOperation {
  pin: string;
  operation: PinOperationKind;
  value: boolean | number;
  at: number;
}

/** The subset of an onoff `Gpio` output the board drives. */
export interface DigitalOutput {
  writeSync(value: 0 | 1): void;
  unexport(): void;
}

export type DigitalOutputFactory = (gpio: number) => DigitalOutput;
