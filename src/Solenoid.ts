import {
  Board,
  CallOptions,
  CommandPayload,
  ComponentConfig,
  ConfigValidation,
  Geometry,
  QueueStatus,
  SwitchResource,
} from "./types";
import { OperationQueue } from "./OperationQueue";
import { ResourceClosedError, toError } from "./errors";
import {
  optionalPositiveNumber,
  requireString,
  resolveBoard,
} from "./utils/attributes";
import { NUMBER_OF_POSITIONS, parsePosition } from "./utils/position";
import { attemptEach } from "./utils/pins";
import { logger, errorLogger } from "./utils/logger";

export const DEFAULT_PWM_FREQUENCY_HZ = 60;
export const PWM_DUTY_CYCLE = 0.5;

/**
 * Solenoid switched by a control pin plus a PWM pin.
 *
 * Off: control pin low, PWM duty 0.
 * On: control pin high, PWM at the configured frequency with a 50% duty cycle.
 * The control pin is always written before the PWM pin.
 */
export class Solenoid implements SwitchResource {
  public static readonly MODEL = "solenoid-ac:solenoid";

  public readonly name: string;
  private board: Board | null = null;
  private controlPin: string | null = null;
  private pwmPin: string | null = null;
  private pwmFrequency: number = DEFAULT_PWM_FREQUENCY_HZ;
  private position: number = 0;
  private closed: boolean = false;
  private operations: OperationQueue;

  constructor(name: string) {
    this.name = name;
    this.operations = new OperationQueue(`Solenoid ${name}`);
  }

  public static validateConfig(config: ComponentConfig): ConfigValidation {
    const board = requireString(config.attributes, "board");
    requireString(config.attributes, "control_pin");
    requireString(config.attributes, "pwm_pin");
    optionalPositiveNumber(config.attributes, "pwm_frequency");

    return { requiredDependencies: [board], optionalDependencies: [] };
  }

  public static create(
    config: ComponentConfig,
    dependencies: ReadonlyMap<string, Board>
  ): Solenoid {
    const instance = new Solenoid(config.name);

    instance.board = resolveBoard(
      dependencies,
      requireString(config.attributes, "board")
    );
    instance.controlPin = requireString(config.attributes, "control_pin");
    instance.pwmPin = requireString(config.attributes, "pwm_pin");
    instance.pwmFrequency =
      optionalPositiveNumber(config.attributes, "pwm_frequency") ??
      DEFAULT_PWM_FREQUENCY_HZ;

    logger.info(
      `[Solenoid] ${instance.name}: control pin ${instance.controlPin}, PWM pin ${instance.pwmPin} at ${instance.pwmFrequency}Hz on board ${instance.board.name}`
    );
    return instance;
  }

  public async getPosition(_options?: CallOptions): Promise<number> {
    return this.position;
  }

  public async setPosition(
    position: number,
    _options?: CallOptions
  ): Promise<void> {
    const target = parsePosition(position);

    await this.operations.add(`setPosition(${target})`, async () => {
      if (this.closed) {
        throw new ResourceClosedError(this.name);
      }
      const { board, controlPin, pwmPin } = this.requireBinding();

      this.position = target;

      const control = await board.gpioPinByName(controlPin);
      const pwm = await board.gpioPinByName(pwmPin);

      if (target === 0) {
        await control.set(false);
        await pwm.setPwm(0);
      } else {
        await control.set(true);
        await pwm.setPwmFrequency(this.pwmFrequency);
        await pwm.setPwm(PWM_DUTY_CYCLE);
      }

      logger.info(`[Solenoid] ${this.name}: position ${target}`);
    });
  }

  public async getNumberOfPositions(_options?: CallOptions): Promise<number> {
    return NUMBER_OF_POSITIONS;
  }

  public async doCommand(
    _command: CommandPayload,
    _options?: CallOptions
  ): Promise<CommandPayload> {
    return {};
  }

  public async getGeometries(_options?: CallOptions): Promise<Geometry[]> {
    return [];
  }

  public getOperationStatus(): QueueStatus {
    return this.operations.getStatus();
  }

  /** Drives both pins to their off state. Never rejects. */
  public async close(): Promise<void> {
    try {
      await this.operations.add("close", async () => {
        this.closed = true;
        await this.forcePinsLow();
      });
    } catch (error) {
      errorLogger.error(
        `[Solenoid] ${this.name}: error during close:`,
        toError(error).message
      );
    }
  }

  private async forcePinsLow(): Promise<void> {
    const board = this.board;
    const controlPin = this.controlPin;
    const pwmPin = this.pwmPin;
    if (!board || !controlPin || !pwmPin) {
      return;
    }

    const failures = await attemptEach(`[Solenoid] ${this.name}:`, [
      {
        description: `setting control pin ${controlPin} low during close`,
        run: async () => (await board.gpioPinByName(controlPin)).set(false),
      },
      {
        description: `setting PWM pin ${pwmPin} duty to 0 during close`,
        run: async () => (await board.gpioPinByName(pwmPin)).setPwm(0),
      },
    ]);
    if (failures === 0) {
      logger.info(`[Solenoid] ${this.name}: pins set low`);
    }
  }

  private requireBinding(): { board: Board; controlPin: string; pwmPin: string } {
    if (!this.board || !this.controlPin || !this.pwmPin) {
      throw new Error(`[Solenoid] ${this.name}: not bound to a board`);
    }
    return { board: this.board, controlPin: this.controlPin, pwmPin: this.pwmPin };
  }
}
