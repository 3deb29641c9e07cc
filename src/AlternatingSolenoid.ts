import {
  Board,
  CallOptions,
  CommandPayload,
  ComponentConfig,
  ConfigValidation,
  Geometry,
  GpioPin,
  QueueStatus,
  SwitchResource,
} from "./types";
import { AlternationLoop, LoopExit } from "./AlternationLoop";
import { OperationQueue } from "./OperationQueue";
import { ResourceClosedError, toError } from "./errors";
import { requireString, resolveBoard } from "./utils/attributes";
import { NUMBER_OF_POSITIONS, parsePosition } from "./utils/position";
import { attemptEach } from "./utils/pins";
import { logger, errorLogger } from "./utils/logger";

/**
 * Solenoid driven by two pins toggled in antiphase at a fixed 60Hz while on.
 *
 * Every position change first cancels the running loop, if any, and waits for
 * it to drive both pins low. Position changes and close are serialized, so at
 * most one loop exists per instance.
 */
export class AlternatingSolenoid implements SwitchResource {
  public static readonly MODEL = "solenoid-ac:alternating";

  public readonly name: string;
  private board: Board | null = null;
  private pin1: string | null = null;
  private pin2: string | null = null;
  private position: number = 0;
  private closed: boolean = false;
  private loop: AlternationLoop | null = null;
  private operations: OperationQueue;

  constructor(name: string) {
    this.name = name;
    this.operations = new OperationQueue(`AlternatingSolenoid ${name}`);
  }

  public static validateConfig(config: ComponentConfig): ConfigValidation {
    const board = requireString(config.attributes, "board");
    requireString(config.attributes, "pin1");
    requireString(config.attributes, "pin2");

    return { requiredDependencies: [board], optionalDependencies: [] };
  }

  public static create(
    config: ComponentConfig,
    dependencies: ReadonlyMap<string, Board>
  ): AlternatingSolenoid {
    const instance = new AlternatingSolenoid(config.name);

    instance.board = resolveBoard(
      dependencies,
      requireString(config.attributes, "board")
    );
    instance.pin1 = requireString(config.attributes, "pin1");
    instance.pin2 = requireString(config.attributes, "pin2");

    logger.info(
      `[AlternatingSolenoid] ${instance.name}: pins ${instance.pin1}/${instance.pin2} on board ${instance.board.name}`
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
      this.position = target;
      await this.stopAlternation();

      const [first, second] = await this.resolvePins();

      if (target === 0) {
        await first.set(false);
        await second.set(false);
      } else {
        this.loop = new AlternationLoop(this.name, first, second);
        this.loop.start();
      }

      logger.info(`[AlternatingSolenoid] ${this.name}: position ${target}`);
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

  public isAlternating(): boolean {
    return this.loop !== null && this.loop.state === "running";
  }

  /**
   * Stops the loop and drives both pins low. Never rejects; pin errors are
   * logged.
   */
  public async close(): Promise<void> {
    try {
      await this.operations.add("close", async () => {
        this.closed = true;
        await this.stopAlternation();
        await this.forcePinsLow();
      });
    } catch (error) {
      errorLogger.error(
        `[AlternatingSolenoid] ${this.name}: error during close:`,
        toError(error).message
      );
    }
  }

  private async stopAlternation(): Promise<LoopExit | null> {
    const loop = this.loop;
    if (!loop) {
      return null;
    }

    this.loop = null;
    const exit = await loop.cancel();
    if (exit?.status === "failed") {
      logger.warn(
        `[AlternatingSolenoid] ${this.name}: previous alternation had stopped on error: ${exit.error.message}`
      );
    }
    return exit;
  }

  private async forcePinsLow(): Promise<void> {
    const board = this.board;
    const pin1 = this.pin1;
    const pin2 = this.pin2;
    if (!board || !pin1 || !pin2) {
      return;
    }

    const failures = await attemptEach(
      `[AlternatingSolenoid] ${this.name}:`,
      [
        {
          description: `setting ${pin1} low during close`,
          run: async () => (await board.gpioPinByName(pin1)).set(false),
        },
        {
          description: `setting ${pin2} low during close`,
          run: async () => (await board.gpioPinByName(pin2)).set(false),
        },
      ]
    );
    if (failures === 0) {
      logger.info(`[AlternatingSolenoid] ${this.name}: pins set low`);
    }
  }

  private async resolvePins(): Promise<[GpioPin, GpioPin]> {
    if (!this.board || !this.pin1 || !this.pin2) {
      throw new Error(`[AlternatingSolenoid] ${this.name}: not bound to a board`);
    }
    return [
      await this.board.gpioPinByName(this.pin1),
      await this.board.gpioPinByName(this.pin2),
    ];
  }
}
