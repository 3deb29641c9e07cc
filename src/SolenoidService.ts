import { Config } from "./Config";
import { MemoryBoard } from "./MemoryBoard";
import { OnoffBoard } from "./OnoffBoard";
import { OperationQueue } from "./OperationQueue";
import { ResourceRegistry, createDefaultRegistry } from "./ResourceRegistry";
import { Board, ComponentConfig, SolenoidStatus, SwitchResource } from "./types";
import { toError } from "./errors";
import { logger, errorLogger } from "./utils/logger";

export class SolenoidService {
  private config: Config;
  private registry: ResourceRegistry;
  private boards: Map<string, Board> = new Map();
  private solenoid: SwitchResource | null = null;
  private solenoidConfig: ComponentConfig;
  private isRunning: boolean = false;
  private operations: OperationQueue = new OperationQueue("Service");

  constructor(config: Config, registry: ResourceRegistry = createDefaultRegistry()) {
    this.config = config;
    this.registry = registry;
    this.solenoidConfig = config.solenoid;
  }

  public async initialize(): Promise<void> {
    logger.info(
      "\n=================================\n     Solenoid Starting Up\n================================="
    );

    this.config.display();

    try {
      // Rejects a bad config before any board is opened.
      this.registry.validate(this.solenoidConfig);

      const board = await this.openBoard();
      this.boards.set(board.name, board);

      this.solenoid = this.registry.build(this.solenoidConfig, this.boards);
      this.isRunning = true;
      logger.info("[Service] Solenoid ready\n");
    } catch (error) {
      errorLogger.error("[Service] Initialization failed:", toError(error).message);
      throw error;
    }
  }

  private async openBoard(): Promise<Board> {
    const { type, name, gpioLegacyOffset } = this.config.board;

    if (type === "memory") {
      logger.warn(
        `[Service] Board ${name} has no hardware attached (logging only)`
      );
      return new MemoryBoard(name);
    }

    return await OnoffBoard.open(name, gpioLegacyOffset);
  }

  /**
   * Swaps the driver for one built from `next`. The new config is validated
   * before the running driver is closed, so a bad config leaves it in place.
   * Reconfigures and cleanup run one at a time; each closes the driver the
   * previous one installed.
   */
  public async reconfigure(next: ComponentConfig): Promise<void> {
    await this.operations.add(`reconfigure(${next.name})`, async () => {
      this.registry.check(next, this.boards);

      if (this.solenoid) {
        logger.info(`[Service] Reconfiguring ${this.solenoidConfig.name}`);
        await this.solenoid.close();
        this.solenoid = null;
      }

      this.solenoid = this.registry.build(next, this.boards);
      this.solenoidConfig = next;
      this.isRunning = true;
    });
  }

  public getSolenoid(): SwitchResource {
    if (!this.solenoid) {
      throw new Error("Solenoid is not initialized");
    }
    return this.solenoid;
  }

  public getSolenoidConfig(): ComponentConfig {
    return this.solenoidConfig;
  }

  public async getStatus(): Promise<SolenoidStatus> {
    const solenoid = this.solenoid;
    const board = this.solenoidConfig.attributes.board;

    return {
      running: this.isRunning,
      uptime: this.config.getUptimeValue(),
      name: this.solenoidConfig.name,
      model: this.solenoidConfig.model,
      board: typeof board === "string" ? board : null,
      position: solenoid ? await solenoid.getPosition() : null,
      numberOfPositions: solenoid ? await solenoid.getNumberOfPositions() : null,
      operations: solenoid ? solenoid.getOperationStatus() : null,
    };
  }

  public async cleanup(): Promise<void> {
    await this.operations.add("cleanup", async () => {
      logger.warn("[Service] Cleaning up resources...");

      this.isRunning = false;

      if (this.solenoid) {
        await this.solenoid.close();
        this.solenoid = null;
      }

      for (const board of this.boards.values()) {
        try {
          await board.close();
        } catch (error) {
          errorLogger.error(
            `[Service] Error closing board ${board.name}:`,
            toError(error).message
          );
        }
      }
      this.boards.clear();

      logger.info("[Service] Cleanup complete");
    });
  }

  public async shutdown(): Promise<void> {
    await this.cleanup();
    process.exit(0);
  }
}
