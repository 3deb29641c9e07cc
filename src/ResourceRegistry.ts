import { Board, ComponentConfig, ConfigValidation, SwitchModel, SwitchResource } from "./types";
import { ConfigurationError } from "./errors";
import { Solenoid } from "./Solenoid";
import { AlternatingSolenoid } from "./AlternatingSolenoid";
import { logger } from "./utils/logger";

/**
 * Maps model names to driver classes and builds validated instances.
 */
export class ResourceRegistry {
  private models: Map<string, SwitchModel> = new Map();

  public register(model: SwitchModel): void {
    if (this.models.has(model.MODEL)) {
      throw new Error(`Model ${model.MODEL} is already registered`);
    }
    this.models.set(model.MODEL, model);
  }

  public getModels(): string[] {
    return Array.from(this.models.keys());
  }

  public validate(config: ComponentConfig): ConfigValidation {
    return this.lookup(config.model).validateConfig(config);
  }

  /**
   * Validates the config and checks every required dependency was provided.
   * Nothing is read from `dependencies` beyond membership.
   */
  public check(
    config: ComponentConfig,
    dependencies: ReadonlyMap<string, Board>
  ): SwitchModel {
    const model = this.lookup(config.model);
    const { requiredDependencies } = model.validateConfig(config);

    const missing = requiredDependencies.filter((name) => !dependencies.has(name));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `${config.name}: missing required dependencies: ${missing.join(", ")}`
      );
    }
    return model;
  }

  public build(
    config: ComponentConfig,
    dependencies: ReadonlyMap<string, Board>
  ): SwitchResource {
    const model = this.check(config, dependencies);

    logger.info(`[Registry] Building ${config.name} (${config.model})`);
    return model.create(config, dependencies);
  }

  private lookup(modelName: string): SwitchModel {
    const model = this.models.get(modelName);
    if (!model) {
      throw new ConfigurationError(
        `Unknown model "${modelName}". Available: ${this.getModels().join(", ")}`
      );
    }
    return model;
  }
}

export function createDefaultRegistry(): ResourceRegistry {
  const registry = new ResourceRegistry();
  registry.register(Solenoid);
  registry.register(AlternatingSolenoid);
  return registry;
}
