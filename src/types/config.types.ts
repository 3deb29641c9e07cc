import { BoardType } from "./board.types";

export type AttributeValue = string | number | boolean | null;

export type Attributes = Record<string, AttributeValue | undefined>;

export interface ComponentConfig {
  name: string;
  model: string;
  attributes: Attributes;
}

export interface ConfigValidation {
  requiredDependencies: string[];
  optionalDependencies: string[];
}

export interface BoardSettings {
  type: BoardType;
  name: string;
  gpioLegacyOffset: number;
}
