import { ConfigValidation, ComponentConfig } from "./config.types";
import { Board } from "./board.types";
import { QueueStatus } from "./queue.types";

export type Position = 0 | 1;

export interface CallOptions {
  extra?: Record<string, unknown>;
  /** Advisory only; drivers do not enforce it. */
  timeout?: number;
}

export type CommandPayload = Record<string, unknown>;

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface Geometry {
  label: string;
  center: Vector3;
}

export interface Switch {
  getPosition(options?: CallOptions): Promise<number>;
  setPosition(position: number, options?: CallOptions): Promise<void>;
  getNumberOfPositions(options?: CallOptions): Promise<number>;
}

export interface Closeable {
  close(): Promise<void>;
}

export interface SwitchResource extends Switch, Closeable {
  readonly name: string;
  doCommand(command: CommandPayload, options?: CallOptions): Promise<CommandPayload>;
  getGeometries(options?: CallOptions): Promise<Geometry[]>;
  getOperationStatus(): QueueStatus;
}

/** Static side of a driver class, as registered with the resource registry. */
export interface SwitchModel {
  readonly MODEL: string;
  validateConfig(config: ComponentConfig): ConfigValidation;
  create(config: ComponentConfig, dependencies: ReadonlyMap<string, Board>): SwitchResource;
}
