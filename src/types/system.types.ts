import { QueueStatus } from "./queue.types";

export interface SolenoidStatus {
  running: boolean;
  uptime: { days: number; hours: number };
  name: string;
  model: string;
  board: string | null;
  position: number | null;
  numberOfPositions: number | null;
  operations: QueueStatus | null;
}
