export interface QueuedOperation {
  name: string;
  execute: () => Promise<void>;
  reject: (reason: Error) => void;
  timestamp: number;
}

export interface QueueStatus {
  queueSize: number;
  processing: boolean;
  currentOperation: string | null;
}
