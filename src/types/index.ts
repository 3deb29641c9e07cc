export * from "./board.types";
export * from "./config.types";
export * from "./queue.types";
export * from "./switch.types";
export * from "./system.types";
