import { Position } from "../types";
import { InvalidArgumentError } from "../errors";

export const NUMBER_OF_POSITIONS = 2;

export function parsePosition(position: number): Position {
  if (position === 0 || position === 1) {
    return position;
  }
  throw new InvalidArgumentError(`Position must be 0 or 1, got ${position}`);
}
