import { describe, it, expect } from "vitest";
import { MemoryBoard } from "./MemoryBoard";

describe("MemoryBoard", () => {
  it("returns the same pin for the same name", async () => {
    const board = new MemoryBoard("local");
    const first = await board.gpioPinByName("17");
    const second = await board.gpioPinByName("17");

    expect(first).toBe(second);
    expect(board.pin("17")).toBe(first);
  });

  it("records every pin operation in order", async () => {
    const board = new MemoryBoard("local");
    const pin = await board.gpioPinByName("18");

    await pin.set(true);
    await pin.setPwmFrequency(120);
    await pin.setPwm(0.5);

    expect(
      board.getOperations().map(({ pin, operation, value }) => ({ pin, operation, value }))
    ).toEqual([
      { pin: "18", operation: "set", value: true },
      { pin: "18", operation: "pwmFrequency", value: 120 },
      { pin: "18", operation: "pwm", value: 0.5 },
    ]);
    expect(pin.level).toBe(true);
    expect(pin.dutyCycle).toBe(0.5);
    expect(pin.frequencyHz).toBe(120);
  });

  it("treats a zero duty cycle as low", async () => {
    const board = new MemoryBoard("local");
    const pin = board.pin("18");

    await pin.setPwm(0.5);
    await pin.setPwm(0);

    expect(pin.level).toBe(false);
  });

  it("rejects out-of-range PWM values without recording them", async () => {
    const board = new MemoryBoard("local");
    const pin = board.pin("18");

    await expect(pin.setPwm(1.5)).rejects.toThrow(RangeError);
    await expect(pin.setPwm(-0.1)).rejects.toThrow(RangeError);
    await expect(pin.setPwmFrequency(0)).rejects.toThrow(
      "PWM frequency for pin 18 must be greater than 0, got 0"
    );
    expect(board.getOperations()).toEqual([]);
  });

  it("clears the operation log", async () => {
    const board = new MemoryBoard("local");
    await board.pin("17").set(true);

    board.clearOperations();

    expect(board.getOperations()).toEqual([]);
  });
});
