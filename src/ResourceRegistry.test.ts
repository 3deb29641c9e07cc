import { describe, it, expect, afterEach, vi } from "vitest";
import { ResourceRegistry, createDefaultRegistry } from "./ResourceRegistry";
import { Solenoid } from "./Solenoid";
import { AlternatingSolenoid } from "./AlternatingSolenoid";
import { MemoryBoard } from "./MemoryBoard";
import { Board } from "./types";
import { ConfigurationError } from "./errors";

describe("ResourceRegistry", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers both solenoid models by default", () => {
    expect(createDefaultRegistry().getModels()).toEqual([
      "solenoid-ac:solenoid",
      "solenoid-ac:alternating",
    ]);
  });

  it("refuses to register a model twice", () => {
    const registry = new ResourceRegistry();
    registry.register(Solenoid);

    expect(() => registry.register(Solenoid)).toThrow(
      "Model solenoid-ac:solenoid is already registered"
    );
  });

  it("builds the driver for the configured model", () => {
    const registry = createDefaultRegistry();
    const dependencies = new Map<string, Board>([["local", new MemoryBoard("local")]]);

    const valve = registry.build(
      {
        name: "valve",
        model: Solenoid.MODEL,
        attributes: { board: "local", control_pin: "17", pwm_pin: "18" },
      },
      dependencies
    );
    const coil = registry.build(
      {
        name: "coil",
        model: AlternatingSolenoid.MODEL,
        attributes: { board: "local", pin1: "23", pin2: "24" },
      },
      dependencies
    );

    expect(valve).toBeInstanceOf(Solenoid);
    expect(valve.name).toBe("valve");
    expect(coil).toBeInstanceOf(AlternatingSolenoid);
  });

  it("rejects an unknown model", () => {
    expect(() =>
      createDefaultRegistry().build(
        { name: "valve", model: "solenoid-ac:pulsed", attributes: {} },
        new Map()
      )
    ).toThrow(ConfigurationError);
  });

  it("rejects an invalid config before resolving any dependency", () => {
    const board = new MemoryBoard("local");
    const dependencies = new Map<string, Board>([["local", board]]);
    const lookup = vi.spyOn(dependencies, "get");
    const pinLookup = vi.spyOn(board, "gpioPinByName");

    expect(() =>
      createDefaultRegistry().build(
        { name: "valve", model: Solenoid.MODEL, attributes: { board: "local", pwm_pin: "18" } },
        dependencies
      )
    ).toThrow("'control_pin' attribute is required in config");
    expect(lookup).not.toHaveBeenCalled();
    expect(pinLookup).not.toHaveBeenCalled();
  });

  it("rejects a config whose board was not provided", () => {
    expect(() =>
      createDefaultRegistry().build(
        {
          name: "valve",
          model: Solenoid.MODEL,
          attributes: { board: "other", control_pin: "17", pwm_pin: "18" },
        },
        new Map<string, Board>([["local", new MemoryBoard("local")]])
      )
    ).toThrow(new ConfigurationError("valve: missing required dependencies: other"));
  });
});
