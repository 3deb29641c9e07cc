import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { SolenoidService } from "./SolenoidService";
import { Config } from "./Config";
import { Solenoid } from "./Solenoid";
import { createDefaultRegistry } from "./ResourceRegistry";
import { AlternatingSolenoid } from "./AlternatingSolenoid";
import { ConfigurationError, ResourceClosedError } from "./errors";

const env = {
  BOARD_TYPE: "memory",
  BOARD_NAME: "local",
  SOLENOID_NAME: "valve",
  SOLENOID_BOARD: "local",
  SOLENOID_CONTROL_PIN: "17",
  SOLENOID_PWM_PIN: "18",
};

describe("SolenoidService", () => {
  let service: SolenoidService;

  beforeEach(() => {
    service = new SolenoidService(new Config(env));
  });

  afterEach(async () => {
    await service.cleanup();
  });

  it("builds the configured solenoid on a memory board", async () => {
    await service.initialize();

    expect(service.getSolenoid()).toBeInstanceOf(Solenoid);
    await expect(service.getStatus()).resolves.toEqual({
      running: true,
      uptime: { days: 0, hours: 0 },
      name: "valve",
      model: "solenoid-ac:solenoid",
      board: "local",
      position: 0,
      numberOfPositions: 2,
      operations: { queueSize: 0, processing: false, currentOperation: null },
    });
  });

  it("reports the position after a change", async () => {
    await service.initialize();

    await service.getSolenoid().setPosition(1);

    const status = await service.getStatus();
    expect(status.position).toBe(1);
  });

  it("fails to start with an incomplete solenoid config", async () => {
    const incomplete = new SolenoidService(
      new Config({ ...env, SOLENOID_PWM_PIN: undefined })
    );

    await expect(incomplete.initialize()).rejects.toThrow(
      new ConfigurationError("'pwm_pin' attribute is required in config")
    );
    await expect(incomplete.getStatus()).resolves.toMatchObject({
      running: false,
      position: null,
    });
  });

  it("closes the old driver when reconfigured", async () => {
    await service.initialize();
    const previous = service.getSolenoid();

    await service.reconfigure({
      name: "valve",
      model: AlternatingSolenoid.MODEL,
      attributes: { board: "local", pin1: "23", pin2: "24" },
    });

    expect(service.getSolenoid()).toBeInstanceOf(AlternatingSolenoid);
    expect(service.getSolenoidConfig().model).toBe("solenoid-ac:alternating");
    await expect(previous.setPosition(1)).rejects.toThrow(ResourceClosedError);
  });

  it("keeps the running driver when the new config is invalid", async () => {
    await service.initialize();
    const previous = service.getSolenoid();

    await expect(
      service.reconfigure({
        name: "valve",
        model: AlternatingSolenoid.MODEL,
        attributes: { board: "local", pin1: "23" },
      })
    ).rejects.toThrow(ConfigurationError);
    await expect(
      service.reconfigure({
        name: "valve",
        model: Solenoid.MODEL,
        attributes: { board: "other", control_pin: "17", pwm_pin: "18" },
      })
    ).rejects.toThrow("valve: missing required dependencies: other");

    expect(service.getSolenoid()).toBe(previous);
    await expect(previous.setPosition(1)).resolves.toBeUndefined();
  });

  it("closes every replaced driver when reconfigures overlap", async () => {
    const registry = createDefaultRegistry();
    const build = vi.spyOn(registry, "build");
    const overlapping = new SolenoidService(new Config(env), registry);
    await overlapping.initialize();
    const alternating = {
      name: "valve",
      model: AlternatingSolenoid.MODEL,
      attributes: { board: "local", pin1: "23", pin2: "24" },
    };

    await Promise.all([
      overlapping.reconfigure(alternating),
      overlapping.reconfigure(alternating),
    ]);

    const built = build.mock.results.flatMap((result) =>
      result.type === "return" ? [result.value] : []
    );
    expect(built).toHaveLength(3);
    const [initial, replaced, current] = built;
    expect(overlapping.getSolenoid()).toBe(current);
    await expect(initial.setPosition(1)).rejects.toThrow(ResourceClosedError);
    await expect(replaced.setPosition(1)).rejects.toThrow(ResourceClosedError);

    await overlapping.cleanup();
  });

  it("drops the driver on cleanup", async () => {
    await service.initialize();
    const previous = service.getSolenoid();

    await service.cleanup();

    expect(() => service.getSolenoid()).toThrow("Solenoid is not initialized");
    await expect(previous.setPosition(1)).rejects.toThrow(ResourceClosedError);
  });
});
