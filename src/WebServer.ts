import express, { Request, Response } from "express";
import { Server } from "http";
import { SolenoidService } from "./SolenoidService";
import { Attributes, AttributeValue, CommandPayload } from "./types";
import {
  ConfigurationError,
  InvalidArgumentError,
  ResourceClosedError,
  toError,
} from "./errors";
import { logger, errorLogger } from "./utils/logger";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAttributeValue(value: unknown): value is AttributeValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

export function statusForError(error: unknown): number {
  if (error instanceof InvalidArgumentError || error instanceof ConfigurationError) {
    return 400;
  }
  if (error instanceof ResourceClosedError) {
    return 409;
  }
  return 500;
}

export class WebServer {
  private app: express.Application;
  private server: Server | null = null;
  private service: SolenoidService;
  private port: number;

  constructor(service: SolenoidService, port: number = 8080) {
    this.app = express();
    this.service = service;
    this.port = port;
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    this.app.get("/api/status", this.getStatus.bind(this));
    this.app.get("/api/position", this.getPosition.bind(this));
    this.app.post("/api/position", this.setPosition.bind(this));
    this.app.post("/api/command", this.doCommand.bind(this));
    this.app.get("/api/geometries", this.getGeometries.bind(this));
    this.app.post("/api/reconfigure", this.reconfigure.bind(this));
  }

  private sendError(res: Response, context: string, error: unknown): void {
    const status = statusForError(error);
    const message = toError(error).message;
    if (status === 500) {
      errorLogger.error(`[WebServer] Error ${context}:`, message);
    } else {
      logger.warn(`[WebServer] Rejected ${context}: ${message}`);
    }
    res.status(status).json({ error: message });
  }

  private async getStatus(_req: Request, res: Response): Promise<void> {
    try {
      res.json(await this.service.getStatus());
    } catch (error) {
      this.sendError(res, "getting status", error);
    }
  }

  private async getPosition(_req: Request, res: Response): Promise<void> {
    try {
      const solenoid = this.service.getSolenoid();
      res.json({
        position: await solenoid.getPosition(),
        numberOfPositions: await solenoid.getNumberOfPositions(),
      });
    } catch (error) {
      this.sendError(res, "getting position", error);
    }
  }

  private async setPosition(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body;
      const position = isRecord(body) ? body.position : undefined;

      if (typeof position !== "number") {
        res.status(400).json({ error: "position must be a number" });
        return;
      }

      await this.service.getSolenoid().setPosition(position);
      res.json({ success: true, position });
    } catch (error) {
      this.sendError(res, "setting position", error);
    }
  }

  private async doCommand(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body;
      const command: CommandPayload = isRecord(body) ? body : {};
      res.json(await this.service.getSolenoid().doCommand(command));
    } catch (error) {
      this.sendError(res, "running command", error);
    }
  }

  private async getGeometries(_req: Request, res: Response): Promise<void> {
    try {
      res.json({ geometries: await this.service.getSolenoid().getGeometries() });
    } catch (error) {
      this.sendError(res, "getting geometries", error);
    }
  }

  private async reconfigure(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body;
      if (!isRecord(body) || !isRecord(body.attributes)) {
        res.status(400).json({ error: "attributes must be an object" });
        return;
      }

      const attributes: Attributes = {};
      for (const [key, value] of Object.entries(body.attributes)) {
        if (!isAttributeValue(value)) {
          res.status(400).json({ error: `attribute ${key} must be a scalar` });
          return;
        }
        attributes[key] = value;
      }

      const current = this.service.getSolenoidConfig();
      await this.service.reconfigure({
        name: current.name,
        model: typeof body.model === "string" ? body.model : current.model,
        attributes,
      });

      logger.info("[WebServer] Solenoid reconfigured via web interface");
      res.json({ success: true, status: await this.service.getStatus() });
    } catch (error) {
      this.sendError(res, "reconfiguring", error);
    }
  }

  public getApp(): express.Application {
    return this.app;
  }

  public start(): void {
    this.server = this.app.listen(this.port, () => {
      logger.info(`[WebServer] Web server started on port ${this.port}`);
    });
  }

  public stop(callback?: () => void): void {
    if (this.server) {
      this.server.close(() => {
        logger.info("[WebServer] Web server stopped");
        if (callback) {
          callback();
        }
      });
    } else {
      if (callback) {
        callback();
      }
    }
  }
}
