import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "node:http";
import * as path from "node:path";
import multer from "multer";
import { errorMessage, UnsafeArchivePathError } from "./errors";
import type { DailyStore } from "./fitness-store";
import type { ServiceConfig } from "./shealth-config";
import { listShealth, processFolder, resolveRawFolder, saveAndExtractZip } from "./shealth-import";
import { isValidDateString } from "./shealth/epochDays";

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 1024 * 1024 * 1024 } });

const HISTORY_LIMIT = 10;

export interface RouteDeps {
  config: ServiceConfig;
  store: DailyStore;
}

function requireAuth(apiKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) {
      return res.status(500).json({ error: "Server missing API_KEY" });
    }
    const authHeader = req.headers.authorization || "";
    const token = authHeader.startsWith("Bearer ") ? authHeader.slice(7) : "";
    if (token !== apiKey) {
      return res.status(401).json({ error: "Unauthorized" });
    }
    next();
  };
}

export function registerRoutes(app: Express, deps: RouteDeps): Server {
  const { config, store } = deps;
  const shealth = config.shealth;
  const processing = new Set<string>();

  app.use("/api", requireAuth(config.apiKey));

  app.post("/api/shealth/upload-zip", upload.single("file"), async (req: Request, res: Response) => {
    try {
      if (!req.file || req.file.size === 0) {
        return res.status(400).json({ error: "No file uploaded." });
      }
      if (path.extname(req.file.originalname).toLowerCase() !== ".zip") {
        return res.status(400).json({ error: "Please upload a .zip file." });
      }
      const label = typeof req.body?.label === "string" ? req.body.label : null;
      const result = await saveAndExtractZip(shealth, req.file.buffer, label);
      res.json(result);
    } catch (err: unknown) {
      if (err instanceof UnsafeArchivePathError) {
        return res.status(400).json({ error: err.message });
      }
      console.error("shealth upload error:", err);
      res.status(500).json({ error: `Upload failed: ${errorMessage(err)}` });
    }
  });

  app.get("/api/shealth/list", async (_req: Request, res: Response) => {
    try {
      res.json(await listShealth(shealth));
    } catch (err: unknown) {
      console.error("shealth list error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/shealth/process/:folder", async (req: Request, res: Response) => {
    const folder = req.params.folder;
    const targetDir = resolveRawFolder(shealth, folder);
    if (!targetDir) {
      return res.status(404).json({ error: `Folder not found under RAW_DATA: ${folder}` });
    }
    if (processing.has(targetDir)) {
      return res.status(409).json({ error: `Folder is already being processed: ${folder}` });
    }
    processing.add(targetDir);
    try {
      const result = await processFolder(shealth, store, folder, targetDir);
      res.json(result);
    } catch (err: unknown) {
      console.error("shealth process error:", err);
      res.status(500).json({ error: `Processing failed: ${errorMessage(err)}` });
    } finally {
      processing.delete(targetDir);
    }
  });

  app.get("/api/shealth/history", async (_req: Request, res: Response) => {
    try {
      res.json(await store.listImports(shealth.userId, HISTORY_LIMIT));
    } catch (err: unknown) {
      console.error("shealth history error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/api/fitness/daily", async (req: Request, res: Response) => {
    const from = typeof req.query.from === "string" ? req.query.from : "";
    const to = typeof req.query.to === "string" ? req.query.to : "";
    if (!isValidDateString(from) || !isValidDateString(to) || from > to) {
      return res.status(400).json({ error: "from and to must be yyyy-mm-dd with from <= to" });
    }
    try {
      res.json(await store.getDailyRange(shealth.userId, from, to));
    } catch (err: unknown) {
      console.error("fitness daily error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
