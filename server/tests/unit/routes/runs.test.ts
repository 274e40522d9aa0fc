import { describe, it, expect, beforeEach, afterEach } from "vitest";
import express, { Express } from "express";
import request from "supertest";
import type Database from "better-sqlite3";
import { createEngine } from "../../../src/engine.js";
import { CapabilityCatalog } from "../../../src/execution/catalog/capability-catalog.js";
import { createRunsRouter } from "../../../src/routes/runs.js";
import { closeDatabase, initDatabase } from "../../../src/services/db.js";
import { RunHistoryStore } from "../../../src/services/run-history.js";
import { makeInstance } from "../../fixtures/instances.js";

const echoInstance = makeInstance(
  [
    {
      stepId: "echo",
      computeCapabilityRef: "util:Echo",
      inputBindings: { in: "cacm.inputs.greeting" },
      outputBindings: { out: "cacm.outputs.reply" },
    },
  ],
  { cacmId: "cacm-echo", inputs: { greeting: { type: "string", value: "hello" } } }
);

describe("Runs API Routes", () => {
  let app: Express;
  let db: Database.Database;

  beforeEach(async () => {
    db = initDatabase({ path: ":memory:" });
    const { orchestrator } = await createEngine({
      catalog: CapabilityCatalog.fromEntries([{ id: "util:Echo", workerType: "echo" }]),
    });
    app = express();
    app.use(express.json());
    app.use("/api/runs", createRunsRouter(orchestrator, new RunHistoryStore(db)));
  });

  afterEach(() => {
    closeDatabase(db);
  });

  describe("POST /api/runs", () => {
    it("should run an instance and record it", async () => {
      const response = await request(app).post("/api/runs").send(echoInstance);

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.status).toBe("completed");
      expect(response.body.outputs).toEqual({ reply: "hello" });
      expect(response.body.steps).toHaveLength(1);
      expect(response.body.steps[0].state).toBe("captured");

      const stored = await request(app).get(`/api/runs/${response.body.runId}`);
      expect(stored.status).toBe(200);
      expect(stored.body.run.cacmId).toBe("cacm-echo");
      expect(stored.body.run.sessionId).toBe(response.body.sessionId);
    });

    it("should respond 422 for an invalid instance", async () => {
      const response = await request(app)
        .post("/api/runs")
        .send({ cacmId: "cacm-bad", name: "Bad", inputs: {}, outputs: {} });

      expect(response.status).toBe(422);
      expect(response.body.success).toBe(false);
      expect(response.body.status).toBe("invalid");
      expect(response.body.steps).toEqual([]);

      const stored = await request(app).get(`/api/runs/${response.body.runId}`);
      expect(stored.body.run.cacmId).toBe("cacm-bad");
      expect(stored.body.run.status).toBe("invalid");
    });
  });

  describe("GET /api/runs", () => {
    it("should list runs newest first and filter by cacmId", async () => {
      const first = await request(app).post("/api/runs").send(echoInstance);
      const second = await request(app)
        .post("/api/runs")
        .send({ ...echoInstance, cacmId: "cacm-other" });

      const all = await request(app).get("/api/runs");
      expect(all.status).toBe(200);
      expect(all.body.runs.map((r: { id: string }) => r.id)).toEqual([
        second.body.runId,
        first.body.runId,
      ]);

      const filtered = await request(app).get("/api/runs?cacmId=cacm-other");
      expect(filtered.body.runs.map((r: { id: string }) => r.id)).toEqual([second.body.runId]);

      const limited = await request(app).get("/api/runs?limit=1");
      expect(limited.body.runs).toHaveLength(1);
    });

    it("should reject a limit outside 1..500", async () => {
      for (const limit of ["0", "501", "abc"]) {
        const response = await request(app).get(`/api/runs?limit=${limit}`);
        expect(response.status).toBe(400);
        expect(response.body).toEqual({ error: "limit must be an integer between 1 and 500" });
      }
    });
  });

  describe("GET /api/runs/:id", () => {
    it("should return 404 for an unknown run", async () => {
      const response = await request(app).get("/api/runs/run-missing");

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: "Run 'run-missing' not found" });
    });
  });
});
