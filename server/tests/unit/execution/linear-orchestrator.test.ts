import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { LogEntry, WorkerResult } from "@cacm-runtime/types";
import { isMissing } from "../../../src/execution/binding/resolver.js";
import { CapabilityCatalog } from "../../../src/execution/catalog/capability-catalog.js";
import { SharedContext } from "../../../src/execution/context/shared-context.js";
import { createNativeSkillService } from "../../../src/execution/skills/native-skills.js";
import { SchemaValidator } from "../../../src/execution/validation/schema-validator.js";
import { WorkerRegistry } from "../../../src/execution/workers/worker-registry.js";
import { OrchestratorEventType, type OrchestratorEvent } from "../../../src/execution/workflow/events.js";
import { LinearOrchestrator } from "../../../src/execution/workflow/linear-orchestrator.js";
import { DEFAULT_CATALOG_PATH } from "../../../src/config.js";
import { EchoWorker, registerBuiltinWorkers } from "../../../src/workers/index.js";
import { catalogFor, fixedWorker, loadCreditAnalysis, makeInstance } from "../../fixtures/instances.js";

function messages(logs: LogEntry[]): string[] {
  return logs.map((entry) => `${entry.level}: ${entry.message}`);
}

describe("LinearOrchestrator", () => {
  let registry: WorkerRegistry;
  let consoleWarnSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    registry = registerBuiltinWorkers(new WorkerRegistry())
      .register("fail", () => fixedWorker("fail", { status: "error", message: "boom" }))
      .register("partial", () =>
        fixedWorker("partial", { status: "partial", payload: { v: 1 }, warnings: ["w1"] })
      )
      .register("throws", () => ({
        name: "throws",
        run: async (): Promise<WorkerResult> => {
          throw new Error("kaboom");
        },
      }))
      .register("slow", () => ({
        name: "slow",
        run: () =>
          new Promise<WorkerResult>((resolve) =>
            setTimeout(() => resolve({ status: "success", payload: { done: true } }), 200)
          ),
      }))
      .register("tolerant", () => ({
        name: "tolerant",
        toleratesMissingInputs: true,
        run: async (_task, inputs): Promise<WorkerResult> => ({
          status: "success",
          payload: { sawMissing: isMissing(inputs.x) },
        }),
      }));
    consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleWarnSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  function createOrchestrator(
    catalog: CapabilityCatalog = catalogFor("echo", "fail", "partial", "throws", "slow", "tolerant")
  ): LinearOrchestrator {
    return new LinearOrchestrator({
      catalog,
      registry,
      skills: createNativeSkillService(),
      validator: new SchemaValidator(),
    });
  }

  describe("bindings across steps", () => {
    it("should pass one step's output to the next", async () => {
      const result = await createOrchestrator().run(
        makeInstance([
          {
            stepId: "s1",
            computeCapabilityRef: "echo",
            inputBindings: { in: "hello" },
            outputBindings: { out: "cacm.outputs.x" },
          },
          {
            stepId: "s2",
            computeCapabilityRef: "echo",
            inputBindings: { in: "cacm.outputs.x" },
            outputBindings: { out: "cacm.outputs.y" },
          },
        ])
      );

      expect(result.success).toBe(true);
      expect(result.status).toBe("completed");
      expect(result.outputs).toEqual({ x: "hello", y: "hello" });
      expect(result.steps.map((s) => s.state)).toEqual(["captured", "captured"]);
    });

    it("should fail a step whose reference does not resolve and keep earlier outputs", async () => {
      const result = await createOrchestrator().run(
        makeInstance([
          {
            stepId: "s1",
            computeCapabilityRef: "echo",
            inputBindings: { in: "ok" },
            outputBindings: { out: "cacm.outputs.x" },
          },
          {
            stepId: "s2",
            computeCapabilityRef: "echo",
            inputBindings: { in: "cacm.outputs.missingKey" },
            outputBindings: { out: "cacm.outputs.y" },
          },
        ])
      );

      expect(result.success).toBe(false);
      expect(result.status).toBe("partial_failure");
      expect(result.outputs).toEqual({ x: "ok" });
      expect(result.steps[1]).toMatchObject({
        stepId: "s2",
        state: "failed",
        errorKind: "UnresolvedBinding",
        error: "Unresolved binding 'cacm.outputs.missingKey': no value at segment 'missingKey'",
      });
      expect(messages(result.logs)).toContain(
        "WARN: Input 'in': Unresolved binding 'cacm.outputs.missingKey': no value at segment 'missingKey'"
      );
      expect(messages(result.logs)).toContain(
        "ERROR: Step 's2' failed: Unresolved binding 'cacm.outputs.missingKey': no value at segment 'missingKey'"
      );
    });

    it("should resolve nested paths into declared inputs", async () => {
      const result = await createOrchestrator().run(
        makeInstance(
          [
            {
              stepId: "s1",
              computeCapabilityRef: "echo",
              inputBindings: { in: "cacm.inputs.params.value.clientId" },
              outputBindings: { out: "cacm.outputs.client" },
            },
          ],
          { inputs: { params: { type: "object", value: { clientId: "ACME" } } } }
        )
      );

      expect(result.outputs).toEqual({ client: "ACME" });
    });

    it("should keep intermediate values out of the outputs", async () => {
      const result = await createOrchestrator().run(
        makeInstance([
          {
            stepId: "s1",
            computeCapabilityRef: "echo",
            inputBindings: { in: { rating: "A" } },
            outputBindings: { out: "intermediate.s1" },
          },
          {
            stepId: "s2",
            computeCapabilityRef: "echo",
            inputBindings: { in: "intermediate.s1.rating" },
            outputBindings: { out: "cacm.outputs.rating" },
          },
        ])
      );

      expect(result.outputs).toEqual({ rating: "A" });
    });

    it("should cascade a failure to dependent steps only", async () => {
      const result = await createOrchestrator().run(
        makeInstance([
          { stepId: "a", computeCapabilityRef: "fail", outputBindings: { value: "cacm.outputs.a" } },
          {
            stepId: "b",
            computeCapabilityRef: "echo",
            inputBindings: { in: "cacm.outputs.a" },
            outputBindings: { out: "cacm.outputs.b" },
          },
          {
            stepId: "c",
            computeCapabilityRef: "echo",
            inputBindings: { in: "independent" },
            outputBindings: { out: "cacm.outputs.c" },
          },
        ])
      );

      expect(result.status).toBe("partial_failure");
      expect(result.outputs).toEqual({ c: "independent" });
      expect(result.steps.map((s) => [s.state, s.errorKind])).toEqual([
        ["failed", "WorkerExecutionError"],
        ["failed", "UnresolvedBinding"],
        ["captured", undefined],
      ]);
      expect(result.steps[0].error).toBe("Worker 'fail' failed: boom");
    });

    it("should let the last writer win on a shared target and log the overwrite", async () => {
      const result = await createOrchestrator().run(
        makeInstance([
          {
            stepId: "s1",
            computeCapabilityRef: "echo",
            inputBindings: { in: 1 },
            outputBindings: { out: "cacm.outputs.x" },
          },
          {
            stepId: "s2",
            computeCapabilityRef: "echo",
            inputBindings: { in: 2 },
            outputBindings: { out: "cacm.outputs.x" },
          },
        ])
      );

      expect(result.success).toBe(true);
      expect(result.outputs).toEqual({ x: 2 });
      expect(messages(result.logs)).toContain(
        "WARN: Output 'cacm.outputs.x' written by 's1' is overwritten by 's2'"
      );
    });

    it("should fail a step whose result lacks a bound field but keep the fields it has", async () => {
      const result = await createOrchestrator().run(
        makeInstance([
          {
            stepId: "s1",
            computeCapabilityRef: "echo",
            inputBindings: { in: "v" },
            outputBindings: { nothing: "cacm.outputs.z", out: "cacm.outputs.x" },
          },
        ])
      );

      expect(result.status).toBe("partial_failure");
      expect(result.outputs).toEqual({ x: "v" });
      expect(result.steps[0]).toMatchObject({
        state: "failed",
        errorKind: "MissingOutputField",
        error: "Result has no field 'nothing' for output binding 'cacm.outputs.z'",
      });
    });
  });

  describe("worker lifecycle", () => {
    it("should reuse one worker instance for steps sharing a capability", async () => {
      const orchestrator = createOrchestrator();
      const result = await orchestrator.run(
        makeInstance([
          {
            stepId: "s1",
            computeCapabilityRef: "echo",
            inputBindings: { in: "a" },
            outputBindings: { invocations: "cacm.outputs.first" },
          },
          {
            stepId: "s2",
            computeCapabilityRef: "echo",
            inputBindings: { in: "b" },
            outputBindings: { invocations: "cacm.outputs.second" },
          },
        ])
      );

      expect(result.outputs).toEqual({ first: 1, second: 2 });
      const lookup = orchestrator.workers.getOrCreate("echo");
      expect(lookup.ok && lookup.worker instanceof EchoWorker && lookup.worker.invocationCount).toBe(2);
      expect(messages(result.logs)).toContain("INFO: Dispatching to worker 'echo' (new instance)");
      expect(messages(result.logs)).toContain("INFO: Dispatching to worker 'echo'");
    });

    it("should keep worker state across runs of the same orchestrator", async () => {
      const orchestrator = createOrchestrator();
      const instance = makeInstance([
        { stepId: "s1", computeCapabilityRef: "echo", outputBindings: { invocations: "cacm.outputs.n" } },
      ]);

      await orchestrator.run(instance);
      const second = await orchestrator.run(instance);

      expect(second.outputs).toEqual({ n: 2 });
    });

    it("should fail a step whose capability is not in the catalog", async () => {
      const result = await createOrchestrator().run(
        makeInstance([{ stepId: "s1", computeCapabilityRef: "unknown:Thing" }])
      );

      expect(result.steps[0]).toMatchObject({
        state: "failed",
        errorKind: "CapabilityNotFound",
        error: "Capability 'unknown:Thing' not found in catalog",
      });
    });

    it("should fail a step whose worker cannot be constructed", async () => {
      const catalog = CapabilityCatalog.fromEntries([{ id: "ghost:Cap", workerType: "ghost" }]);
      const result = await createOrchestrator(catalog).run(
        makeInstance([{ stepId: "s1", computeCapabilityRef: "ghost:Cap" }])
      );

      expect(result.steps[0]).toMatchObject({
        state: "failed",
        errorKind: "WorkerConstructionError",
      });
      expect(result.status).toBe("partial_failure");
    });

    it("should convert a thrown error into a failed step", async () => {
      const result = await createOrchestrator().run(
        makeInstance([{ stepId: "s1", computeCapabilityRef: "throws" }])
      );

      expect(result.steps[0]).toMatchObject({
        state: "failed",
        errorKind: "WorkerExecutionError",
        error: "Worker 'throws' failed: kaboom",
      });
    });
  });

  describe("validation", () => {
    it("should not run any step when the instance is invalid", async () => {
      const run = vi.fn();
      registry.register("echo", () => ({ name: "echo", run }));

      const result = await createOrchestrator().run({
        cacmId: "cacm-bad",
        name: "Bad",
        inputs: {},
        outputs: {},
      });

      expect(run).not.toHaveBeenCalled();
      expect(result.success).toBe(false);
      expect(result.status).toBe("invalid");
      expect(result.steps).toEqual([]);
      expect(result.outputs).toEqual({});
      expect(messages(result.logs)).toEqual([
        "ERROR: CACM instance is invalid.",
        "ERROR: Validation error at workflow: Required",
        "ERROR: Run finished with status 'invalid'",
      ]);
      expect(result.context.cacmId).toBe("cacm-bad");
    });

    it("should reject an output target that is not declared", async () => {
      const result = await createOrchestrator().run(
        makeInstance(
          [{ stepId: "s1", computeCapabilityRef: "echo", outputBindings: { out: "cacm.outputs.nope" } }],
          { outputs: {} }
        )
      );

      expect(result.status).toBe("invalid");
      expect(messages(result.logs)).toContain(
        "ERROR: Validation error at workflow.0.outputBindings.out: Output target 'cacm.outputs.nope' is not declared in outputs"
      );
    });

    it("should refuse to run when a declared output is never bound", async () => {
      const result = await createOrchestrator().run(
        makeInstance(
          [
            {
              stepId: "s1",
              computeCapabilityRef: "echo",
              inputBindings: { in: "hi" },
              outputBindings: { out: "cacm.outputs.x" },
            },
          ],
          { outputs: { x: { type: "string" }, z: { type: "string" } } }
        )
      );

      expect(result.success).toBe(false);
      expect(result.status).toBe("invalid");
      expect(result.steps).toEqual([]);
      expect(messages(result.logs)).toContain(
        "ERROR: Validation error at outputs.z: Output 'z' is not bound by any step; mark it optional or bind it"
      );
    });

    it("should run when the unbound output is optional", async () => {
      const result = await createOrchestrator().run(
        makeInstance(
          [
            {
              stepId: "s1",
              computeCapabilityRef: "echo",
              inputBindings: { in: "hi" },
              outputBindings: { out: "cacm.outputs.x" },
            },
          ],
          { outputs: { x: { type: "string" }, z: { type: "string", optional: true } } }
        )
      );

      expect(result.success).toBe(true);
      expect(result.outputs).toEqual({ x: "hi" });
    });

    it("should not modify the caller's document", async () => {
      const instance = makeInstance([
        {
          stepId: "s1",
          computeCapabilityRef: "echo",
          inputBindings: { in: "cacm.inputs.list" },
          outputBindings: { out: "cacm.outputs.list" },
        },
      ], { inputs: { list: { type: "array", value: [1, 2] } } });
      const before = structuredClone(instance);

      const result = await createOrchestrator().run(instance);

      expect(instance).toEqual(before);
      expect(Object.isFrozen(instance.inputs)).toBe(false);
      expect(result.outputs).toEqual({ list: [1, 2] });
    });
  });

  describe("required steps", () => {
    it("should skip the remaining steps after a required step fails", async () => {
      const result = await createOrchestrator().run(
        makeInstance([
          { stepId: "s1", computeCapabilityRef: "fail", required: true },
          { stepId: "s2", computeCapabilityRef: "echo", outputBindings: { out: "cacm.outputs.x" } },
        ])
      );

      expect(result.status).toBe("aborted");
      expect(result.success).toBe(false);
      expect(result.steps.map((s) => s.state)).toEqual(["failed", "skipped"]);
      expect(messages(result.logs)).toContain("ERROR: Required step 's1' failed; skipping remaining steps");
      expect(messages(result.logs)).toContain("WARN: Skipping step 's2': required step 's1' failed");
    });

    it("should continue when a required step succeeds", async () => {
      const result = await createOrchestrator().run(
        makeInstance([
          { stepId: "s1", computeCapabilityRef: "echo", required: true },
          { stepId: "s2", computeCapabilityRef: "fail" },
        ])
      );

      expect(result.status).toBe("partial_failure");
    });
  });

  describe("worker results", () => {
    it("should record partial results as completed steps with warnings", async () => {
      const result = await createOrchestrator().run(
        makeInstance([
          { stepId: "s1", computeCapabilityRef: "partial", outputBindings: { v: "cacm.outputs.v" } },
        ])
      );

      expect(result.success).toBe(true);
      expect(result.outputs).toEqual({ v: 1 });
      expect(result.steps[0]).toMatchObject({ state: "captured", warnings: ["w1"] });
      expect(messages(result.logs)).toContain("WARN: Worker 'partial' reported: w1");
      expect(messages(result.logs)).toContain("INFO: Step 's1' completed with warnings");
    });

    it("should fail a step whose worker exceeds the timeout", async () => {
      const result = await createOrchestrator().run(
        makeInstance([{ stepId: "s1", computeCapabilityRef: "slow" }]),
        { stepTimeoutMs: 20 }
      );

      expect(result.steps[0]).toMatchObject({
        state: "failed",
        errorKind: "WorkerTimeout",
        error: "Worker 'slow' did not finish within 20ms",
      });
    });

    it("should dispatch unresolved inputs to a worker that accepts them", async () => {
      const result = await createOrchestrator().run(
        makeInstance([
          {
            stepId: "s1",
            computeCapabilityRef: "tolerant",
            inputBindings: { x: "cacm.outputs.absent" },
            outputBindings: { sawMissing: "cacm.outputs.saw" },
          },
        ])
      );

      expect(result.success).toBe(true);
      expect(result.outputs).toEqual({ saw: true });
      expect(messages(result.logs)).toContain(
        "WARN: Dispatching with 1 missing input(s); worker 'tolerant' accepts them"
      );
    });
  });

  describe("shared context", () => {
    it("should hand every worker the same context", async () => {
      const seen: SharedContext[] = [];
      registry.register("spy", () => ({
        name: "spy",
        run: async (_task, _inputs, context): Promise<WorkerResult> => {
          seen.push(context);
          return { status: "success", payload: {} };
        },
      }));
      const context = new SharedContext("cacm-test", { sessionId: "given" });

      const result = await createOrchestrator(catalogFor("spy")).run(
        makeInstance([
          { stepId: "s1", computeCapabilityRef: "spy" },
          { stepId: "s2", computeCapabilityRef: "spy" },
        ]),
        { context }
      );

      expect(seen).toEqual([context, context]);
      expect(seen[0]).toBe(context);
      expect(result.sessionId).toBe("given");
    });

    it("should seed global parameters and document references", async () => {
      const result = await createOrchestrator().run(
        makeInstance([{ stepId: "s1", computeCapabilityRef: "echo" }]),
        {
          sessionId: "seeded",
          globalParameters: { currency: "USD" },
          documentReferences: { "10-K": "file:///filing.pdf" },
        }
      );

      expect(result.context).toMatchObject({
        sessionId: "seeded",
        globalParameters: { currency: "USD" },
        documentReferences: { "10-K": "file:///filing.pdf" },
      });
    });
  });

  describe("events", () => {
    it("should emit lifecycle events in order", async () => {
      const orchestrator = createOrchestrator();
      const events: OrchestratorEvent[] = [];
      const unsubscribe = orchestrator.on((event) => events.push(event));

      await orchestrator.run(
        makeInstance([
          { stepId: "s1", computeCapabilityRef: "echo" },
          { stepId: "s2", computeCapabilityRef: "fail", required: true },
          { stepId: "s3", computeCapabilityRef: "echo" },
        ]),
        { sessionId: "events" }
      );

      expect(events.map((e) => e.type)).toEqual([
        OrchestratorEventType.RUN_STARTED,
        OrchestratorEventType.STEP_STARTED,
        OrchestratorEventType.STEP_COMPLETED,
        OrchestratorEventType.STEP_STARTED,
        OrchestratorEventType.STEP_FAILED,
        OrchestratorEventType.STEP_SKIPPED,
        OrchestratorEventType.RUN_COMPLETED,
      ]);
      expect(events.every((e) => e.sessionId === "events")).toBe(true);
      expect(events[events.length - 1]).toMatchObject({ status: "aborted", success: false });

      unsubscribe();
      await orchestrator.run(makeInstance([{ stepId: "s1", computeCapabilityRef: "echo" }]));
      expect(events).toHaveLength(7);
    });

    it("should keep running when a listener throws", async () => {
      const orchestrator = createOrchestrator();
      orchestrator.on(() => {
        throw new Error("listener failure");
      });

      const result = await orchestrator.run(makeInstance([{ stepId: "s1", computeCapabilityRef: "echo" }]));

      expect(result.success).toBe(true);
      expect(consoleErrorSpy).toHaveBeenCalledWith("[Orchestrator] Error in event listener:", expect.any(Error));
    });
  });

  describe("credit analysis pipeline", () => {
    it("should ingest, analyze and report with the built-in workers", async () => {
      const catalog = await CapabilityCatalog.load(DEFAULT_CATALOG_PATH);
      const orchestrator = createOrchestrator(catalog);

      const result = await orchestrator.run(loadCreditAnalysis(), { sessionId: "session-credit" });

      expect(result.status).toBe("completed");
      expect(result.outputs.ratios).toEqual({
        current_ratio: 2,
        debt_to_equity_ratio: 0.5,
        gross_profit_margin_pct: 40,
        net_profit_margin_pct: 10,
        return_on_assets_pct: 8.33,
        return_on_equity_pct: 16.67,
        debt_ratio: 0.25,
      });
      expect(result.context.dataStore.company_name).toBe("Acme Corp");
      expect(result.context.dataStore.calculated_key_ratios).toEqual(result.outputs.ratios);

      const report = result.outputs.reportText;
      expect(typeof report).toBe("string");
      const lines = String(report).split("\n");
      expect(lines[0]).toBe("# Credit Analysis Report for Acme Corp (ACME)");
      expect(lines).toContain(
        "Generated by: report-generation for CACM ID: cacm-credit-001 (Session: session-credit)"
      );
      expect(lines).toContain("Acme makes anvils.");
      expect(lines).toContain("- **Current Ratio:** 2.00");
      expect(lines).toContain("- **Return On Assets Pct:** 8.33");
      expect(lines).toContain("Supply chain exposure.");
      expect(lines).toContain("## 4. Delegated Analysis Results");
      expect(lines).toContain("**Item 1 from 'financial-analysis':**");
    });
  });
});
