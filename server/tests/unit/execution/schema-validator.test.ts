import { describe, it, expect } from "vitest";
import { SchemaValidator, checkInstanceRules } from "../../../src/execution/validation/schema-validator.js";
import { loadCreditAnalysis, makeInstance } from "../../fixtures/instances.js";

describe("SchemaValidator", () => {
  const validator = new SchemaValidator();

  it("should accept a well-formed instance and fill step defaults", () => {
    const outcome = validator.validate({
      cacmId: "c1",
      name: "Minimal",
      inputs: {},
      outputs: { x: { type: "string", optional: true } },
      workflow: [{ stepId: "s1", computeCapabilityRef: "util:Echo" }],
    });

    expect(outcome.isValid).toBe(true);
    expect(outcome.errors).toEqual([]);
    if (outcome.isValid) {
      expect(outcome.instance.workflow[0]).toEqual({
        stepId: "s1",
        description: "",
        computeCapabilityRef: "util:Echo",
        inputBindings: {},
        outputBindings: {},
      });
    }
  });

  it("should accept the credit analysis example", () => {
    expect(validator.validate(loadCreditAnalysis()).isValid).toBe(true);
  });

  it("should keep extra fields on declared inputs", () => {
    const outcome = validator.validate({
      cacmId: "c1",
      name: "Extras",
      inputs: { p: { type: "object", value: { a: 1 }, source: "upload" } },
      outputs: {},
      workflow: [],
    });

    expect(outcome.isValid && outcome.instance.inputs.p.source).toBe("upload");
  });

  it("should report structural problems with dotted paths", () => {
    const outcome = validator.validate({
      cacmId: "",
      name: "Broken",
      inputs: {},
      outputs: {},
      workflow: [{ stepId: "s1" }],
    });

    expect(outcome.isValid).toBe(false);
    expect(outcome.errors).toEqual([
      { path: "cacmId", message: "cacmId must not be empty" },
      { path: "workflow.0.computeCapabilityRef", message: "Required" },
    ]);
  });

  it("should reject a document that is not an object", () => {
    const outcome = validator.validate("not an instance");

    expect(outcome.isValid).toBe(false);
    expect(outcome.errors).toEqual([{ path: "", message: "Expected object, received string" }]);
  });

  it("should reject duplicate step ids", () => {
    const outcome = validator.validate(
      makeInstance([
        { stepId: "s1", computeCapabilityRef: "echo" },
        { stepId: "s2", computeCapabilityRef: "echo" },
        { stepId: "s1", computeCapabilityRef: "echo" },
      ])
    );

    expect(outcome.errors).toEqual([
      { path: "workflow.2.stepId", message: "Duplicate stepId 's1' (first used by workflow.0)" },
    ]);
  });
});

describe("checkInstanceRules", () => {
  it("should check every output target", () => {
    const issues = checkInstanceRules({
      cacmId: "c1",
      name: "Targets",
      inputs: {},
      outputs: { declared: { type: "string" } },
      workflow: [
        {
          stepId: "s1",
          description: "",
          computeCapabilityRef: "echo",
          inputBindings: {},
          outputBindings: {
            a: "cacm.outputs.declared.part",
            b: "intermediate.anything",
            c: "cacm.inputs.p",
            d: "somewhere",
            e: "intermediate.x..y",
            f: "cacm.outputs.undeclared",
          },
        },
      ],
    });

    expect(issues).toEqual([
      {
        path: "workflow.0.outputBindings.c",
        message: "Output target 'cacm.inputs.p' must start with 'cacm.outputs.' or 'intermediate.'",
      },
      {
        path: "workflow.0.outputBindings.d",
        message: "Output target 'somewhere' must start with 'cacm.outputs.' or 'intermediate.'",
      },
      {
        path: "workflow.0.outputBindings.e",
        message: "Output target 'intermediate.x..y' has an empty path segment",
      },
      {
        path: "workflow.0.outputBindings.f",
        message: "Output target 'cacm.outputs.undeclared' is not declared in outputs",
      },
    ]);
  });

  it("should report declared outputs that no step binds", () => {
    const issues = checkInstanceRules({
      cacmId: "c1",
      name: "Unbound",
      inputs: {},
      outputs: {
        x: { type: "string" },
        z: { type: "string" },
        extra: { type: "string", optional: true },
        nested: { type: "object" },
      },
      workflow: [
        {
          stepId: "s1",
          description: "",
          computeCapabilityRef: "echo",
          inputBindings: {},
          outputBindings: { out: "cacm.outputs.x", part: "cacm.outputs.nested.part" },
        },
      ],
    });

    expect(issues).toEqual([
      {
        path: "outputs.z",
        message: "Output 'z' is not bound by any step; mark it optional or bind it",
      },
    ]);
  });
});
