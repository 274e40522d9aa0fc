/**
 * Schema Validator
 *
 * Checks a workflow instance document against a zod schema, then applies
 * the rules a schema cannot express (unique step ids, output targets,
 * declared outputs some step binds). Issues are ordered: schema issues
 * first, then rule violations in step order, then unbound outputs.
 *
 * @module execution/validation/schema-validator
 */

import { z } from "zod";
import type { ValidationIssue, WorkflowInstance } from "@cacm-runtime/types";
import { parseBinding } from "../binding/reference.js";
import type { InstanceValidator, ValidationOutcome } from "../workflow/types.js";

const nonEmpty = (field: string) => z.string().min(1, { message: `${field} must not be empty` });

const InstanceInputSchema = z
  .object({
    type: z.string(),
    value: z.unknown().optional(),
    description: z.string().optional(),
  })
  .catchall(z.unknown());

const InstanceOutputSchema = z
  .object({
    type: z.string(),
    description: z.string().optional(),
    optional: z.boolean().optional(),
  })
  .catchall(z.unknown());

const WorkflowStepSchema = z.object({
  stepId: nonEmpty("stepId"),
  description: z.string().default(""),
  computeCapabilityRef: nonEmpty("computeCapabilityRef"),
  inputBindings: z.record(z.string(), z.unknown()).default({}),
  outputBindings: z.record(z.string(), z.string()).default({}),
  required: z.boolean().optional(),
});

export const WorkflowInstanceSchema = z.object({
  cacmId: nonEmpty("cacmId"),
  name: nonEmpty("name"),
  version: z.string().optional(),
  description: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
  inputs: z.record(z.string(), InstanceInputSchema),
  outputs: z.record(z.string(), InstanceOutputSchema),
  workflow: z.array(WorkflowStepSchema),
});

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.map(String).join(".");
}

/**
 * Rule violations in a structurally valid instance.
 */
export function checkInstanceRules(instance: WorkflowInstance): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const firstIndex = new Map<string, number>();
  const boundOutputs = new Set<string>();

  instance.workflow.forEach((step, index) => {
    const previous = firstIndex.get(step.stepId);
    if (previous !== undefined) {
      issues.push({
        path: `workflow.${index}.stepId`,
        message: `Duplicate stepId '${step.stepId}' (first used by workflow.${previous})`,
      });
    } else {
      firstIndex.set(step.stepId, index);
    }

    for (const [field, target] of Object.entries(step.outputBindings)) {
      const path = `workflow.${index}.outputBindings.${field}`;
      const binding = parseBinding(target);

      if (binding.kind !== "reference" || binding.namespace === "cacm.inputs") {
        issues.push({
          path,
          message: `Output target '${target}' must start with 'cacm.outputs.' or 'intermediate.'`,
        });
        continue;
      }
      if (binding.segments.some((segment) => segment === "")) {
        issues.push({ path, message: `Output target '${target}' has an empty path segment` });
        continue;
      }
      if (binding.namespace !== "cacm.outputs") {
        continue;
      }
      if (!Object.hasOwn(instance.outputs, binding.segments[0])) {
        issues.push({
          path,
          message: `Output target '${target}' is not declared in outputs`,
        });
        continue;
      }
      boundOutputs.add(binding.segments[0]);
    }
  });

  for (const [name, output] of Object.entries(instance.outputs)) {
    if (!output.optional && !boundOutputs.has(name)) {
      issues.push({
        path: `outputs.${name}`,
        message: `Output '${name}' is not bound by any step; mark it optional or bind it`,
      });
    }
  }

  return issues;
}

export class SchemaValidator implements InstanceValidator {
  validate(document: unknown): ValidationOutcome {
    const parsed = WorkflowInstanceSchema.safeParse(document);
    if (!parsed.success) {
      return {
        isValid: false,
        errors: parsed.error.issues.map((issue) => ({
          path: formatPath(issue.path),
          message: issue.message,
        })),
      };
    }

    const instance: WorkflowInstance = parsed.data;
    const errors = checkInstanceRules(instance);
    if (errors.length > 0) {
      return { isValid: false, errors };
    }
    return { isValid: true, errors: [], instance };
  }
}
