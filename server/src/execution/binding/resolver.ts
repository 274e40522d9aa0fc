/**
 * Binding Resolver
 *
 * Turns bound values into concrete step inputs by walking the namespaces in
 * scope, and writes worker payload fields back into output targets.
 * Resolution is pure: the same reference against an unchanged scope yields
 * the same value. Failures come back as tagged results, never as throws.
 *
 * @module execution/binding/resolver
 */

import type { InstanceInput, WorkflowInstance } from "@cacm-runtime/types";
import { UnresolvedBindingError } from "../errors.js";
import { parseBinding, type Binding, type Reference } from "./reference.js";

/**
 * Marker bound in place of a value that could not be resolved, for workers
 * that accept missing inputs.
 */
export const MISSING: unique symbol = Symbol.for("cacm-runtime.missing");
export type Missing = typeof MISSING;

export function isMissing(value: unknown): value is Missing {
  return value === MISSING;
}

/**
 * Namespaces visible to a step. `outputs` and `intermediate` accumulate as
 * steps complete.
 */
export interface BindingScope {
  readonly inputs: Readonly<Record<string, InstanceInput>>;
  readonly outputs: Record<string, unknown>;
  readonly intermediate: Record<string, unknown>;
}

export type Resolution =
  | { ok: true; value: unknown; binding: Binding }
  | { ok: false; error: UnresolvedBindingError };

export type WriteResult =
  | { ok: true; overwritten: boolean }
  | { ok: false; error: UnresolvedBindingError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createScope(instance: Pick<WorkflowInstance, "inputs">): BindingScope {
  return { inputs: instance.inputs, outputs: {}, intermediate: {} };
}

function rootOf(reference: Reference, scope: BindingScope): unknown {
  switch (reference.namespace) {
    case "cacm.inputs":
      return scope.inputs;
    case "cacm.outputs":
      return scope.outputs;
    case "intermediate":
      return scope.intermediate;
  }
}

function walk(root: unknown, reference: Reference): Resolution {
  let current = root;

  for (const segment of reference.segments) {
    if (segment === "") {
      return {
        ok: false,
        error: new UnresolvedBindingError(reference.raw, "empty path segment"),
      };
    }

    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isRecord(current) && Object.hasOwn(current, segment)) {
      current = current[segment];
    } else {
      current = undefined;
    }

    if (current === undefined) {
      return {
        ok: false,
        error: new UnresolvedBindingError(
          reference.raw,
          `no value at segment '${segment}'`,
          segment
        ),
      };
    }
  }

  return { ok: true, value: current, binding: reference };
}

/**
 * Resolve a bound value against the scope.
 *
 * A single-segment input reference (`cacm.inputs.<name>`) yields the
 * declared input's `value`; longer input paths walk the declared entry, so
 * `cacm.inputs.params.value.clientId` reaches into the value explicitly.
 */
export function resolveBinding(bound: unknown, scope: BindingScope): Resolution {
  const binding = parseBinding(bound);
  if (binding.kind === "literal") {
    return { ok: true, value: binding.value, binding };
  }

  const result = walk(rootOf(binding, scope), binding);
  if (
    result.ok &&
    binding.namespace === "cacm.inputs" &&
    binding.segments.length === 1 &&
    isRecord(result.value) &&
    Object.hasOwn(result.value, "value")
  ) {
    return { ok: true, value: result.value.value, binding };
  }
  return result;
}

/**
 * Write a value into an output target (`cacm.outputs.*` or `intermediate.*`),
 * creating intermediate objects along the path.
 */
export function writeBinding(target: string, value: unknown, scope: BindingScope): WriteResult {
  const binding = parseBinding(target);
  if (binding.kind !== "reference" || binding.namespace === "cacm.inputs") {
    return {
      ok: false,
      error: new UnresolvedBindingError(
        target,
        "output targets must be under 'cacm.outputs.' or 'intermediate.'"
      ),
    };
  }

  const { segments } = binding;
  if (segments.some((s) => s === "" || s === "__proto__")) {
    return {
      ok: false,
      error: new UnresolvedBindingError(target, "invalid path segment"),
    };
  }

  let container: Record<string, unknown> =
    binding.namespace === "cacm.outputs" ? scope.outputs : scope.intermediate;

  for (const segment of segments.slice(0, -1)) {
    const next = Object.hasOwn(container, segment) ? container[segment] : undefined;
    if (next === undefined) {
      const created: Record<string, unknown> = {};
      container[segment] = created;
      container = created;
    } else if (isRecord(next) && !Object.isFrozen(next)) {
      container = next;
    } else {
      return {
        ok: false,
        error: new UnresolvedBindingError(
          target,
          `cannot write below non-object value at segment '${segment}'`,
          segment
        ),
      };
    }
  }

  const last = segments[segments.length - 1];
  const overwritten = Object.hasOwn(container, last);
  container[last] = value;
  return { ok: true, overwritten };
}
