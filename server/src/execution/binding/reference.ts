/**
 * Binding parser
 *
 * A bound value is either a reference into one of the recognized namespaces
 * or a literal. Anything that is not a string, or a string without a
 * recognized prefix, is a literal.
 *
 * @module execution/binding/reference
 */

import type { BindingNamespace } from "@cacm-runtime/types";

export interface Reference {
  kind: "reference";
  namespace: BindingNamespace;
  /** Path below the namespace root; may contain empty segments if malformed */
  segments: string[];
  /** The original reference string */
  raw: string;
}

export interface Literal {
  kind: "literal";
  value: unknown;
}

export type Binding = Reference | Literal;

/** Longest prefix first so no namespace shadows another */
const NAMESPACES: readonly BindingNamespace[] = [
  "cacm.outputs",
  "cacm.inputs",
  "intermediate",
];

export function parseBinding(value: unknown): Binding {
  if (typeof value !== "string") {
    return { kind: "literal", value };
  }

  for (const namespace of NAMESPACES) {
    const prefix = `${namespace}.`;
    if (value.startsWith(prefix)) {
      return {
        kind: "reference",
        namespace,
        segments: value.slice(prefix.length).split("."),
        raw: value,
      };
    }
  }

  return { kind: "literal", value };
}

export function isReference(value: unknown): boolean {
  return parseBinding(value).kind === "reference";
}

/**
 * Render a reference back to its string form.
 */
export function formatReference(namespace: BindingNamespace, segments: string[]): string {
  return [namespace, ...segments].join(".");
}
