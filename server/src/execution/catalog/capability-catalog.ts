/**
 * Capability Catalog
 *
 * Static table mapping a capability id to the descriptor of the worker that
 * executes it. Loaded once per process; immutable afterwards.
 *
 * @module execution/catalog/capability-catalog
 */

import { readFile } from "fs/promises";
import type { CapabilityDescriptor } from "@cacm-runtime/types";
import { CatalogLoadError } from "../errors.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function nameList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string");
  }
  // Older catalogs list inputs/outputs as objects keyed by name
  if (isRecord(value)) {
    return Object.keys(value);
  }
  return [];
}

/**
 * Normalize one raw catalog entry. Returns a reason string when the entry
 * cannot be used.
 */
function toDescriptor(raw: unknown): CapabilityDescriptor | string {
  if (!isRecord(raw)) {
    return "entry is not an object";
  }
  const { id, workerType } = raw;
  if (typeof id !== "string" || id.trim() === "") {
    return "entry has no 'id'";
  }
  if (typeof workerType !== "string" || workerType.trim() === "") {
    return `entry '${id}' has no 'workerType'`;
  }

  const descriptor: CapabilityDescriptor = {
    id,
    name: typeof raw.name === "string" ? raw.name : id,
    description: typeof raw.description === "string" ? raw.description : "",
    workerType,
    inputs: nameList(raw.inputs),
    outputs: nameList(raw.outputs),
  };
  if (typeof raw.skillName === "string") {
    descriptor.skillName = raw.skillName;
  }
  return Object.freeze(descriptor);
}

export class CapabilityCatalog {
  private readonly entries: ReadonlyMap<string, CapabilityDescriptor>;

  /** Problems found while loading; the catalog is usable regardless */
  readonly loadErrors: readonly CatalogLoadError[];

  private constructor(
    descriptors: CapabilityDescriptor[],
    loadErrors: CatalogLoadError[] = []
  ) {
    this.entries = new Map(descriptors.map((d) => [d.id, d]));
    this.loadErrors = Object.freeze([...loadErrors]);
  }

  /**
   * Load a catalog document from disk.
   *
   * Never rejects: a missing or malformed document yields an empty catalog,
   * and an unusable entry is skipped. Each problem is logged and kept in
   * `loadErrors`.
   */
  static async load(filePath: string): Promise<CapabilityCatalog> {
    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      const reason =
        error instanceof Error && "code" in error && error.code === "ENOENT"
          ? "file not found"
          : errorMessage(error);
      return CapabilityCatalog.degraded(new CatalogLoadError(filePath, reason));
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      return CapabilityCatalog.degraded(
        new CatalogLoadError(filePath, `invalid JSON (${errorMessage(error)})`)
      );
    }

    return CapabilityCatalog.fromDocument(document, filePath);
  }

  /**
   * Build a catalog from an already-parsed document.
   */
  static fromDocument(document: unknown, source = "<memory>"): CapabilityCatalog {
    if (!isRecord(document) || !Array.isArray(document.computeCapabilities)) {
      return CapabilityCatalog.degraded(
        new CatalogLoadError(source, "document has no 'computeCapabilities' list")
      );
    }

    const descriptors: CapabilityDescriptor[] = [];
    const errors: CatalogLoadError[] = [];
    const seen = new Set<string>();

    for (const raw of document.computeCapabilities) {
      const result = toDescriptor(raw);
      if (typeof result === "string") {
        errors.push(new CatalogLoadError(source, result));
        continue;
      }
      if (seen.has(result.id)) {
        errors.push(new CatalogLoadError(source, `duplicate capability id '${result.id}'`));
        continue;
      }
      seen.add(result.id);
      descriptors.push(result);
    }

    for (const error of errors) {
      console.error(`[CapabilityCatalog] ${error.message}`);
    }
    return new CapabilityCatalog(descriptors, errors);
  }

  static fromEntries(entries: unknown[]): CapabilityCatalog {
    return CapabilityCatalog.fromDocument({ computeCapabilities: entries });
  }

  static empty(): CapabilityCatalog {
    return new CapabilityCatalog([]);
  }

  private static degraded(error: CatalogLoadError): CapabilityCatalog {
    console.error(`[CapabilityCatalog] ${error.message}; continuing with an empty catalog`);
    return new CapabilityCatalog([], [error]);
  }

  lookup(id: string): CapabilityDescriptor | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  list(): CapabilityDescriptor[] {
    return Array.from(this.entries.values());
  }

  /**
   * First descriptor executed by the given worker type, if any.
   */
  findByWorkerType(workerType: string): CapabilityDescriptor | undefined {
    for (const descriptor of this.entries.values()) {
      if (descriptor.workerType === workerType) {
        return descriptor;
      }
    }
    return undefined;
  }

  get size(): number {
    return this.entries.size;
  }
}
