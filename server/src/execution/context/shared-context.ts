/**
 * Shared Context
 *
 * Per-run mutable state handed by reference to every worker invocation.
 * Steps run one at a time, so each key has a single writer at any moment;
 * `setData` is last-writer-wins.
 *
 * @module execution/context/shared-context
 */

import { randomUUID } from "crypto";
import type { SharedContextSnapshot } from "@cacm-runtime/types";

export interface SharedContextOptions {
  sessionId?: string;
  /** Echo writes to the console (default: false) */
  verbose?: boolean;
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export class SharedContext {
  readonly sessionId: string;
  readonly cacmId: string;

  private readonly documentReferences = new Map<string, string>();
  private readonly knowledgeBaseReferences: string[] = [];
  private readonly globalParameters = new Map<string, unknown>();
  private readonly dataStore = new Map<string, unknown>();
  private readonly verbose: boolean;

  constructor(cacmId: string, options: SharedContextOptions = {}) {
    this.cacmId = cacmId;
    this.sessionId = options.sessionId ?? randomUUID();
    this.verbose = options.verbose ?? false;
    this.trace(`Initialized for CACM '${cacmId}'`);
  }

  // ---------------------------------------------------------------------------
  // Data store
  // ---------------------------------------------------------------------------

  setData(key: string, value: unknown): void {
    this.dataStore.set(key, value);
    this.trace(`Set data '${key}' (${typeName(value)})`);
  }

  getData<T = unknown>(key: string): T | undefined;
  getData<T>(key: string, defaultValue: T): T;
  getData(key: string, defaultValue?: unknown): unknown {
    return this.dataStore.has(key) ? this.dataStore.get(key) : defaultValue;
  }

  hasData(key: string): boolean {
    return this.dataStore.has(key);
  }

  dataKeys(): string[] {
    return Array.from(this.dataStore.keys());
  }

  // ---------------------------------------------------------------------------
  // Document and knowledge-base references
  // ---------------------------------------------------------------------------

  addDocumentReference(docType: string, uri: string): void {
    this.documentReferences.set(docType, uri);
    this.trace(`Added document reference ${docType} -> ${uri}`);
  }

  getDocumentReference(docType: string): string | undefined {
    return this.documentReferences.get(docType);
  }

  getAllDocumentReferences(): Record<string, string> {
    return Object.fromEntries(this.documentReferences);
  }

  addKnowledgeBaseReference(uri: string): void {
    if (!this.knowledgeBaseReferences.includes(uri)) {
      this.knowledgeBaseReferences.push(uri);
    }
  }

  getAllKnowledgeBaseReferences(): string[] {
    return [...this.knowledgeBaseReferences];
  }

  // ---------------------------------------------------------------------------
  // Global parameters (write-once-read-many by convention)
  // ---------------------------------------------------------------------------

  setGlobalParameter(key: string, value: unknown): void {
    if (this.globalParameters.has(key)) {
      console.warn(`[SharedContext] Overwriting global parameter '${key}'`);
    }
    this.globalParameters.set(key, value);
  }

  getGlobalParameter<T = unknown>(key: string): T | undefined;
  getGlobalParameter<T>(key: string, defaultValue: T): T;
  getGlobalParameter(key: string, defaultValue?: unknown): unknown {
    return this.globalParameters.has(key) ? this.globalParameters.get(key) : defaultValue;
  }

  getAllGlobalParameters(): Record<string, unknown> {
    return Object.fromEntries(this.globalParameters);
  }

  // ---------------------------------------------------------------------------
  // Diagnostics
  // ---------------------------------------------------------------------------

  /**
   * Human-readable summary. Diagnostic only; the format is not stable.
   */
  summarize(): string {
    const docs = this.getAllDocumentReferences();
    const params = this.getAllGlobalParameters();
    const keys = this.dataKeys();
    return [
      `--- SharedContext (session ${this.sessionId}, CACM ${this.cacmId}) ---`,
      `Document references: ${Object.keys(docs).length ? JSON.stringify(docs) : "none"}`,
      `Knowledge base references: ${this.knowledgeBaseReferences.length ? this.knowledgeBaseReferences.join(", ") : "none"}`,
      `Global parameters: ${Object.keys(params).length ? JSON.stringify(params) : "none"}`,
      `Data store keys: ${keys.length ? keys.join(", ") : "none"}`,
    ].join("\n");
  }

  toJSON(): SharedContextSnapshot {
    return {
      sessionId: this.sessionId,
      cacmId: this.cacmId,
      documentReferences: this.getAllDocumentReferences(),
      knowledgeBaseReferences: this.getAllKnowledgeBaseReferences(),
      globalParameters: this.getAllGlobalParameters(),
      dataStore: Object.fromEntries(this.dataStore),
    };
  }

  private trace(message: string): void {
    if (this.verbose) {
      console.log(`[SharedContext:${this.sessionId}] ${message}`);
    }
  }
}
