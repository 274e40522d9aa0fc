/**
 * Data ingestion worker
 *
 * Copies company details and raw financial data from step inputs into the
 * shared data store, where downstream workers pick them up, and registers
 * the source document.
 */

import type { WorkerResult } from "@cacm-runtime/types";
import type { SharedContext } from "../execution/context/shared-context.js";
import { BaseWorker } from "../execution/workers/base-worker.js";
import type { StepInputs } from "../execution/workers/types.js";
import { ContextKeys, type ContextKey } from "./context-keys.js";

/** Step input name -> data store key */
const INGESTED_INPUTS: ReadonlyArray<[input: string, key: ContextKey]> = [
  ["companyName", ContextKeys.COMPANY_NAME],
  ["companyTicker", ContextKeys.COMPANY_TICKER],
  ["companyOverview", ContextKeys.COMPANY_OVERVIEW],
  ["riskFactorsText", ContextKeys.RISK_FACTORS],
  ["financialStatementData", ContextKeys.FINANCIAL_DATA],
];

export class DataIngestionWorker extends BaseWorker {
  async run(task: string, inputs: StepInputs, context: SharedContext): Promise<WorkerResult> {
    this.log(`Ingesting for '${task}' (session ${context.sessionId})`);
    const storedKeys: string[] = [];

    for (const [input, key] of INGESTED_INPUTS) {
      const value = inputs[input];
      if (value === undefined || value === null) {
        continue;
      }
      context.setData(key, value);
      storedKeys.push(key);
    }

    const uri = inputs.documentURI;
    if (typeof uri === "string" && uri !== "") {
      const docType =
        typeof inputs.documentType === "string" && inputs.documentType !== ""
          ? inputs.documentType
          : "GeneralDocument";
      context.addDocumentReference(docType, uri);
      storedKeys.push(`doc_ref_${docType}`);
    }

    if (storedKeys.length === 0) {
      return this.partial({ storedKeys }, ["No recognized inputs were provided; nothing was ingested"]);
    }
    return this.success({ storedKeys }, "Data ingested from inputs and stored in the shared context");
  }
}
