/**
 * Report generation worker
 *
 * Assembles a Markdown credit report from the shared data store, the step
 * inputs, and analysis results other workers delegated to it earlier in
 * the same session. Deliveries are held per session until that session's
 * report is built.
 */

import type { WorkerResult } from "@cacm-runtime/types";
import type { SharedContext } from "../execution/context/shared-context.js";
import { BaseWorker } from "../execution/workers/base-worker.js";
import type { StepInputs } from "../execution/workers/types.js";
import { ContextKeys } from "./context-keys.js";

export interface DeliveredResults {
  from: string;
  data: unknown;
}

const DEFAULT_TITLE = "Credit Analysis Report";
/** Sessions with undelivered results kept at once; the oldest is evicted first */
export const MAX_PENDING_SESSIONS = 100;

function titleCase(key: string): string {
  return key
    .split("_")
    .filter((part) => part !== "")
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join(" ");
}

function asText(value: unknown, fallback: string): string {
  if (typeof value === "string" && value !== "") return value;
  if (value === undefined || value === null) return fallback;
  return JSON.stringify(value, null, 2);
}

function ratioLines(ratios: unknown): string[] {
  if (typeof ratios !== "object" || ratios === null || Object.keys(ratios).length === 0) {
    return ["- No financial ratios available."];
  }
  return Object.entries(ratios).map(([key, value]) => {
    const shown = typeof value === "number" ? value.toFixed(2) : String(value);
    return `- **${titleCase(key)}:** ${shown}`;
  });
}

export class ReportGenerationWorker extends BaseWorker {
  /** Session id -> results delegated in that session, in arrival order */
  private readonly pending = new Map<string, DeliveredResults[]>();

  async run(task: string, inputs: StepInputs, context: SharedContext): Promise<WorkerResult> {
    if (Object.hasOwn(inputs, "analysis_results")) {
      const from = typeof inputs.from === "string" ? inputs.from : "unknown";
      const received = this.store(context.sessionId, { from, data: inputs.analysis_results });
      this.log(`Stored analysis results from '${from}' (${received} for this session)`);
      return this.success({ received }, "Analysis results stored");
    }

    const delivered = this.pending.get(context.sessionId) ?? [];
    this.pending.delete(context.sessionId);
    const reportText = this.buildReport(task, inputs, context, delivered);
    const reportPath = `./output_artifacts/reports/report_${context.sessionId}_${context.cacmId}.md`;
    return this.success({ reportText, reportPath }, "Report generated");
  }

  /** Results delegated in a session whose report has not been built yet */
  pendingResults(sessionId: string): readonly DeliveredResults[] {
    return this.pending.get(sessionId) ?? [];
  }

  get pendingSessionCount(): number {
    return this.pending.size;
  }

  private store(sessionId: string, item: DeliveredResults): number {
    const items = this.pending.get(sessionId);
    if (items) {
      items.push(item);
      return items.length;
    }

    if (this.pending.size >= MAX_PENDING_SESSIONS) {
      const oldest = this.pending.keys().next();
      if (!oldest.done) {
        console.warn(`[${this.name}] Dropping undelivered results of session ${oldest.value}`);
        this.pending.delete(oldest.value);
      }
    }
    this.pending.set(sessionId, [item]);
    return 1;
  }

  private buildReport(
    task: string,
    inputs: StepInputs,
    context: SharedContext,
    delivered: readonly DeliveredResults[]
  ): string {
    const companyName = asText(context.getData(ContextKeys.COMPANY_NAME), "N/A");
    const ticker = asText(context.getData(ContextKeys.COMPANY_TICKER), "N/A");
    const title =
      typeof inputs.report_title_detail === "string" ? inputs.report_title_detail : DEFAULT_TITLE;
    const ratios = inputs.ratios ?? context.getData(ContextKeys.CALCULATED_RATIOS);

    const parts: string[] = [
      `# ${title} for ${companyName} (${ticker})`,
      `## Task: ${task}`,
      `Generated by: ${this.name} for CACM ID: ${context.cacmId} (Session: ${context.sessionId})`,
      "---",
      "## 1. Company Overview",
      asText(context.getData(ContextKeys.COMPANY_OVERVIEW), "[Company overview not available]"),
      "## 2. Key Financial Ratios",
      ratioLines(ratios).join("\n"),
      "## 3. Key Risk Factors",
      asText(context.getData(ContextKeys.RISK_FACTORS), "[Risk factors not available]"),
    ];

    if (delivered.length > 0) {
      parts.push("## 4. Delegated Analysis Results");
      delivered.forEach((item, index) => {
        parts.push(`**Item ${index + 1} from '${item.from}':**`);
        parts.push("```json\n" + JSON.stringify(item.data, null, 2) + "\n```");
      });
    }

    return parts.join("\n\n");
  }
}
