/**
 * Financial analysis worker
 *
 * Calculates ratios through the skill service, records them in the shared
 * data store and hands them to the report-generation peer.
 */

import type { CapabilityDescriptor, WorkerResult } from "@cacm-runtime/types";
import type { SharedContext } from "../execution/context/shared-context.js";
import { FINANCIAL_ANALYSIS, type RatioReport } from "../execution/skills/native-skills.js";
import { BaseWorker } from "../execution/workers/base-worker.js";
import type { StepInputs } from "../execution/workers/types.js";
import { ContextKeys } from "./context-keys.js";

export const REPORT_PEER = "report-generation";
const DEFAULT_SKILL = `${FINANCIAL_ANALYSIS}.calculate_basic_ratios`;

function isRatioReport(value: unknown): value is RatioReport {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const ratios: unknown = "calculated_ratios" in value ? value.calculated_ratios : undefined;
  const errors: unknown = "errors" in value ? value.errors : undefined;
  return (
    typeof ratios === "object" &&
    ratios !== null &&
    Object.values(ratios).every((v) => typeof v === "number") &&
    Array.isArray(errors) &&
    errors.every((e) => typeof e === "string")
  );
}

function splitSkillName(skillName: string): [plugin: string, fn: string] {
  const dot = skillName.indexOf(".");
  return dot === -1 ? [FINANCIAL_ANALYSIS, skillName] : [skillName.slice(0, dot), skillName.slice(dot + 1)];
}

export class FinancialAnalysisWorker extends BaseWorker {
  async run(
    task: string,
    inputs: StepInputs,
    context: SharedContext,
    descriptor?: CapabilityDescriptor
  ): Promise<WorkerResult> {
    const financialData = inputs.financial_data ?? context.getData(ContextKeys.FINANCIAL_DATA);
    if (financialData === undefined) {
      return this.failure("Missing 'financial_data' in step inputs and shared context");
    }

    const [plugin, fn] = splitSkillName(this.capability(descriptor)?.skillName ?? DEFAULT_SKILL);
    let report: unknown;
    try {
      report = await this.services.skills.invoke(plugin, fn, {
        financial_data: financialData,
        rounding_precision: inputs.rounding_precision ?? 2,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.failure(`Error invoking skill '${plugin}.${fn}': ${message}`);
    }
    if (!isRatioReport(report)) {
      return this.failure(`Skill '${plugin}.${fn}' returned an unexpected result`);
    }

    context.setData(ContextKeys.CALCULATED_RATIOS, report.calculated_ratios);

    const delivery = await this.delegate(
      REPORT_PEER,
      `Analysis results for: ${task}`,
      {
        from: this.name,
        analysis_results: {
          summary: `Analysis by ${this.name} for task '${task}' (CACM ${context.cacmId})`,
          ratios: report.calculated_ratios,
          errors: report.errors,
        },
      },
      context
    );

    const warnings = [...report.errors];
    if (delivery.status === "error") {
      warnings.push(`Results were not delivered to '${REPORT_PEER}': ${delivery.message}`);
    }

    const payload = { ratios: report.calculated_ratios, errors: report.errors };
    if (warnings.length > 0) {
      return this.partial(payload, warnings, "Financial ratios calculated with warnings");
    }
    return this.success(payload, "Financial ratios calculated");
  }
}
