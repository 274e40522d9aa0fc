/**
 * Built-in skills: basic calculations and financial ratios.
 *
 * @module execution/skills/native-skills
 */

import { NativeSkillService, type SkillArguments } from "./skill-service.js";

export const BASIC_CALCULATIONS = "BasicCalculations";
export const FINANCIAL_ANALYSIS = "FinancialAnalysis";

export type ScoreOperator = ">" | "<" | ">=" | "<=" | "==" | "!=";

export interface RatioReport {
  calculated_ratios: Record<string, number>;
  errors: string[];
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function requireNumber(value: unknown, label: string): number {
  if (!isNumber(value)) {
    throw new TypeError(`${label} must be a number, got ${typeName(value)}`);
  }
  return value;
}

export function roundTo(value: number, precision: number): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

export function calculateRatio(numerator: unknown, denominator: unknown): number {
  const n = requireNumber(numerator, "Numerator");
  const d = requireNumber(denominator, "Denominator");
  if (d === 0) {
    throw new RangeError("Denominator cannot be zero.");
  }
  return n / d;
}

export function simpleScorer(
  financialMetric: unknown,
  threshold: unknown,
  operator: unknown = ">"
): string {
  const metric = requireNumber(financialMetric, "Financial metric");
  const limit = requireNumber(threshold, "Threshold");
  const op = typeof operator === "string" ? operator.trim() : operator;

  switch (op) {
    case ">":
      return metric > limit ? "Above Threshold" : "Below or Equal to Threshold";
    case "<":
      return metric < limit ? "Below Threshold" : "Above or Equal to Threshold";
    case ">=":
      return metric >= limit ? "Meets or Exceeds Threshold" : "Below Threshold";
    case "<=":
      return metric <= limit ? "Below or Meets Threshold" : "Exceeds Threshold";
    case "==":
      return metric === limit ? "Equals Threshold" : "Does Not Equal Threshold";
    case "!=":
      return metric !== limit ? "Does Not Equal Threshold" : "Equals Threshold";
    default:
      throw new RangeError(
        `Unsupported operator '${String(op)}'. Supported operators are '>', '<', '>=', '<=', '==', '!='.`
      );
  }
}

const REQUIRED_KEYS: ReadonlyArray<[key: string, ratio: string]> = [
  ["current_assets", "Current Ratio"],
  ["current_liabilities", "Current Ratio"],
  ["total_debt", "Debt-to-Equity Ratio"],
  ["total_equity", "Debt-to-Equity Ratio"],
];

interface OptionalRatio {
  key: string;
  label: string;
  numerator: string;
  denominator: string;
  denominatorLabel: string;
  percent: boolean;
}

/** Computed only when every key they need is present and numeric */
const OPTIONAL_RATIOS: readonly OptionalRatio[] = [
  {
    key: "gross_profit_margin_pct",
    label: "Gross Profit Margin",
    numerator: "gross_profit",
    denominator: "revenue",
    denominatorLabel: "Revenue",
    percent: true,
  },
  {
    key: "net_profit_margin_pct",
    label: "Net Profit Margin",
    numerator: "net_income",
    denominator: "revenue",
    denominatorLabel: "Revenue",
    percent: true,
  },
  {
    key: "return_on_assets_pct",
    label: "Return on Assets",
    numerator: "net_income",
    denominator: "total_assets",
    denominatorLabel: "Total Assets",
    percent: true,
  },
  {
    key: "return_on_equity_pct",
    label: "Return on Equity",
    numerator: "net_income",
    denominator: "total_equity",
    denominatorLabel: "Total Equity",
    percent: true,
  },
  {
    key: "debt_ratio",
    label: "Debt Ratio",
    numerator: "total_debt",
    denominator: "total_assets",
    denominatorLabel: "Total Assets",
    percent: false,
  },
];

/**
 * Current ratio and debt-to-equity, plus margin and return ratios when the
 * data carries them. Input problems are reported in `errors`; nothing throws.
 */
export function calculateBasicRatios(
  financialData: unknown,
  roundingPrecision: unknown = 2
): RatioReport {
  const precision = isNumber(roundingPrecision) ? Math.max(0, Math.trunc(roundingPrecision)) : 2;
  const errors: string[] = [];

  if (typeof financialData !== "object" || financialData === null || Array.isArray(financialData)) {
    return {
      calculated_ratios: {},
      errors: [`financial_data must be an object, got ${typeName(financialData)}.`],
    };
  }
  const data = new Map<string, unknown>(Object.entries(financialData));

  for (const [key, ratio] of REQUIRED_KEYS) {
    if (!data.has(key)) {
      errors.push(`Missing required financial data key: ${key} (for ${ratio})`);
    }
  }
  for (const [key] of REQUIRED_KEYS) {
    if (data.has(key) && !isNumber(data.get(key))) {
      errors.push(`Invalid type for ${key}: expected numeric, got ${typeName(data.get(key))}.`);
    }
  }
  if (errors.length > 0) {
    return { calculated_ratios: {}, errors };
  }

  const num = (key: string): number | undefined => {
    const value = data.get(key);
    return isNumber(value) ? value : undefined;
  };

  const ratios: Record<string, number> = {};

  const currentAssets = num("current_assets") ?? 0;
  const currentLiabilities = num("current_liabilities") ?? 0;
  if (currentLiabilities === 0) {
    errors.push("Cannot calculate Current Ratio: Current Liabilities is zero.");
  } else {
    ratios.current_ratio = roundTo(currentAssets / currentLiabilities, precision);
  }

  const totalDebt = num("total_debt") ?? 0;
  const totalEquity = num("total_equity") ?? 0;
  if (totalEquity === 0) {
    errors.push("Cannot calculate Debt-to-Equity Ratio: Total Equity is zero.");
  } else {
    ratios.debt_to_equity_ratio = roundTo(totalDebt / totalEquity, precision);
  }

  for (const ratio of OPTIONAL_RATIOS) {
    const numerator = num(ratio.numerator);
    const denominator = num(ratio.denominator);
    if (numerator === undefined || denominator === undefined) {
      continue;
    }
    if (denominator === 0) {
      // Total Equity at zero is already reported above
      if (ratio.denominator !== "total_equity") {
        errors.push(`Cannot calculate ${ratio.label}: ${ratio.denominatorLabel} is zero.`);
      }
      continue;
    }
    const value = numerator / denominator;
    ratios[ratio.key] = roundTo(ratio.percent ? value * 100 : value, precision);
  }

  return { calculated_ratios: ratios, errors };
}

/**
 * A skill service with the built-in plugins registered.
 */
export function createNativeSkillService(): NativeSkillService {
  return new NativeSkillService()
    .register(BASIC_CALCULATIONS, {
      calculate_ratio: (args: SkillArguments) => calculateRatio(args.numerator, args.denominator),
      simple_scorer: (args: SkillArguments) =>
        simpleScorer(args.financial_metric, args.threshold, args.operator ?? ">"),
    })
    .register(FINANCIAL_ANALYSIS, {
      calculate_basic_ratios: (args: SkillArguments) =>
        calculateBasicRatios(args.financial_data, args.rounding_precision ?? 2),
    });
}
