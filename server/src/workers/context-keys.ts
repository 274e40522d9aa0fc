/**
 * Shared-context data store keys used by the built-in workers
 */
export const ContextKeys = {
  COMPANY_NAME: "company_name",
  COMPANY_TICKER: "company_ticker",
  COMPANY_OVERVIEW: "structured_financials_for_summary",
  RISK_FACTORS: "risk_factors_section_text",
  FINANCIAL_DATA: "financial_data_for_ratios",
  CALCULATED_RATIOS: "calculated_key_ratios",
} as const;

export type ContextKey = (typeof ContextKeys)[keyof typeof ContextKeys];
