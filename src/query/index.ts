export {
  QueryService,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  DEFAULT_TOP_COST,
  type InteractionQuery,
  type InteractionSummary,
  type InteractionPage,
  type InteractionDetail,
  type AuditSummary,
  type ComplianceReport
} from './service.js';
export {
  enforcementStats,
  riskTrends,
  policyHistory,
  type TimeRange,
  type EnforcementStats,
  type RiskTrends,
  type CategoryTrend,
  type PolicyRevisionSummary,
  type ThresholdChange
} from './reports.js';
