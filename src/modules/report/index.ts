/**
 * src/modules/report/index.ts
 *
 * Public surface of the report module.
 */

export { ReportService } from './report.service';
export type { ReportOptions } from './flows/generate-report-flow';
export { mergeDataset, findStaleUsernames } from './use-cases/merge-dataset';
export { summarize } from './policies/summary.policy';
export { rankTopN, topStorageConsumers, topUsageConsumers } from './policies/top-n.policy';
export {
  flattenSections,
  groupByAffiliation,
  paginate,
  splitIntoPages,
} from './policies/pagination.policy';
export { EMPTY_TIERS_PLACEHOLDER, ROLLUP_LABEL } from './report.constants';
export { HEADER_POLICIES, SECTION_LABELS } from './report.types';
export type {
  GroupSummary,
  HeaderPolicy,
  Page,
  ReportDataset,
  Section,
  TableRow,
  TopNEntry,
  UserRecord,
} from './report.types';
