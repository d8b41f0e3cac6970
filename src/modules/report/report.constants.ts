/**
 * src/modules/report/report.constants.ts
 */

export const ROLLUP_LABEL = 'All Others';

export const EMPTY_TIERS_PLACEHOLDER = '-';
