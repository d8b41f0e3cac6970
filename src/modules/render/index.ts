/**
 * src/modules/render/index.ts
 *
 * Public surface of the render module.
 */

export { renderReportPdf } from './pdf/render-report-pdf';
export { renderTablePage } from './pdf/pages';
export { embedFonts } from './pdf/fonts';
export { MARGIN, TABLE_ROWS_PER_PAGE } from './render.constants';
export { defaultOutputPath, serializeDataset, writeReportFile } from './write-report';
export type { OutputFormat } from './write-report';
export { formatCoreHours, formatInteger, formatTiers, sanitizeText } from './helpers/format';
