/**
 * src/modules/render/pdf/render-report-pdf.ts
 *
 * WHY:
 * - Turns a finished ReportDataset into PDF bytes.
 *
 * PAGE ORDER:
 * - summary (+ storage chart), one usage page per partition, member table pages.
 */

import { PDFDocument } from 'pdf-lib';
import type { ReportDataset } from '../../report';
import { embedFonts } from './fonts';
import { renderSummaryPage, renderTablePage, renderUsagePage } from './pages';

export async function renderReportPdf(dataset: ReportDataset): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  const fonts = await embedFonts(pdf);

  pdf.setTitle(`Resource usage report: ${dataset.groupId}`);
  pdf.setSubject(`${dataset.period.start} to ${dataset.period.end}`);
  pdf.setCreator('group-usage-report');
  pdf.setCreationDate(new Date(dataset.generatedAt));

  renderSummaryPage(pdf, fonts, dataset);

  for (const partition of dataset.partitions) {
    renderUsagePage(pdf, fonts, dataset, partition);
  }

  dataset.pages.forEach((rows, index) => {
    renderTablePage(pdf, fonts, dataset, rows, index + 1, dataset.pages.length);
  });

  return pdf.save();
}
