/**
 * src/modules/render/pdf/pages.ts
 *
 * WHY:
 * - One function per page kind: summary, partition usage, member table.
 *
 * RULES:
 * - Read the dataset only; never re-sort or re-paginate here.
 * - All user-supplied text goes through fitText/sanitizeText.
 * - A table page never holds more than TABLE_ROWS_PER_PAGE rows.
 */

import type { PDFDocument, PDFPage } from 'pdf-lib';
import { ACCOUNT_TIERS } from '../../enrichment';
import type { Page, ReportDataset, TableRow } from '../../report';
import {
  BAND_DROP,
  BODY_SIZE,
  CONTENT_WIDTH,
  HEADER_BLOCK,
  HEADING_SIZE,
  MARGIN,
  PAGE_HEIGHT,
  PAGE_WIDTH,
  ROW_HEIGHT,
  TABLE_FIRST_ROW_Y,
  TABLE_ROWS_PER_PAGE,
  THEME,
  TITLE_SIZE,
} from '../render.constants';
import { fitText, formatCoreHours, formatInteger, formatTiers, sanitizeText } from '../helpers/format';
import { drawBarChart } from './bar-chart';
import type { FontSet } from './fonts';

type Column = {
  title: string;
  width: number;
  align: 'left' | 'right';
  cell: (row: Extract<TableRow, { kind: 'member' }>) => string;
};

function addPage(pdf: PDFDocument): PDFPage {
  return pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
}

function drawHeader(page: PDFPage, fonts: FontSet, dataset: ReportDataset, title: string): number {
  const top = PAGE_HEIGHT - MARGIN - TITLE_SIZE;
  page.drawText(sanitizeText(title), {
    x: MARGIN,
    y: top,
    size: TITLE_SIZE,
    font: fonts.bold,
    color: THEME.ink,
  });
  page.drawText(
    sanitizeText(`Group ${dataset.groupId}  |  ${dataset.period.start} to ${dataset.period.end}`),
    { x: MARGIN, y: top - 16, size: BODY_SIZE, font: fonts.regular, color: THEME.muted },
  );
  page.drawLine({
    start: { x: MARGIN, y: top - 24 },
    end: { x: PAGE_WIDTH - MARGIN, y: top - 24 },
    thickness: 0.75,
    color: THEME.line,
  });
  return top - HEADER_BLOCK;
}

function drawKeyValues(
  page: PDFPage,
  fonts: FontSet,
  heading: string,
  pairs: Array<[string, string]>,
  x: number,
  y: number,
): number {
  page.drawText(heading, { x, y, size: HEADING_SIZE, font: fonts.bold, color: THEME.ink });
  let cursor = y - 18;
  for (const [key, value] of pairs) {
    page.drawText(key, { x, y: cursor, size: BODY_SIZE, font: fonts.regular, color: THEME.muted });
    page.drawText(value, {
      x: x + 130,
      y: cursor,
      size: BODY_SIZE,
      font: fonts.bold,
      color: THEME.ink,
    });
    cursor -= 14;
  }
  return cursor;
}

export function renderSummaryPage(pdf: PDFDocument, fonts: FontSet, dataset: ReportDataset): void {
  const page = addPage(pdf);
  const y = drawHeader(page, fonts, dataset, 'Group Resource Usage Report');
  const { members, tiers, storage } = dataset.summary;
  const column = CONTENT_WIDTH / 3;

  const membersPairs: Array<[string, string]> = [
    ['Primary members', formatInteger(members.primary)],
    ['Secondary members', formatInteger(members.secondary)],
    ['Total members', formatInteger(members.total)],
  ];
  if (members.unknown > 0) {
    membersPairs.push(['Unclassified', formatInteger(members.unknown)]);
  }
  drawKeyValues(page, fonts, 'Membership', membersPairs, MARGIN, y);

  drawKeyValues(
    page,
    fonts,
    'Account tiers (primary members)',
    ACCOUNT_TIERS.map((tier): [string, string] => [tier, formatInteger(tiers[tier])]),
    MARGIN + column,
    y,
  );

  const storageBottom = drawKeyValues(
    page,
    fonts,
    'Storage (GB)',
    [
      ['Allocation', formatInteger(storage.allocationGB)],
      ['Used', formatInteger(storage.usedGB)],
      ['Available', formatInteger(storage.availableGB)],
    ],
    MARGIN + column * 2,
    y,
  );

  const chartTop = Math.min(storageBottom, y - 18 * 7) - 20;
  page.drawText('Top storage consumers (GB)', {
    x: MARGIN,
    y: chartTop,
    size: HEADING_SIZE,
    font: fonts.bold,
    color: THEME.ink,
  });
  drawBarChart(page, fonts, {
    entries: dataset.storageTop,
    box: { x: MARGIN, y: MARGIN, width: CONTENT_WIDTH, height: chartTop - MARGIN - 12 },
    formatValue: formatInteger,
  });
}

export function renderUsagePage(
  pdf: PDFDocument,
  fonts: FontSet,
  dataset: ReportDataset,
  partition: string,
): void {
  const page = addPage(pdf);
  const y = drawHeader(page, fonts, dataset, `Partition usage: ${partition}`);
  const totals = dataset.summary.usageByPartition[partition] ?? { jobCount: 0, cpuHours: 0 };

  const bottom = drawKeyValues(
    page,
    fonts,
    'Primary members',
    [
      ['Completed jobs', formatInteger(totals.jobCount)],
      ['CPU time (core-hours)', formatCoreHours(totals.cpuHours)],
    ],
    MARGIN,
    y,
  );

  const chartTop = bottom - 20;
  page.drawText('Top users by CPU time (core-hours)', {
    x: MARGIN,
    y: chartTop,
    size: HEADING_SIZE,
    font: fonts.bold,
    color: THEME.ink,
  });
  drawBarChart(page, fonts, {
    entries: dataset.usageTop[partition] ?? [],
    box: { x: MARGIN, y: MARGIN, width: CONTENT_WIDTH, height: chartTop - MARGIN - 12 },
    formatValue: formatCoreHours,
  });
}

function buildColumns(partitions: readonly string[]): Column[] {
  const fixed: Column[] = [
    { title: 'Username', width: 65, align: 'left', cell: (r) => r.record.username },
    { title: 'Name', width: 105, align: 'left', cell: (r) => r.record.name },
    { title: 'Email', width: 140, align: 'left', cell: (r) => r.record.email },
    { title: 'Tiers', width: 95, align: 'left', cell: (r) => formatTiers(r.record.accountTiers) },
    {
      title: 'Storage GB',
      width: 50,
      align: 'right',
      cell: (r) => formatInteger(r.record.storageGB),
    },
  ];

  const used = fixed.reduce((sum, c) => sum + c.width, 0);
  const perPartition = partitions.length > 0 ? (CONTENT_WIDTH - used) / partitions.length : 0;

  const usage = partitions.flatMap((partition): Column[] => [
    {
      title: `${partition} jobs`,
      width: perPartition * 0.4,
      align: 'right',
      cell: (r) => formatInteger(r.record.usageByPartition[partition]?.jobCount ?? 0),
    },
    {
      title: `${partition} core-hrs`,
      width: perPartition * 0.6,
      align: 'right',
      cell: (r) => formatCoreHours(r.record.usageByPartition[partition]?.cpuHours ?? 0),
    },
  ]);

  return [...fixed, ...usage];
}

function drawCell(
  page: PDFPage,
  fonts: FontSet,
  text: string,
  column: Column,
  x: number,
  y: number,
  bold: boolean,
): void {
  const font = bold ? fonts.bold : fonts.regular;
  const value = fitText(text, font, BODY_SIZE, column.width - 6);
  const offset =
    column.align === 'right' ? column.width - 4 - font.widthOfTextAtSize(value, BODY_SIZE) : 2;
  page.drawText(value, { x: x + offset, y, size: BODY_SIZE, font, color: THEME.ink });
}

export function renderTablePage(
  pdf: PDFDocument,
  fonts: FontSet,
  dataset: ReportDataset,
  rows: Page,
  pageNumber: number,
  pageCount: number,
): void {
  if (rows.length > TABLE_ROWS_PER_PAGE) {
    throw new RangeError(
      `a member table page holds at most ${TABLE_ROWS_PER_PAGE} rows, got ${rows.length}`,
    );
  }

  const page = addPage(pdf);
  const headerY = drawHeader(page, fonts, dataset, `Group members (${pageNumber} of ${pageCount})`);
  const columns = buildColumns(dataset.partitions);

  let x = MARGIN;
  for (const column of columns) {
    drawCell(page, fonts, column.title, column, x, headerY, true);
    x += column.width;
  }
  page.drawLine({
    start: { x: MARGIN, y: headerY - 6 },
    end: { x: PAGE_WIDTH - MARGIN, y: headerY - 6 },
    thickness: 0.75,
    color: THEME.line,
  });

  let y = TABLE_FIRST_ROW_Y;

  for (const row of rows) {
    if (row.kind === 'section') {
      page.drawRectangle({
        x: MARGIN,
        y: y - BAND_DROP,
        width: CONTENT_WIDTH,
        height: ROW_HEIGHT - 2,
        color: THEME.band,
      });
      page.drawText(row.label, {
        x: MARGIN + 2,
        y,
        size: BODY_SIZE,
        font: fonts.bold,
        color: THEME.ink,
      });
    } else {
      x = MARGIN;
      for (const column of columns) {
        drawCell(page, fonts, column.cell(row), column, x, y, false);
        x += column.width;
      }
    }
    y -= ROW_HEIGHT;
  }
}
