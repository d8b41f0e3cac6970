/**
 * src/modules/render/pdf/bar-chart.ts
 *
 * Horizontal bar chart for TopNEntry lists. Bars scale to the largest value;
 * the rollup bar is drawn in a neutral colour.
 */

import type { PDFPage } from 'pdf-lib';
import type { TopNEntry } from '../../report';
import { BODY_SIZE, THEME } from '../render.constants';
import { fitText } from '../helpers/format';
import type { FontSet } from './fonts';

export type ChartBox = { x: number; y: number; width: number; height: number };

const LABEL_WIDTH = 110;
const VALUE_WIDTH = 70;
const MAX_BAR_HEIGHT = 22;

export function drawBarChart(
  page: PDFPage,
  fonts: FontSet,
  input: {
    entries: readonly TopNEntry[];
    box: ChartBox;
    formatValue: (value: number) => string;
  },
): void {
  const { entries, box } = input;

  if (entries.length === 0) {
    page.drawText('No data for this period.', {
      x: box.x,
      y: box.y + box.height - BODY_SIZE * 2,
      size: BODY_SIZE,
      font: fonts.regular,
      color: THEME.muted,
    });
    return;
  }

  const slot = Math.min(box.height / entries.length, MAX_BAR_HEIGHT + 6);
  const barHeight = slot - 6;
  const barArea = box.width - LABEL_WIDTH - VALUE_WIDTH;
  const max = Math.max(...entries.map((e) => e.value));

  entries.forEach((entry, index) => {
    const top = box.y + box.height - index * slot;
    const barY = top - barHeight;
    const textY = barY + (barHeight - BODY_SIZE) / 2 + 1;
    const width = max > 0 ? (entry.value / max) * barArea : 0;

    page.drawText(fitText(entry.label, fonts.regular, BODY_SIZE, LABEL_WIDTH - 8), {
      x: box.x,
      y: textY,
      size: BODY_SIZE,
      font: entry.isRollup ? fonts.bold : fonts.regular,
      color: THEME.ink,
    });

    if (width > 0) {
      page.drawRectangle({
        x: box.x + LABEL_WIDTH,
        y: barY,
        width,
        height: barHeight,
        color: entry.isRollup ? THEME.rollup : THEME.bar,
      });
    }

    page.drawText(input.formatValue(entry.value), {
      x: box.x + LABEL_WIDTH + width + 6,
      y: textY,
      size: BODY_SIZE,
      font: fonts.regular,
      color: THEME.ink,
    });
  });
}
