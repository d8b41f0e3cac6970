/**
 * src/modules/render/render.constants.ts
 *
 * US Letter, landscape. Units are PDF points.
 */

import { rgb } from 'pdf-lib';

export const PAGE_WIDTH = 792;
export const PAGE_HEIGHT = 612;
export const MARGIN = 36;
export const CONTENT_WIDTH = PAGE_WIDTH - MARGIN * 2;

export const TITLE_SIZE = 18;
export const HEADING_SIZE = 12;
export const BODY_SIZE = 9;
export const ROW_HEIGHT = 17;

/** Space between the page title baseline and the first content line. */
export const HEADER_BLOCK = 44;
/** Section rows draw a shaded band this far below their text baseline. */
export const BAND_DROP = 4;

/** Baseline of the first table row, below the page header and column titles. */
export const TABLE_FIRST_ROW_Y =
  PAGE_HEIGHT - MARGIN - TITLE_SIZE - HEADER_BLOCK - 6 - (ROW_HEIGHT - 4);

/** Rows (section headers included) that fit on one member-table page. */
export const TABLE_ROWS_PER_PAGE =
  Math.floor((TABLE_FIRST_ROW_Y - BAND_DROP - MARGIN) / ROW_HEIGHT) + 1;

export const THEME = {
  ink: rgb(0.11, 0.16, 0.22),
  muted: rgb(0.4, 0.45, 0.5),
  line: rgb(0.78, 0.82, 0.86),
  band: rgb(0.9, 0.93, 0.96),
  bar: rgb(0.18, 0.44, 0.64),
  rollup: rgb(0.62, 0.66, 0.7),
} as const;
