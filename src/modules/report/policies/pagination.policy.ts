/**
 * src/modules/report/policies/pagination.policy.ts
 *
 * WHY:
 * - The member table is long; renderers get it pre-split into fixed-size pages.
 *
 * RULES:
 * - Sections in order PRIMARY, SECONDARY, OTHER; each sorted by username;
 *   empty sections are omitted; each section starts with one header row.
 * - A header row uses one row of the page budget.
 * - Concatenating the pages gives back the flat row sequence unchanged.
 * - No rows → no pages.
 */

import {
  SECTION_LABELS,
  type HeaderPolicy,
  type Page,
  type Section,
  type SectionLabel,
  type TableRow,
  type UserRecord,
} from '../report.types';
import { sortByUsername } from '../helpers/by-username';

function sectionOf(record: UserRecord): SectionLabel {
  if (record.affiliation === 'primary') return 'PRIMARY';
  if (record.affiliation === 'secondary') return 'SECONDARY';
  return 'OTHER';
}

export function groupByAffiliation(records: readonly UserRecord[]): Section[] {
  return SECTION_LABELS.map((label) => ({
    label,
    records: sortByUsername(records.filter((r) => sectionOf(r) === label)),
  })).filter((s) => s.records.length > 0);
}

export function flattenSections(sections: readonly Section[]): TableRow[] {
  const rows: TableRow[] = [];
  for (const section of sections) {
    rows.push({ kind: 'section', label: section.label });
    for (const record of section.records) {
      rows.push({ kind: 'member', record });
    }
  }
  return rows;
}

export function splitIntoPages(
  rows: readonly TableRow[],
  pageSize: number,
  headerPolicy: HeaderPolicy = 'flow',
): Page[] {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`page size must be a positive integer, got ${pageSize}`);
  }

  // With one row per page a header can never share a page with its first member.
  const keepWithNext = headerPolicy === 'keep-with-next' && pageSize >= 2;

  const pages: Page[] = [];
  let current: Page = [];

  rows.forEach((row, index) => {
    if (current.length === pageSize) {
      pages.push(current);
      current = [];
    }

    const wouldEndPage = current.length === pageSize - 1;
    const hasNext = index < rows.length - 1;
    if (keepWithNext && row.kind === 'section' && wouldEndPage && hasNext) {
      pages.push(current);
      current = [];
    }

    current.push(row);
  });

  if (current.length > 0) pages.push(current);

  return pages;
}

export function paginate(
  records: readonly UserRecord[],
  pageSize: number,
  headerPolicy: HeaderPolicy = 'flow',
): Page[] {
  return splitIntoPages(flattenSections(groupByAffiliation(records)), pageSize, headerPolicy);
}
