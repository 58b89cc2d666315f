/**
 * backend/src/modules/compliance/helpers/parse-roster-csv.ts
 *
 * Reads the HQ member export. The member number column is the first header
 * matching one of MEMBER_NUMBER_HEADERS (trimmed, case-insensitive); every
 * other column is ignored.
 *
 * Row numbers in errors count the header as row 1, as a spreadsheet shows them.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ComplianceErrors } from '../compliance.errors';

export const MEMBER_NUMBER_HEADERS = ['member#', 'member_number', 'member number', 'major_key'];

export type ParsedRosterCsv = {
  memberNumbers: string[];
  rowErrors: string[];
};

const recordsSchema = z.array(z.array(z.string()));

function readRecords(csv: string): string[][] {
  let raw: unknown;
  try {
    raw = parse(csv, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw ComplianceErrors.invalidCsv({ cause: err instanceof Error ? err.message : String(err) });
  }
  return recordsSchema.parse(raw);
}

export function findMemberNumberColumn(headers: readonly string[]): number {
  return headers.findIndex((h) => MEMBER_NUMBER_HEADERS.includes(h.trim().toLowerCase()));
}

export function parseRosterCsv(csv: string): ParsedRosterCsv {
  const [headers, ...rows] = readRecords(csv);
  if (!headers) throw ComplianceErrors.emptyCsv();

  const column = findMemberNumberColumn(headers);
  if (column === -1) throw ComplianceErrors.missingMemberColumn(headers);

  const memberNumbers: string[] = [];
  const rowErrors: string[] = [];

  rows.forEach((row, index) => {
    const value = (row[column] ?? '').trim();
    if (value) memberNumbers.push(value);
    else rowErrors.push(`Row ${index + 2}: Missing member number`);
  });

  return { memberNumbers, rowErrors };
}
