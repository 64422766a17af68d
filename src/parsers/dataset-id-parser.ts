/**
 * Dataset identifier parsing
 *
 * - Composite registry identifiers of the form `master_id.vN|data_node`
 * - Command-line request specs (`name` or `name#N`)
 * - Request lists from an Excel/CSV tab with 'Dataset' and 'Version' columns
 */

import * as fs from 'fs';
import * as XLSX from 'xlsx';
import { ALL_VERSIONS } from '../config/types.js';
import type { DatasetRequest } from '../config/types.js';
import { cleanString, parseInteger } from '../utils/cell-parsers.js';

export interface CompositeId {
  name: string;
  version?: number;
  dataNode?: string;
}

export interface DatasetRequestParseResult {
  requests: DatasetRequest[];
  errors: string[];
}

/**
 * Split `master_id.vN|data_node` into its parts. The version segment and data node are
 * both optional; a trailing segment that is not `vN` stays part of the name.
 */
export function parseCompositeId(identifier: string): CompositeId {
  const pipe = identifier.indexOf('|');
  const masterVersion = pipe === -1 ? identifier : identifier.slice(0, pipe);
  const dataNode = pipe === -1 ? undefined : cleanString(identifier.slice(pipe + 1));

  const match = /^(.+)\.v(\d+)$/.exec(masterVersion);
  if (!match) {
    return { name: masterVersion, dataNode };
  }
  return { name: match[1], version: Number(match[2]), dataNode };
}

/**
 * Parse a positional request: `name` targets `defaultVersion`, `name#N` targets version N.
 */
export function parseRequestSpec(spec: string, defaultVersion: number = ALL_VERSIONS): DatasetRequest {
  const hash = spec.lastIndexOf('#');
  if (hash === -1) {
    return { identifier: spec.trim(), version: defaultVersion };
  }

  const identifier = spec.slice(0, hash).trim();
  const versionStr = spec.slice(hash + 1).trim();
  if (!identifier || !/^-?\d+$/.test(versionStr)) {
    throw new Error(`Invalid dataset request "${spec}". Expected <name> or <name>#<version>.`);
  }
  return { identifier, version: Number(versionStr) };
}

/**
 * Find a column value by header name, ignoring a BOM on the first CSV header and case.
 */
function getColumnValue(row: Record<string, unknown>, headerName: string): unknown {
  if (headerName in row) return row[headerName];

  const wanted = headerName.toLowerCase();
  for (const key of Object.keys(row)) {
    if (key.replace(/^\uFEFF/, '').trim().toLowerCase() === wanted) return row[key];
  }

  return undefined;
}

function cellToString(value: unknown): string | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  return cleanString(String(value));
}

/**
 * Validate rows already read from a sheet. Row numbers in errors count the header as row 1.
 *
 * - Blank rows are skipped
 * - A blank Version means every version
 * - A dataset listed twice is rejected, whatever the versions, since each run resolves one
 *   version per dataset
 */
export function parseDatasetRequestRows(rows: Record<string, unknown>[]): DatasetRequestParseResult {
  const requests: DatasetRequest[] = [];
  const errors: string[] = [];
  const seenOnRow = new Map<string, number>();

  for (let i = 0; i < rows.length; i++) {
    const rowNum = i + 2;
    const identifier = cellToString(getColumnValue(rows[i], 'Dataset'));
    const versionStr = cellToString(getColumnValue(rows[i], 'Version'));

    if (!identifier && !versionStr) continue;

    if (!identifier) {
      errors.push(`Row ${rowNum}: Missing Dataset`);
      continue;
    }

    let version = ALL_VERSIONS;
    if (versionStr) {
      const parsed = parseInteger(versionStr);
      if (parsed === undefined) {
        errors.push(`Row ${rowNum}: "${versionStr}" is not a valid version (expected an integer)`);
        continue;
      }
      version = parsed;
    }

    const firstRow = seenOnRow.get(identifier);
    if (firstRow !== undefined) {
      errors.push(`Row ${rowNum}: Duplicate request for "${identifier}" (already requested on row ${firstRow})`);
      continue;
    }
    seenOnRow.set(identifier, rowNum);
    requests.push({ identifier, version });
  }

  return { requests, errors };
}

/**
 * Read dataset requests from a tab of an Excel or CSV file.
 */
export function parseDatasetRequests(filePath: string, tabName: string): DatasetRequestParseResult {
  const workbook = XLSX.read(fs.readFileSync(filePath), { type: 'buffer' });
  // CSV workbooks have a single sheet whatever the tab name
  const sheet = workbook.Sheets[tabName] ?? (workbook.SheetNames.length === 1 ? workbook.Sheets[workbook.SheetNames[0]] : undefined);

  if (!sheet) {
    return { requests: [], errors: [`Tab "${tabName}" not found in workbook`] };
  }

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' });
  if (rows.length === 0) {
    return { requests: [], errors: ['No data rows found (only header row or empty tab)'] };
  }

  return parseDatasetRequestRows(rows);
}
