import * as fs from 'fs';
import * as path from 'path';
import { createHash } from 'crypto';
import { ConfigError } from '../../types/ModelGateErrors';

/**
 * Tabular dataset read from a CSV file. Cell values are kept as strings;
 * encoding into numbers is the job of the FeatureEncoder.
 */
export interface Dataset {
  source: string;
  columns: string[];
  rows: Record<string, string>[];
  /** sha256 of the file contents; identifies the dataset for stored evaluations */
  digest: string;
}

/**
 * Split CSV content into records (RFC 4180 quoting, CRLF or LF line endings)
 */
export function parseCsvRecords(content: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    if (inQuotes) {
      if (char === '"' && content[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') i++;
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // Blank lines
  return records.filter((r) => !(r.length === 1 && r[0] === ''));
}

/**
 * Index columns written by dataframe exports carry no feature data
 */
function isIndexColumn(name: string): boolean {
  return name.trim() === '' || name.startsWith('Unnamed');
}

export function parseDataset(content: string, source: string): Dataset {
  const records = parseCsvRecords(content);
  if (records.length === 0) {
    throw new ConfigError(`Dataset is empty: ${source}`);
  }

  const [header, ...body] = records;
  const kept = header.map((name, index) => ({ name: name.trim(), index })).filter((c) => !isIndexColumn(c.name));

  const rows = body.map((record, line) => {
    if (record.length !== header.length) {
      throw new ConfigError(
        `Dataset row ${line + 2} has ${record.length} fields, expected ${header.length}: ${source}`
      );
    }
    const row: Record<string, string> = {};
    for (const column of kept) {
      row[column.name] = record[column.index].trim();
    }
    return row;
  });

  return {
    source,
    columns: kept.map((c) => c.name),
    rows,
    digest: createHash('sha256').update(content).digest('hex'),
  };
}

/**
 * Load a CSV dataset from disk
 */
export function loadDataset(datasetPath: string): Dataset {
  if (!datasetPath) {
    throw new ConfigError('A dataset path is required');
  }
  if (path.extname(datasetPath).toLowerCase() !== '.csv') {
    throw new ConfigError(`Unsupported dataset format (expected .csv): ${datasetPath}`);
  }
  if (!fs.existsSync(datasetPath)) {
    throw new ConfigError(`Dataset not found: ${datasetPath}`);
  }
  return parseDataset(fs.readFileSync(datasetPath, 'utf-8'), datasetPath);
}
