/**
 * CSV record reader
 *
 * RFC 4180 subset: comma separator, double-quoted fields with `""` escapes,
 * quoted line breaks, LF / CRLF / CR record endings. Blank lines are skipped.
 */

import { ParseError } from '../core/errors.js';

export interface CsvRecord {
  /** 1-based line on which the record starts */
  readonly line: number;
  readonly fields: readonly string[];
}

export function parseCsvRecords(content: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let quoteLine = 1;

  const endRecord = (): void => {
    fields.push(current);
    const blank = fields.length === 1 && fields[0]?.trim() === '';
    if (!blank) {
      records.push({ line: recordLine, fields });
    }
    fields = [];
    current = '';
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n' || (char === '\r' && content[i + 1] !== '\n')) line++;
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      quoteLine = line;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else if (char === '\r' || char === '\n') {
      if (char === '\r' && content[i + 1] === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      current += char;
    }
  }

  if (inQuotes) {
    throw new ParseError(`Unterminated quoted field starting on line ${quoteLine}`);
  }
  if (current !== '' || fields.length > 0) {
    endRecord();
  }

  return records;
}
