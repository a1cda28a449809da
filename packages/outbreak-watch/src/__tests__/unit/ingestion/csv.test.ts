import { describe, it, expect } from 'vitest';
import { parseCsvRecords } from '../../../ingestion/csv.js';
import { ParseError } from '../../../core/errors.js';

describe('parseCsvRecords', () => {
  it('should split records and fields with their starting line', () => {
    expect(parseCsvRecords('a,b\r\n1,2\n3,4')).toEqual([
      { line: 1, fields: ['a', 'b'] },
      { line: 2, fields: ['1', '2'] },
      { line: 3, fields: ['3', '4'] },
    ]);
  });

  it('should unescape quoted fields including separators and line breaks', () => {
    const records = parseCsvRecords('name,note\n"Korea, South","say ""hi""\nagain"\nnext,row\n');
    expect(records).toEqual([
      { line: 1, fields: ['name', 'note'] },
      { line: 2, fields: ['Korea, South', 'say "hi"\nagain'] },
      { line: 4, fields: ['next', 'row'] },
    ]);
  });

  it('should keep empty fields and skip blank lines', () => {
    expect(parseCsvRecords('a,,c\n\n,\n')).toEqual([
      { line: 1, fields: ['a', '', 'c'] },
      { line: 3, fields: ['', ''] },
    ]);
  });

  it('should reject an unterminated quote', () => {
    expect(() => parseCsvRecords('a,b\n"open,1\n')).toThrow(ParseError);
    expect(() => parseCsvRecords('a,b\n"open,1\n')).toThrow(
      'Unterminated quoted field starting on line 2'
    );
  });
});
