import { describe, it, expect } from 'vitest';
import { formatCSV, formatCSVField, parseCSV } from '../../src/lib/csv';

describe('parseCSV', () => {
  it('should split rows and fields', () => {
    expect(parseCSV('a,b,c\n1,2,3\n')).toEqual([
      ['a', 'b', 'c'],
      ['1', '2', '3'],
    ]);
  });

  it('should handle quoted commas, escaped quotes and newlines inside quotes', () => {
    expect(parseCSV('name,note\n"Smith, J","said ""hi""\nthen left"\n')).toEqual([
      ['name', 'note'],
      ['Smith, J', 'said "hi"\nthen left'],
    ]);
  });

  it('should accept CRLF line endings and a missing final newline', () => {
    expect(parseCSV('a,b\r\n1,2')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('should keep empty fields and blank lines', () => {
    expect(parseCSV('a,,c\n\nd\n')).toEqual([['a', '', 'c'], [''], ['d']]);
  });
});

describe('formatCSV', () => {
  it('should quote only fields that need it', () => {
    expect(formatCSVField('plain')).toBe('plain');
    expect(formatCSVField('a,b')).toBe('"a,b"');
    expect(formatCSVField('say "x"')).toBe('"say ""x"""');
    expect(formatCSVField(null)).toBe('');
    expect(formatCSVField(12.5)).toBe('12.5');
  });

  it('should write one line per row with a trailing newline', () => {
    expect(formatCSV([['id', 'name'], [1, 'Ride, easy']])).toBe('id,name\n1,"Ride, easy"\n');
  });

  it('should read back what it writes', () => {
    const rows = [['x', 'y'], ['with "quotes"', 'multi\nline']];

    expect(parseCSV(formatCSV(rows))).toEqual(rows);
  });
});
