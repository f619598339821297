import * as path from 'path';
import {
  loadPositionsFile,
  parseCsvRecords,
  parsePositionsCsv,
} from '../../engine/positionLoader';
import { PositionFileError } from '../../utils/errors';
import {
  POSITIONS_2020_PATH,
  POSITIONS_SHORT_PATH,
  buildPositionsCsv,
  positions2020Csv,
  shortPositionsCsv,
} from '../fixtures/positions';

describe('parseCsvRecords', () => {
  it('should keep quoted values containing commas intact', () => {
    const records = parseCsvRecords('a,"$1,000.00",c\n');
    expect(records).toEqual([['a', '$1,000.00', 'c']]);
  });

  it('should skip empty lines', () => {
    expect(parseCsvRecords('a,b\n\nc,d\n\n')).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
  });
});

describe('parsePositionsCsv', () => {
  it('should read the three tracked funds and skip the money market row', () => {
    const snapshot = parsePositionsCsv(positions2020Csv, 'Positions_2020.csv');

    expect(snapshot.label).toBe('Positions_2020.csv');
    expect(snapshot.positions.bond).toEqual({ symbol: 'FXNAX', currentBalance: 1000 });
    expect(snapshot.positions.international).toEqual({ symbol: 'FZILX', currentBalance: 2000 });
    expect(snapshot.positions.national).toEqual({ symbol: 'FZROX', currentBalance: 3000 });
  });

  it('should parse cents and thousands separators', () => {
    const snapshot = parsePositionsCsv(
      buildPositionsCsv(['$12,345.67', '$0.99', '$1,000,000.00']),
      'x.csv'
    );
    expect(snapshot.positions.bond.currentBalance).toBe(12345.67);
    expect(snapshot.positions.international.currentBalance).toBe(0.99);
    expect(snapshot.positions.national.currentBalance).toBe(1000000);
  });

  it('should return a frozen snapshot', () => {
    const snapshot = parsePositionsCsv(positions2020Csv, 'Positions_2020.csv');
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.positions.bond)).toBe(true);
  });

  it('should throw PositionFileError for fewer than five rows', () => {
    expect(() => parsePositionsCsv(shortPositionsCsv, 'short.csv')).toThrow(PositionFileError);
    expect(() => parsePositionsCsv(shortPositionsCsv, 'short.csv')).toThrow(
      'Expected at least 5 rows, found 3'
    );
  });

  it('should throw PositionFileError for empty input', () => {
    expect(() => parsePositionsCsv('', 'empty.csv')).toThrow(PositionFileError);
  });

  it('should throw PositionFileError for a non-numeric balance', () => {
    const csv = buildPositionsCsv(['$100.00', 'pending', '$100.00']);
    expect(() => parsePositionsCsv(csv, 'x.csv')).toThrow('Row 3 has a non-numeric value "pending"');
  });

  it('should throw PositionFileError when the value column is missing', () => {
    const csv = ['h', 'a,b', 'a,FXNAX', 'a,FZILX', 'a,FZROX'].join('\n');
    expect(() => parsePositionsCsv(csv, 'x.csv')).toThrow('Row 2 has no value in column 6');
  });

  it('should throw PositionFileError when the symbol is blank', () => {
    const csv = ['h', 'a,b', 'a, ,,,,,$1', 'a,FZILX,,,,,$1', 'a,FZROX,,,,,$1'].join('\n');
    expect(() => parsePositionsCsv(csv, 'x.csv')).toThrow('Row 2 has no symbol in column 1');
  });

  it('should carry the user-facing message', () => {
    try {
      parsePositionsCsv('', 'empty.csv');
      throw new Error('expected parsePositionsCsv to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(PositionFileError);
      if (error instanceof PositionFileError) {
        expect(error.userMessage).toBe('you did not enter a csv file');
      }
    }
  });
});

describe('loadPositionsFile', () => {
  it('should label the snapshot with the file name', () => {
    const snapshot = loadPositionsFile(POSITIONS_2020_PATH);
    expect(snapshot.label).toBe('Positions_2020.csv');
    expect(snapshot.positions.national.currentBalance).toBe(3000);
  });

  it('should throw PositionFileError for a missing file', () => {
    const missing = path.join(__dirname, 'does-not-exist.csv');
    expect(() => loadPositionsFile(missing)).toThrow(PositionFileError);
  });

  it('should throw PositionFileError for a short file', () => {
    expect(() => loadPositionsFile(POSITIONS_SHORT_PATH)).toThrow(PositionFileError);
  });
});
