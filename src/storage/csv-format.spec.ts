import {
  CSV_HEADER,
  formatCsvField,
  formatCsvLine,
  isSeriesSourceName,
  sourceNameForPeer,
} from './csv-format';

describe('csv-format', () => {
  it('should use the Date,Peer ID,Balance header', () => {
    expect(CSV_HEADER).toBe('Date,Peer ID,Balance');
  });

  it('should name a peer series node_balance_<peer>.csv', () => {
    expect(sourceNameForPeer('QmPeer1')).toBe('node_balance_QmPeer1.csv');
  });

  describe('isSeriesSourceName', () => {
    it.each([
      ['node_balance_A.csv', true],
      ['combined.csv', true],
      ['.node_balance_A.csv', false],
      ['node_balance_A.csv.tmp', false],
      ['README.md', false],
    ])('%s -> %s', (name, expected) => {
      expect(isSeriesSourceName(name)).toBe(expected);
    });
  });

  describe('formatCsvField', () => {
    it('should leave plain values untouched', () => {
      expect(formatCsvField('12.3 QUIL')).toBe('12.3 QUIL');
    });

    it('should quote values with a comma', () => {
      expect(formatCsvField('1,5')).toBe('"1,5"');
    });

    it('should double embedded quotes', () => {
      expect(formatCsvField('say "hi"')).toBe('"say ""hi"""');
    });

    it('should quote values with a line break', () => {
      expect(formatCsvField('a\nb')).toBe('"a\nb"');
    });
  });

  it('should render a record as timestamp,peer,balance with a trailing newline', () => {
    expect(
      formatCsvLine({ peerId: 'A', timestamp: '2025-10-01T10:00:00Z', balance: '5' }),
    ).toBe('2025-10-01T10:00:00Z,A,5\n');
  });
});
