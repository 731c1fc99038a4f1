import { latestPerPeer, roundHalfUp, totalBalance } from './aggregate-summary';
import { Observation } from '../series/series.types';

const at = (peerId: string, iso: string, balance: number): Observation => ({
  peerId,
  timestamp: new Date(iso),
  balance,
});

describe('aggregate-summary', () => {
  describe('roundHalfUp', () => {
    it('should round 1.00005 up to 1.0001', () => {
      expect(roundHalfUp(1.00005, 4)).toBe(1.0001);
    });

    it('should round 0.00005 up to 0.0001', () => {
      expect(roundHalfUp(0.00005, 4)).toBe(0.0001);
    });

    it('should round 1.00004 down to 1', () => {
      expect(roundHalfUp(1.00004, 4)).toBe(1);
    });

    it('should round 2.675 to 2.68 at two decimals', () => {
      expect(roundHalfUp(2.675, 2)).toBe(2.68);
    });

    it('should clean binary noise from a sum', () => {
      expect(roundHalfUp(0.1 + 0.2, 4)).toBe(0.3);
    });

    it('should leave values with fewer decimals unchanged', () => {
      expect(roundHalfUp(12.5, 4)).toBe(12.5);
    });
  });

  describe('latestPerPeer', () => {
    it('should pick the observation with the latest timestamp per peer', () => {
      const dataset = [
        at('B', '2025-10-01T10:00:00Z', 1),
        at('A', '2025-10-01T10:00:00Z', 2),
        at('A', '2025-10-01T11:00:00Z', 3),
        at('B', '2025-10-01T09:00:00Z', 4),
      ];

      expect(latestPerPeer(dataset)).toEqual([
        at('A', '2025-10-01T11:00:00Z', 3),
        at('B', '2025-10-01T10:00:00Z', 1),
      ]);
    });

    it('should let the later record win on an equal timestamp', () => {
      const dataset = [
        at('A', '2025-10-01T10:00:00Z', 2),
        at('A', '2025-10-01T10:00:00Z', 5),
      ];

      expect(latestPerPeer(dataset)).toEqual([
        at('A', '2025-10-01T10:00:00Z', 5),
      ]);
    });
  });

  describe('totalBalance', () => {
    it('should sum 5.0 and 7.5 to 12.5', () => {
      const dataset = [
        at('A', '2025-10-01T10:00:00Z', 5.0),
        at('B', '2025-10-01T10:00:00Z', 7.5),
      ];

      expect(totalBalance(dataset)).toBe(12.5);
    });

    it('should only count each peer once, using its latest balance', () => {
      const dataset = [
        at('A', '2025-10-01T10:00:00Z', 100),
        at('A', '2025-10-01T11:00:00Z', 110),
        at('B', '2025-10-01T10:30:00Z', 20.25),
      ];

      expect(totalBalance(dataset)).toBe(130.25);
    });

    it('should round the total half-up at the fifth decimal', () => {
      const dataset = [
        at('A', '2025-10-01T10:00:00Z', 1),
        at('B', '2025-10-01T10:00:00Z', 0.00005),
      ];

      expect(totalBalance(dataset)).toBe(1.0001);
    });

    it('should be 0 for an empty dataset', () => {
      expect(totalBalance([])).toBe(0);
    });
  });
});
