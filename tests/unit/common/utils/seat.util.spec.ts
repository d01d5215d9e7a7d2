import {
  SeatAvailability,
  compareSeatLabels,
  countSeatsByAvailability,
  findDuplicateSeatLabels,
  normalizeSeatLabel,
  parseSeatLabel,
  sortSeatLabels,
} from '@common/utils/seat.util';

describe('seat.util', () => {
  describe('parseSeatLabel', () => {
    it('should split a label into row and seat number', () => {
      expect(parseSeatLabel('B12')).toEqual({ row: 'B', seatNumber: '12' });
      expect(parseSeatLabel('AA3')).toEqual({ row: 'AA', seatNumber: '3' });
    });

    it('should drop leading zeros from the seat number', () => {
      expect(parseSeatLabel('C007')).toEqual({ row: 'C', seatNumber: '7' });
    });

    it('should return null for labels that do not follow row-then-number', () => {
      expect(parseSeatLabel('12B')).toBeNull();
      expect(parseSeatLabel('b1')).toBeNull();
      expect(parseSeatLabel('')).toBeNull();
    });
  });

  describe('compareSeatLabels', () => {
    it('should order seats numerically within a row', () => {
      expect(sortSeatLabels(['A10', 'A2', 'A1'])).toEqual(['A1', 'A2', 'A10']);
    });

    it('should put single-letter rows before double-letter rows', () => {
      expect(sortSeatLabels(['AA1', 'Z1', 'B1'])).toEqual(['B1', 'Z1', 'AA1']);
    });

    it('should fall back to string order for unparseable labels', () => {
      expect(compareSeatLabels('x', 'y')).toBeLessThan(0);
    });
  });

  describe('normalizeSeatLabel', () => {
    it('should trim and upper-case', () => {
      expect(normalizeSeatLabel('  c4 ')).toBe('C4');
    });
  });

  describe('findDuplicateSeatLabels', () => {
    it('should report labels repeated after normalization, once each', () => {
      expect(findDuplicateSeatLabels(['b2', 'A1', 'B2', 'a1', 'A1', 'C3'])).toEqual(['A1', 'B2']);
    });

    it('should return nothing for distinct labels', () => {
      expect(findDuplicateSeatLabels(['A1', 'A2'])).toEqual([]);
    });
  });

  describe('countSeatsByAvailability', () => {
    it('should count each status', () => {
      const counts = countSeatsByAvailability([
        { status: SeatAvailability.AVAILABLE },
        { status: SeatAvailability.HELD },
        { status: SeatAvailability.BOOKED },
        { status: SeatAvailability.AVAILABLE },
      ]);

      expect(counts).toEqual({ available: 2, held: 1, booked: 1, total: 4 });
    });
  });
});
