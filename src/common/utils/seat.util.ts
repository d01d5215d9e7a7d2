export enum SeatAvailability {
  AVAILABLE = 'AVAILABLE',
  HELD = 'HELD',
  BOOKED = 'BOOKED',
}

export interface SeatPosition {
  row: string;
  seatNumber: string;
}

interface SeatAvailabilityCount {
  available: number;
  held: number;
  booked: number;
  total: number;
}

const SEAT_LABEL_PATTERN = /^([A-Z]{1,5})(\d{1,5})$/;

export function parseSeatLabel(label: string): SeatPosition | null {
  const match = SEAT_LABEL_PATTERN.exec(label);
  if (!match) {
    return null;
  }
  return { row: match[1], seatNumber: String(parseInt(match[2], 10)) };
}

/** Orders labels row first (A < B < ... < Z < AA), then numerically within the row. */
export function compareSeatLabels(a: string, b: string): number {
  const left = parseSeatLabel(a);
  const right = parseSeatLabel(b);

  if (!left || !right) {
    return a.localeCompare(b);
  }

  if (left.row !== right.row) {
    return left.row.length - right.row.length || left.row.localeCompare(right.row);
  }

  return parseInt(left.seatNumber, 10) - parseInt(right.seatNumber, 10);
}

export function sortSeatLabels(labels: Iterable<string>): string[] {
  return [...labels].sort(compareSeatLabels);
}

export function normalizeSeatLabel(label: string): string {
  return label.trim().toUpperCase();
}

/** Returns the labels that appear more than once after normalization. */
export function findDuplicateSeatLabels(labels: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const label of labels.map(normalizeSeatLabel)) {
    if (seen.has(label)) {
      duplicates.add(label);
    }
    seen.add(label);
  }

  return sortSeatLabels(duplicates);
}

export function countSeatsByAvailability(
  seats: Array<{ status: SeatAvailability }>,
): SeatAvailabilityCount {
  const counts: SeatAvailabilityCount = {
    available: 0,
    held: 0,
    booked: 0,
    total: seats.length,
  };

  for (const seat of seats) {
    switch (seat.status) {
      case SeatAvailability.AVAILABLE:
        counts.available++;
        break;
      case SeatAvailability.HELD:
        counts.held++;
        break;
      case SeatAvailability.BOOKED:
        counts.booked++;
        break;
    }
  }

  return counts;
}
