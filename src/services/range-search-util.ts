import { OuiError } from "../models/oui-error";

/**
 * Range representation for binary search
 */
export interface AddressRange<T> {
  start: bigint;
  end: bigint;
  /** Prefix length of the block, end - start + 1 = 2^(48 - mask) */
  mask: number;
  value: T;
}

/**
 * Utility class for address range lookups using binary search
 */
export class RangeSearchUtil {
  /**
   * Sort ranges by start address (ascending), wider ranges first on equal
   * start. The sort is stable, so identical intervals keep insertion order.
   * Required for binary search to work correctly
   */
  static sortRanges<T>(ranges: readonly AddressRange<T>[]): AddressRange<T>[] {
    return [...ranges].sort((a, b) => {
      if (a.start < b.start) return -1;
      if (a.start > b.start) return 1;
      if (a.end > b.end) return -1;
      if (a.end < b.end) return 1;
      return 0;
    });
  }

  /**
   * Link every range to the nearest range enclosing it (-1 for none)
   *
   * @param ranges - Ranges sorted with sortRanges
   * @throws OuiError MalformedBlockNotation if two ranges overlap without one containing the other
   */
  static linkParents<T>(ranges: readonly AddressRange<T>[]): number[] {
    const parents: number[] = [];
    const open: number[] = [];

    ranges.forEach((range, index) => {
      // Close every range that ends before this one starts
      while (open.length > 0 && ranges[open[open.length - 1]].end < range.start) {
        open.pop();
      }

      const parent = open.length > 0 ? open[open.length - 1] : -1;
      if (parent !== -1 && ranges[parent].end < range.end) {
        throw new OuiError(
          "MalformedBlockNotation",
          `Ranges overlap without nesting: ${ranges[parent].start}-${ranges[parent].end} and ${range.start}-${range.end}`,
          `${range.start}-${range.end}`
        );
      }

      parents.push(parent);
      open.push(index);
    });

    return parents;
  }

  /**
   * Find the index of the last range whose start is at or before the point
   *
   * @param point - The address to look up
   * @param ranges - Ranges sorted with sortRanges
   * @returns The index, or -1 if every range starts after the point
   */
  static findLastStartAtOrBefore<T>(
    point: bigint,
    ranges: readonly AddressRange<T>[]
  ): number {
    // Binary search
    let left = 0;
    let right = ranges.length - 1;
    let result = -1;

    while (left <= right) {
      const mid = Math.floor((left + right) / 2);

      if (ranges[mid].start <= point) {
        // Candidate, keep looking in right half
        result = mid;
        left = mid + 1;
      } else {
        // Look in left half
        right = mid - 1;
      }
    }

    return result;
  }

  /**
   * Check if a range contains the point
   */
  static contains<T>(range: AddressRange<T>, point: bigint): boolean {
    return point >= range.start && point <= range.end;
  }
}
