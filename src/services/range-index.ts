import { AddressRange, RangeSearchUtil } from "./range-search-util";

export interface RangeMatch<T> {
  range: AddressRange<T>;
  /** Number of ranges containing the point */
  matches: number;
  ambiguous: boolean;
}

/**
 * Read-only index of mask-aligned address ranges supporting point queries.
 *
 * Aligned blocks are either disjoint or nested, so the sorted ranges form a
 * forest. A point query binary-searches the last range starting at or before
 * the point and walks up the enclosing ranges, which costs O(log n + k).
 *
 * When several ranges contain a point the smallest one wins (longest
 * prefix); among identical intervals the one inserted last wins.
 */
export class RangeIndex<T> {
  /** More simultaneous matches than this flag the result as ambiguous */
  public static readonly AMBIGUOUS_MATCH_THRESHOLD = 2;

  private readonly ranges: readonly AddressRange<T>[];
  private readonly parents: readonly number[];

  constructor(ranges: readonly AddressRange<T>[]) {
    this.ranges = Object.freeze(RangeSearchUtil.sortRanges(ranges));
    this.parents = Object.freeze(RangeSearchUtil.linkParents(this.ranges));
  }

  get size(): number {
    return this.ranges.length;
  }

  /**
   * All ranges containing the point, innermost first
   */
  findAll(point: bigint): AddressRange<T>[] {
    let index = RangeSearchUtil.findLastStartAtOrBefore(point, this.ranges);

    while (index !== -1 && !RangeSearchUtil.contains(this.ranges[index], point)) {
      index = this.parents[index];
    }

    const matches: AddressRange<T>[] = [];
    while (index !== -1) {
      matches.push(this.ranges[index]);
      index = this.parents[index];
    }
    return matches;
  }

  /**
   * The range owning the point, or null if no range contains it
   */
  find(point: bigint): RangeMatch<T> | null {
    const matches = this.findAll(point);
    if (matches.length === 0) {
      return null;
    }

    return {
      range: matches[0],
      matches: matches.length,
      ambiguous: matches.length > RangeIndex.AMBIGUOUS_MATCH_THRESHOLD,
    };
  }
}
