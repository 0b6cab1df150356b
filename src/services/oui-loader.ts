import { BlockRange, OuiRecord } from "../models/oui-data";
import { OuiError } from "../models/oui-error";
import { ManufacturerIndex } from "./manufacturer-index";
import { OuiUtil } from "./oui-util";
import { RangeIndex } from "./range-index";
import { AddressRange } from "./range-search-util";

/**
 * Indexes and summary values built from the reference table
 */
export interface OuiTables {
  rangeIndex: RangeIndex<OuiRecord>;
  manufacturerIndex: ManufacturerIndex<OuiRecord>;
  ouis: ReadonlySet<string>;
  totalRecords: number;
}

export class OuiLoader {
  /**
   * Build the range and manufacturer indexes in a single pass.
   * Any row with a bad block notation aborts the whole load.
   *
   * @throws OuiError (MalformedBlockNotation, InvalidMask) prefixed with the row number
   */
  static load(records: readonly OuiRecord[]): OuiTables {
    const ranges: AddressRange<OuiRecord>[] = [];
    const ouis = new Set<string>();

    records.forEach((record, index) => {
      ranges.push({ ...this.decode(record, index + 1), value: record });
      ouis.add(record.oui);
    });

    return {
      rangeIndex: new RangeIndex(ranges),
      manufacturerIndex: new ManufacturerIndex(
        records,
        (record) => record.companyName
      ),
      ouis,
      totalRecords: records.length,
    };
  }

  private static decode(record: OuiRecord, row: number): BlockRange {
    try {
      return OuiUtil.parseBlockNotation(record.oui);
    } catch (error: unknown) {
      if (error instanceof OuiError) {
        throw error.withContext(`row ${row}`);
      }
      throw error;
    }
  }
}
