import path from "path";
import {
  DatabaseStats,
  MacLookupResult,
  OuiRecord,
} from "../models/oui-data";
import { OuiCsvParser } from "./csv-parser";
import { MacUtil } from "./mac-util";
import { OuiLoader, OuiTables } from "./oui-loader";

/**
 * Read-only OUI database: MAC address to vendor, and vendor to address blocks
 */
export class OuiDatabase {
  /** Bundled copy of the reference table */
  public static readonly DEFAULT_CSV_PATH = path.resolve(
    __dirname,
    "../../data/oui.csv"
  );

  // Process-wide default database, loaded on first use
  private static defaultInstance: Promise<OuiDatabase> | null = null;

  private readonly tables: OuiTables;

  private constructor(tables: OuiTables) {
    this.tables = tables;
    Object.freeze(this);
  }

  /**
   * Load a database from the given CSV file
   *
   * @throws OuiError SourceUnavailable, TableSchemaMismatch, MalformedBlockNotation or InvalidMask
   */
  static async fromCsvFile(filePath: string): Promise<OuiDatabase> {
    const records = await OuiCsvParser.parseFile(filePath);
    return new OuiDatabase(OuiLoader.load(records));
  }

  /**
   * Get the database built from the bundled table.
   * Loaded once per process; a failed load is retried on the next call.
   */
  static default(): Promise<OuiDatabase> {
    if (!OuiDatabase.defaultInstance) {
      OuiDatabase.defaultInstance = OuiDatabase.fromCsvFile(
        OuiDatabase.DEFAULT_CSV_PATH
      ).catch((error: unknown) => {
        OuiDatabase.defaultInstance = null;
        throw error;
      });
    }
    return OuiDatabase.defaultInstance;
  }

  /**
   * Look up the vendor record for a MAC address
   *
   * @returns The record owning the address, or null if no block contains it
   * @throws OuiError AddressParseError for an invalid address literal
   */
  lookupByMac(mac: string): OuiRecord | null {
    const result = this.lookupByMacDetailed(mac);
    return result ? result.record : null;
  }

  /**
   * Look up a MAC address, including the matched range and how many
   * blocks contained the address
   */
  lookupByMacDetailed(mac: string): MacLookupResult | null {
    const point = MacUtil.macToBigInt(mac);
    const match = this.tables.rangeIndex.find(point);
    if (!match) {
      return null;
    }

    const { start, end, mask, value } = match.range;
    return {
      record: value,
      range: { start, end, mask },
      matches: match.matches,
      ambiguous: match.ambiguous,
    };
  }

  /**
   * Look up all records registered under a manufacturer name (exact match)
   */
  lookupByManufacturer(name: string): readonly OuiRecord[] | null {
    return this.tables.manufacturerIndex.get(name);
  }

  /** Distinct manufacturer names present in the database */
  getUniqueManufacturers(): string[] {
    return this.tables.manufacturerIndex.names();
  }

  /** Distinct block notations present in the database */
  getUniqueOuis(): string[] {
    return [...this.tables.ouis];
  }

  getTotalRecords(): number {
    return this.tables.totalRecords;
  }

  getStats(): DatabaseStats {
    return {
      totalRecords: this.tables.totalRecords,
      totalManufacturers: this.tables.manufacturerIndex.size,
      totalOuis: this.tables.ouis.size,
    };
  }
}
