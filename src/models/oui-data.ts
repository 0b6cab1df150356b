/**
 * Assignment block size codes used by the registration authority
 * - MA-L: MAC Address Block Large
 * - MA-M: MAC Address Block Medium
 * - MA-S: MAC Address Block Small
 * - IAB: Individual Address Block
 */
export type AssignmentBlockSize = "MA-L" | "MA-M" | "MA-S" | "IAB";

/**
 * Interface representing one row of the OUI reference table
 */
export interface OuiRecord {
  /** Block notation as written in the table, e.g. "70:B3:D5" or "70:B3:D5:E7:A0:00/36" */
  readonly oui: string;
  /** When true, companyName, companyAddress and countryCode are redacted */
  readonly isPrivate: boolean;
  readonly companyName: string;
  readonly companyAddress: string;
  /** ISO 3166 country code */
  readonly countryCode: string;
  readonly assignmentBlockSize: AssignmentBlockSize;
  /** YYYY-MM-DD */
  readonly dateCreated: string;
  /** YYYY-MM-DD */
  readonly dateUpdated: string;
}

/**
 * Closed address interval decoded from a block notation
 */
export interface BlockRange {
  start: bigint;
  end: bigint;
  mask: number;
}

/**
 * Interface representing the result of a detailed MAC lookup
 */
export interface MacLookupResult {
  record: OuiRecord;
  range: BlockRange;
  matches: number;
  ambiguous: boolean;
}

export interface DatabaseStats {
  totalRecords: number;
  totalManufacturers: number;
  totalOuis: number;
}
