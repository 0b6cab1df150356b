import fs from "fs";
import { Readable } from "stream";
import csv from "csv-parser";
import { AssignmentBlockSize, OuiRecord } from "../models/oui-data";
import { OuiError } from "../models/oui-error";

// Normalized header names (see normalizeHeader)
const REQUIRED_COLUMNS = [
  "oui",
  "companyname",
  "companyaddress",
  "countrycode",
  "assignmentblocksize",
  "datecreated",
  "dateupdated",
];

// Accepted names for the private flag column
const PRIVATE_FLAG_COLUMNS = ["isprivate", "isiab"];

const BLOCK_SIZES: readonly AssignmentBlockSize[] = [
  "MA-L",
  "MA-M",
  "MA-S",
  "IAB",
];

const SCHEMA_HINT =
  "CSV file is not matching OUI CSV, expected columns: oui, isPrivate, companyName, companyAddress, countryCode, assignmentBlockSize, dateCreated, dateUpdated";

/**
 * Decoder for the OUI reference table (header row + data rows)
 */
export class OuiCsvParser {
  /**
   * Parse a table file
   */
  static parseFile(filePath: string): Promise<OuiRecord[]> {
    return this.parseStream(fs.createReadStream(filePath), filePath);
  }

  /**
   * Parse table text held in memory
   */
  static parseText(text: string): Promise<OuiRecord[]> {
    return this.parseStream(Readable.from([text]), "<text>");
  }

  /**
   * Map a column header to its normalized form
   * Example: "companyName" -> "companyname", "Company_Name" -> "companyname"
   */
  static normalizeHeader(header: string): string {
    return header
      .replace(/^\uFEFF/, "")
      .trim()
      .toLowerCase()
      .replace(/[^a-z0-9]/g, "");
  }

  /**
   * The private flag is "1" for true; every other value is false
   */
  static parsePrivateFlag(value: string | undefined): boolean {
    return value === "1";
  }

  static isBlockSize(value: string): value is AssignmentBlockSize {
    return BLOCK_SIZES.some((size) => size === value);
  }

  private static parseStream(
    source: Readable,
    sourceName: string
  ): Promise<OuiRecord[]> {
    return new Promise((resolve, reject) => {
      const records: OuiRecord[] = [];
      let columns: string[] = [];
      let privateFlagColumn: string | null = null;
      let failed = false;

      const parser = csv({
        mapHeaders: ({ header }) => this.normalizeHeader(header),
      });

      const fail = (error: OuiError) => {
        if (failed) return;
        failed = true;
        source.unpipe(parser);
        source.destroy();
        parser.destroy();
        reject(error);
      };

      parser.on("headers", (headers: string[]) => {
        columns = [...new Set(headers)];
        const missing = REQUIRED_COLUMNS.filter(
          (column) => !headers.includes(column)
        );
        privateFlagColumn =
          PRIVATE_FLAG_COLUMNS.find((column) => headers.includes(column)) ??
          null;
        if (!privateFlagColumn) {
          missing.push("isprivate");
        }

        if (missing.length > 0) {
          fail(
            new OuiError(
              "TableSchemaMismatch",
              `${SCHEMA_HINT} (missing: ${missing.join(", ")})`,
              headers.join(",")
            )
          );
        }
      });

      parser.on("data", (row: Record<string, string>) => {
        if (failed || !privateFlagColumn || this.isBlankRow(row)) return;
        try {
          const rowNumber = records.length + 1;
          this.checkRowShape(row, columns, rowNumber);
          records.push(this.toRecord(row, privateFlagColumn, rowNumber));
        } catch (error: unknown) {
          fail(
            error instanceof OuiError
              ? error
              : new OuiError("TableSchemaMismatch", String(error))
          );
        }
      });

      parser.on("end", () => {
        if (failed) return;
        if (!privateFlagColumn) {
          fail(
            new OuiError(
              "TableSchemaMismatch",
              `${SCHEMA_HINT} (no header row in ${sourceName})`,
              sourceName
            )
          );
          return;
        }
        resolve(records);
      });

      parser.on("error", (error: Error) => {
        fail(
          new OuiError(
            "TableSchemaMismatch",
            `${SCHEMA_HINT} (${error.message})`,
            sourceName
          )
        );
      });

      source.on("error", (error: Error) => {
        fail(
          new OuiError(
            "SourceUnavailable",
            `could not open database file - ${sourceName}: ${error.message}`,
            sourceName
          )
        );
      });

      source.pipe(parser);
    });
  }

  // A blank line has no cells, or a single empty one
  private static isBlankRow(row: Record<string, string>): boolean {
    const cells = Object.keys(row);
    return cells.length === 0 || (cells.length === 1 && row[cells[0]] === "");
  }

  // Extra cells come through under "_<index>" keys, missing ones are absent
  private static checkRowShape(
    row: Record<string, string>,
    columns: readonly string[],
    rowNumber: number
  ): void {
    const cells = Object.keys(row);
    const matches =
      columns.every((column) => column in row) &&
      cells.every((cell) => columns.includes(cell));

    if (!matches) {
      throw new OuiError(
        "TableSchemaMismatch",
        `row ${rowNumber}: expected ${columns.length} columns, found ${cells.length}`,
        Object.values(row).join(",")
      );
    }
  }

  private static toRecord(
    row: Record<string, string>,
    privateFlagColumn: string,
    rowNumber: number
  ): OuiRecord {
    const blockSize = (row.assignmentblocksize ?? "").trim();
    if (!this.isBlockSize(blockSize)) {
      throw new OuiError(
        "TableSchemaMismatch",
        `row ${rowNumber}: unknown assignment block size: ${blockSize}`,
        blockSize
      );
    }

    return Object.freeze({
      oui: row.oui ?? "",
      isPrivate: this.parsePrivateFlag(row[privateFlagColumn]),
      companyName: row.companyname ?? "",
      companyAddress: row.companyaddress ?? "",
      countryCode: row.countrycode ?? "",
      assignmentBlockSize: blockSize,
      dateCreated: row.datecreated ?? "",
      dateUpdated: row.dateupdated ?? "",
    });
  }
}
