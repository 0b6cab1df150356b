import { OuiError } from "../models/oui-error";

/**
 * Utility functions for working with MAC (EUI-48) addresses
 */
export class MacUtil {
  /**
   * Largest 48-bit address value: FF:FF:FF:FF:FF:FF
   */
  public static readonly MAX_ADDRESS = BigInt("0xffffffffffff");

  private static readonly COLON_PATTERN = /^([0-9a-fA-F]{2}:){5}[0-9a-fA-F]{2}$/;
  private static readonly DASH_PATTERN = /^([0-9a-fA-F]{2}-){5}[0-9a-fA-F]{2}$/;
  private static readonly DOT_PATTERN = /^([0-9a-fA-F]{4}\.){2}[0-9a-fA-F]{4}$/;

  /**
   * Validate a MAC address literal
   * Accepts "70:B3:D5:E7:4F:81", "70-B3-D5-E7-4F-81" and "70b3.d5e7.4f81"
   */
  static isValidMac(mac: string): boolean {
    return (
      this.COLON_PATTERN.test(mac) ||
      this.DASH_PATTERN.test(mac) ||
      this.DOT_PATTERN.test(mac)
    );
  }

  /**
   * Parse a MAC address literal into its 6 raw bytes
   */
  static parseMac(mac: string): number[] {
    if (!this.isValidMac(mac)) {
      throw new OuiError(
        "AddressParseError",
        `Invalid MAC address: ${mac}`,
        mac
      );
    }

    const hex = mac.replace(/[:\-.]/g, "");
    const bytes: number[] = [];
    for (let i = 0; i < 12; i += 2) {
      bytes.push(parseInt(hex.substring(i, i + 2), 16));
    }
    return bytes;
  }

  /**
   * Convert 6 address bytes to the 48-bit integer used as index key.
   * The bytes are left-padded with two zero bytes and read as a
   * big-endian unsigned 64-bit integer.
   */
  static toBigInt(bytes: readonly number[]): bigint {
    if (
      bytes.length !== 6 ||
      !bytes.every((b) => Number.isInteger(b) && b >= 0 && b <= 255)
    ) {
      throw new OuiError(
        "EncodingError",
        `could not read u64 from MAC byte array: [${bytes.join(", ")}]`,
        bytes.join(",")
      );
    }

    const padded = Buffer.alloc(8);
    Buffer.from(bytes).copy(padded, 2);

    try {
      return padded.readBigUInt64BE(0);
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      throw new OuiError(
        "EncodingError",
        `could not read u64 from padded MAC byte array: ${errorMessage}`,
        padded.toString("hex")
      );
    }
  }

  /**
   * Convert a MAC address literal to its 48-bit integer
   * Example: "70:B3:D5:E7:4F:81" -> 0x70b3d5e74f81n
   */
  static macToBigInt(mac: string): bigint {
    return this.toBigInt(this.parseMac(mac));
  }

  /**
   * Format a 48-bit integer as an upper-case, colon-separated address
   * Example: 0x70b3d5e74f81n -> "70:B3:D5:E7:4F:81"
   */
  static formatMac(value: bigint): string {
    if (value < BigInt(0) || value > this.MAX_ADDRESS) {
      throw new OuiError(
        "EncodingError",
        `value out of range for a MAC address: ${value}`,
        value.toString()
      );
    }

    const hex = value.toString(16).toUpperCase().padStart(12, "0");
    const octets: string[] = [];
    for (let i = 0; i < 12; i += 2) {
      octets.push(hex.substring(i, i + 2));
    }
    return octets.join(":");
  }
}
