import { BlockRange } from "../models/oui-data";
import { OuiError } from "../models/oui-error";
import { MacUtil } from "./mac-util";

/**
 * Utility functions for OUI block notations
 */
export class OuiUtil {
  /** Mask implied by a notation without "/" (MA-L, the most common block) */
  public static readonly DEFAULT_MASK = 24;
  public static readonly MIN_MASK = 8;
  public static readonly MAX_MASK = 48;

  /**
   * Check if a mask length is allowed in a block notation
   */
  static isValidMask(mask: number): boolean {
    return (
      Number.isInteger(mask) && mask >= this.MIN_MASK && mask <= this.MAX_MASK
    );
  }

  /**
   * Bits below the mask boundary within the 48-bit address space
   * Example: 24 -> 0xffffff
   */
  static hostMask(mask: number): bigint {
    return MacUtil.MAX_ADDRESS >> BigInt(mask);
  }

  /**
   * Decode a block notation into a closed address range
   *
   * "70:B3:D5" is a 24-bit prefix and is shifted into the top of the
   * address space. With an explicit mask ("70:B3:D5:E7:40:00/36") the
   * value is taken as a full address-space position and must have no
   * bits set below the mask.
   */
  static parseBlockNotation(notation: string): BlockRange {
    const parts = notation.split("/");

    let mask: number;
    if (parts.length === 1) {
      mask = this.DEFAULT_MASK;
    } else if (parts.length === 2) {
      mask = this.parseMask(parts[1], notation);
    } else {
      throw new OuiError(
        "MalformedBlockNotation",
        `invalid number of mask separators: ${notation}`,
        notation
      );
    }

    // Remove the separators from the address part
    const hex = parts[0].toUpperCase().replace(/[:\-.]/g, "");
    if (!/^[0-9A-F]+$/.test(hex)) {
      throw new OuiError(
        "MalformedBlockNotation",
        `could not parse OUI value: ${notation}`,
        notation
      );
    }

    const value = BigInt(`0x${hex}`);
    const position =
      mask === this.DEFAULT_MASK ? value << BigInt(24) : value;

    if (position > MacUtil.MAX_ADDRESS) {
      throw new OuiError(
        "MalformedBlockNotation",
        `OUI value does not fit in 48 bits: ${notation}`,
        notation
      );
    }

    // The value must start a block of the given mask
    const hostMask = this.hostMask(mask);
    if ((position & hostMask) !== BigInt(0)) {
      throw new OuiError(
        "MalformedBlockNotation",
        `OUI value is not aligned to mask ${mask}: ${notation}`,
        notation
      );
    }

    return { start: position, end: position | hostMask, mask };
  }

  private static parseMask(raw: string, notation: string): number {
    if (!/^\d+$/.test(raw)) {
      throw new OuiError(
        "MalformedBlockNotation",
        `could not parse mask value: ${notation}`,
        notation
      );
    }

    const mask = parseInt(raw, 10);
    if (!this.isValidMask(mask)) {
      throw new OuiError(
        "InvalidMask",
        `incorrect mask value: ${mask}`,
        notation
      );
    }
    return mask;
  }
}
