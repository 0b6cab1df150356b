import { Request, Response } from "express";
import { OuiDatabase } from "../services/oui-database";
import { MacUtil } from "../services/mac-util";

// Empty values count as missing unless allowEmpty is set
function queryParam(
  req: Request,
  name: string,
  allowEmpty = false
): string | undefined {
  const value = req.query[name];
  if (typeof value !== "string") {
    return undefined;
  }
  return value.length > 0 || allowEmpty ? value : undefined;
}

/**
 * Request handlers for the OUI lookup API
 */
export function createOuiController(database: OuiDatabase) {
  return {
    // GET /api/oui?mac=70:B3:D5:E7:4F:81
    lookupByMac(req: Request, res: Response) {
      try {
        const mac = queryParam(req, "mac");

        if (!mac) {
          return res.status(400).json({
            error: "Missing required query parameter: mac",
          });
        }

        if (!MacUtil.isValidMac(mac)) {
          return res.status(400).json({
            error: "Invalid MAC address format",
          });
        }

        console.log(`Looking up vendor for MAC: ${mac}`);
        const result = database.lookupByMacDetailed(mac);

        if (!result) {
          return res.status(404).json({
            message: "No vendor found for the provided MAC address",
            mac,
          });
        }

        if (result.ambiguous) {
          console.warn(
            `MAC ${mac} is contained in ${result.matches} blocks, the dataset may be corrupt; answering with ${result.record.oui}`
          );
        }

        return res.status(200).json({
          mac,
          ...result.record,
          range: {
            start: MacUtil.formatMac(result.range.start),
            end: MacUtil.formatMac(result.range.end),
            mask: result.range.mask,
          },
          matches: result.matches,
        });
      } catch (error) {
        console.error("Error processing MAC lookup request:", error);
        return res.status(500).json({ error: "Failed to process MAC lookup" });
      }
    },

    // GET /api/oui/manufacturer?name=Example%20Corp
    // Private blocks are registered under the empty name (?name=)
    lookupByManufacturer(req: Request, res: Response) {
      const name = queryParam(req, "name", true);

      if (name === undefined) {
        return res.status(400).json({
          error: "Missing required query parameter: name",
        });
      }

      const records = database.lookupByManufacturer(name);

      if (!records) {
        return res.status(404).json({
          message: "No address blocks found for the provided manufacturer",
          name,
        });
      }

      return res.status(200).json({ name, count: records.length, records });
    },

    // GET /api/oui/stats
    stats(req: Request, res: Response) {
      return res.status(200).json(database.getStats());
    },

    // GET /api/oui/manufacturers
    manufacturers(req: Request, res: Response) {
      const manufacturers = database.getUniqueManufacturers().sort();
      return res
        .status(200)
        .json({ count: manufacturers.length, manufacturers });
    },
  };
}

export type OuiController = ReturnType<typeof createOuiController>;
