import { OuiDatabase } from "../../src/services/oui-database";
import { OuiError } from "../../src/models/oui-error";
import { captureError, fixturePath } from "../fixtures/oui-fixture";

const hex = (value: string) => BigInt(`0x${value}`);

describe("OuiDatabase", () => {
  let database: OuiDatabase;

  beforeAll(async () => {
    database = await OuiDatabase.fromCsvFile(fixturePath("oui-sample.csv"));
  });

  describe("lookupByMac", () => {
    test("should return the registering organization", () => {
      const record = database.lookupByMac("70:B3:D5:E7:4F:81");
      expect(record?.companyName).toBe("Ieee Registration Authority");
      expect(record?.oui).toBe("70:B3:D5");
    });

    test("should accept lower-case, dash and dot notations", () => {
      expect(database.lookupByMac("70:b3:d5:e7:4f:81")?.oui).toBe("70:B3:D5");
      expect(database.lookupByMac("70-B3-D5-E7-4F-81")?.oui).toBe("70:B3:D5");
      expect(database.lookupByMac("70b3.d5e7.4f81")?.oui).toBe("70:B3:D5");
    });

    test("should prefer a nested block over the block around it", () => {
      expect(database.lookupByMac("70:B3:D5:E7:A1:23")?.companyName).toBe(
        "Test Vendor A"
      );
      expect(database.lookupByMac("AC:DE:48:00:12:34")?.companyName).toBe(
        "Test Vendor B"
      );
      expect(database.lookupByMac("AC:DE:48:10:00:00")?.companyName).toBe(
        "Example Corp"
      );
    });

    test("should resolve blocks written with dashes", () => {
      expect(database.lookupByMac("00:1A:2C:00:00:01")?.oui).toBe("00-1A-2C");
    });

    test("should return private records as stored", () => {
      expect(database.lookupByMac("64:16:7F:01:02:03")).toEqual({
        oui: "64:16:7F",
        isPrivate: true,
        companyName: "",
        companyAddress: "",
        countryCode: "",
        assignmentBlockSize: "MA-L",
        dateCreated: "2014-10-06",
        dateUpdated: "2014-10-06",
      });
    });

    test("should return null for an address outside every block", () => {
      expect(database.lookupByMac("12:34:56:78:9A:BC")).toBeNull();
    });

    test("should find every address drawn from a block", () => {
      const samples: [string, string][] = [
        ["70:B3:D5:00:00:00", "70:B3:D5"],
        ["70:B3:D5:FF:FF:FF", "70:B3:D5"],
        ["70:B3:D5:E7:A0:00", "70:B3:D5:E7:A0:00/36"],
        ["70:B3:D5:E7:AF:FF", "70:B3:D5:E7:A0:00/36"],
        ["AC:DE:48:0F:FF:FF", "AC:DE:48:00:00:00/28"],
        ["00:1A:2B:80:00:00", "00:1A:2B"],
      ];

      for (const [mac, oui] of samples) {
        expect(database.lookupByMac(mac)?.oui).toBe(oui);
      }
    });

    test("should throw AddressParseError for an invalid address", () => {
      const error = captureError(() => database.lookupByMac("not-a-mac"));
      expect(error).toBeInstanceOf(OuiError);
      expect(error).toMatchObject({
        kind: "AddressParseError",
        value: "not-a-mac",
      });
    });
  });

  describe("lookupByMacDetailed", () => {
    test("should include the matched range and match count", () => {
      const result = database.lookupByMacDetailed("70:B3:D5:E7:A1:23");

      expect(result?.record.companyName).toBe("Test Vendor A");
      expect(result?.range).toEqual({
        start: hex("70b3d5e7a000"),
        end: hex("70b3d5e7afff"),
        mask: 36,
      });
      expect(result?.matches).toBe(2);
      expect(result?.ambiguous).toBe(false);
    });

    test("should return null when nothing matches", () => {
      expect(database.lookupByMacDetailed("12:34:56:78:9A:BC")).toBeNull();
    });
  });

  describe("lookupByManufacturer", () => {
    test("should return every block of a manufacturer in table order", () => {
      const records = database.lookupByManufacturer("Example Corp");
      expect(records?.map((record) => record.oui)).toEqual([
        "00:1A:2B",
        "AC:DE:48",
        "00-1A-2C",
      ]);
    });

    test("should match names exactly", () => {
      expect(database.lookupByManufacturer("example corp")).toBeNull();
      expect(database.lookupByManufacturer("Unknown Vendor")).toBeNull();
    });

    test("should return read-only results", () => {
      const records = database.lookupByManufacturer("Example Corp");
      expect(Object.isFrozen(records)).toBe(true);
      expect(records && Object.isFrozen(records[0])).toBe(true);
    });
  });

  describe("summary accessors", () => {
    test("should count records, manufacturers and block notations", () => {
      expect(database.getTotalRecords()).toBe(7);
      expect(database.getStats()).toEqual({
        totalRecords: 7,
        totalManufacturers: 5,
        totalOuis: 7,
      });
    });

    test("should list distinct manufacturers in table order", () => {
      expect(database.getUniqueManufacturers()).toEqual([
        "Ieee Registration Authority",
        "Test Vendor A",
        "Example Corp",
        "Test Vendor B",
        "",
      ]);
    });

    test("should list distinct block notations", () => {
      expect(database.getUniqueOuis()).toHaveLength(7);
      expect(database.getUniqueOuis()).toContain("AC:DE:48:00:00:00/28");
    });
  });

  describe("loading", () => {
    test("should give identical results when loading the same table twice", async () => {
      const again = await OuiDatabase.fromCsvFile(fixturePath("oui-sample.csv"));

      expect(again.getStats()).toEqual(database.getStats());
      expect(again.lookupByMac("AC:DE:48:00:12:34")).toEqual(
        database.lookupByMac("AC:DE:48:00:12:34")
      );
      expect(again.lookupByManufacturer("Example Corp")).toEqual(
        database.lookupByManufacturer("Example Corp")
      );
    });

    test("should load a single-row table", async () => {
      const single = await OuiDatabase.fromCsvFile(fixturePath("oui-single.csv"));
      expect(single.lookupByMac("70:B3:D5:E7:4F:81")?.companyName).toBe(
        "Ieee Registration Authority"
      );
      expect(single.getTotalRecords()).toBe(1);
    });

    test("should abort the whole load on a malformed block", async () => {
      await expect(
        OuiDatabase.fromCsvFile(fixturePath("oui-malformed.csv"))
      ).rejects.toMatchObject({
        kind: "MalformedBlockNotation",
        message: "row 2: could not parse OUI value: ZZ:B3:D5",
      });
    });

    test("should abort the whole load on an invalid mask", async () => {
      await expect(
        OuiDatabase.fromCsvFile(fixturePath("oui-invalid-mask.csv"))
      ).rejects.toMatchObject({
        kind: "InvalidMask",
        message: "row 1: incorrect mask value: 49",
      });
    });

    test("should reject a missing file with SourceUnavailable", async () => {
      await expect(
        OuiDatabase.fromCsvFile(fixturePath("missing.csv"))
      ).rejects.toMatchObject({ kind: "SourceUnavailable" });
    });

    test("should reject a file of another format with TableSchemaMismatch", async () => {
      await expect(
        OuiDatabase.fromCsvFile(fixturePath("not-oui.csv"))
      ).rejects.toMatchObject({ kind: "TableSchemaMismatch" });
    });
  });

  describe("default", () => {
    test("should load the bundled table once and share it", async () => {
      const first = OuiDatabase.default();
      const second = OuiDatabase.default();
      expect(second).toBe(first);

      const defaultDatabase = await first;
      expect(defaultDatabase).toBe(await OuiDatabase.default());
      expect(defaultDatabase.getTotalRecords()).toBe(20);
    });

    test("should resolve addresses against the bundled table", async () => {
      const defaultDatabase = await OuiDatabase.default();
      expect(defaultDatabase.lookupByMac("70:B3:D5:E7:4F:81")?.companyName).toBe(
        "Ieee Registration Authority"
      );
      expect(
        defaultDatabase.lookupByManufacturer("Ieee Registration Authority")?.map(
          (record) => record.oui
        )
      ).toEqual(["70:B3:D5", "4C:E1:73", "8C:1F:64"]);
    });
  });
});
