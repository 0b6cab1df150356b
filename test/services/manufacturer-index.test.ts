import { ManufacturerIndex } from "../../src/services/manufacturer-index";

interface Entry {
  name: string;
  id: number;
}

describe("ManufacturerIndex", () => {
  const entries: Entry[] = [
    { name: "Acme", id: 1 },
    { name: "acme", id: 2 },
    { name: "Acme", id: 3 },
    { name: "Globex", id: 4 },
    { name: "Acme", id: 5 },
  ];
  const index = new ManufacturerIndex(entries, (entry) => entry.name);

  test("should return every entry for a name in insertion order", () => {
    expect(index.get("Acme")?.map((entry) => entry.id)).toEqual([1, 3, 5]);
    expect(index.get("Globex")?.map((entry) => entry.id)).toEqual([4]);
  });

  test("should compare names exactly", () => {
    expect(index.get("acme")?.map((entry) => entry.id)).toEqual([2]);
    expect(index.get("ACME")).toBeNull();
    expect(index.get("Acme ")).toBeNull();
    expect(index.has("Acme")).toBe(true);
    expect(index.has("ACME")).toBe(false);
  });

  test("should list distinct names in first-seen order", () => {
    expect(index.names()).toEqual(["Acme", "acme", "Globex"]);
    expect(index.size).toBe(3);
  });

  test("should hand out frozen buckets", () => {
    expect(Object.isFrozen(index.get("Acme"))).toBe(true);
  });
});
