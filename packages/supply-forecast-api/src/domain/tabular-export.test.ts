import { describe, expect, it } from "vitest";
import { formatTimestamp, toCsv } from "./tabular-export.js";

describe("tabular export", () => {
  it("quotes cells holding separators or quotes", () => {
    const csv = toCsv(["Item", "Note"], [
      { Item: "Beans, dark roast", Note: 'said "check"' },
      { Item: "Milk" },
    ]);

    expect(csv).toBe('Item,Note\n"Beans, dark roast","said ""check"""\nMilk,\n');
  });

  it("follows the column order and writes only the header when there are no rows", () => {
    expect(toCsv(["Qty", "Item"], [{ Item: "Oat milk", Qty: 4.5 }])).toBe("Qty,Item\n4.5,Oat milk\n");
    expect(toCsv(["Item", "Note"], [])).toBe("Item,Note\n");
  });

  it("formats timestamps without the zone suffix", () => {
    expect(formatTimestamp(new Date("2026-03-10T08:05:09.120Z"))).toBe("2026-03-10 08:05:09");
  });
});
