import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  buildGoldenRows,
  canonicalRowKey,
  goldenColumns,
  normalizeGoldenPhone,
  rowsToAppend,
  updateGolden,
} from "./golden";
import { readCsvRows } from "./core/file-reader";

describe("normalizeGoldenPhone", () => {
  it("should strip the tel scheme and separators", () => {
    expect(normalizeGoldenPhone(" tel:613-555.0100 ")).toBe("6135550100");
    expect(normalizeGoldenPhone(undefined)).toBe("");
  });
});

describe("canonicalRowKey", () => {
  it("should not depend on column order", () => {
    expect(canonicalRowKey({ a: "1", b: "2" })).toBe(canonicalRowKey({ b: "2", a: "1" }));
  });
});

describe("buildGoldenRows", () => {
  it("should keep rows with phones, normalized and deduplicated in first-seen order", () => {
    const existing = [{ business_name: "Acme", phone: "613-555-0100" }];
    const newest = [
      { business_name: "Acme", phone: "6135550100" },
      { business_name: "No Phone", phone: "" },
      { business_name: "Beta", phone: "613 555 0101" },
    ];
    const older = [{ business_name: "Beta", phone: "613.555.0101" }];

    expect(buildGoldenRows(existing, [newest, older])).toEqual([
      { business_name: "Acme", phone: "6135550100" },
      { business_name: "Beta", phone: "6135550101" },
    ]);
  });
});

describe("rowsToAppend", () => {
  it("should return golden rows whose phone is missing from the current rows", () => {
    const current = [{ business_name: "Acme", phone: "613 555 0100" }];
    const golden = [
      { business_name: "Acme", phone: "6135550100" },
      { business_name: "Beta", phone: "6135550101" },
    ];
    expect(rowsToAppend(current, golden)).toEqual([{ business_name: "Beta", phone: "6135550101" }]);
  });
});

describe("goldenColumns", () => {
  it("should order known columns first and extras alphabetically", () => {
    expect(goldenColumns([{ zeta: "", phone: "", source: "", alpha: "" }])).toEqual([
      "source",
      "phone",
      "alpha",
      "zeta",
    ]);
  });
});

describe("updateGolden", () => {
  it("should merge run files into the golden file and backfill runs", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "golden-"));
    fs.writeFileSync(
      path.join(dir, "providers_20260101_000000.csv"),
      "\uFEFFbusiness_name,phone\nAcme,613-555-0100\nNo Phone,\n",
      "utf-8"
    );
    fs.writeFileSync(
      path.join(dir, "providers_20260102_000000.csv"),
      "business_name,phone\nBeta,613 555 0101\n",
      "utf-8"
    );
    fs.writeFileSync(path.join(dir, "notes.csv"), "business_name,phone\nIgnored,1\n", "utf-8");

    const update = updateGolden(dir);

    expect(update.before).toBe(0);
    expect(update.after).toBe(2);
    expect(update.appended).toBe(2);
    expect(readCsvRows(update.goldenPath).map((r) => r.business_name).sort()).toEqual([
      "Acme",
      "Beta",
    ]);
    expect(readCsvRows(path.join(dir, "providers_20260102_000000.csv"))).toHaveLength(2);
  });
});
