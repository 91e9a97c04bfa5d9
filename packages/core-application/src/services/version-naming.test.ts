import { describe, it, expect } from "vitest";
import {
  buildVersionedFilename,
  formatDateStamp,
  hasVersionMarker,
  splitFilename,
} from "./version-naming";

describe("version-naming", () => {
  it("splits on the last dot", () => {
    expect(splitFilename("invoice.pdf")).toEqual({ name: "invoice", ext: ".pdf" });
    expect(splitFilename("archive.tar.gz")).toEqual({ name: "archive.tar", ext: ".gz" });
    expect(splitFilename("README")).toEqual({ name: "README", ext: "" });
  });

  it("does not treat a leading dot as an extension", () => {
    expect(splitFilename(".env")).toEqual({ name: ".env", ext: "" });
  });

  it("formats the local calendar date", () => {
    expect(formatDateStamp(new Date(2024, 4, 1, 23, 59))).toBe("2024-05-01");
    expect(formatDateStamp(new Date(2025, 11, 9, 0, 0))).toBe("2025-12-09");
  });

  it("builds versioned names with an optional counter", () => {
    expect(buildVersionedFilename("invoice.pdf", "2024-05-01")).toBe("invoice_v2024-05-01.pdf");
    expect(buildVersionedFilename("invoice.pdf", "2024-05-01", 1)).toBe("invoice_v2024-05-01_1.pdf");
    expect(buildVersionedFilename("README", "2024-05-01", 3)).toBe("README_v2024-05-01_3");
  });

  it("detects the version marker anywhere in the name", () => {
    expect(hasVersionMarker("report_v2024-01-01.pdf")).toBe(true);
    expect(hasVersionMarker("report_v2024-01-01_4.pdf")).toBe(true);
    expect(hasVersionMarker("copy of report_v2024-01-01 (1).pdf")).toBe(true);
    expect(hasVersionMarker("report_v24-01-01.pdf")).toBe(false);
    expect(hasVersionMarker("report_2024-01-01.pdf")).toBe(false);
  });
});
