/**
 * Tests for the BED feature stream reader
 */

import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";
import { BedError, FileError, ParseError, ValidationError } from "../../src/errors";
import { FeatureReader, isBedHeaderLine, parseBedRow, readFeatures } from "../../src/formats/bed";
import { ExtendedFeature } from "../../src/formats/feature";
import type { FeatureInit } from "../../src/types";
import { collect, createFixtureDir } from "../utils/fixtures";

const PEAKS_BED = [
  "track name=peaks description=test",
  "# called peaks",
  "chr1\t100\t200\tpeak1\t5\t+",
  "",
  "chr1\t300\t400\tpeak2\t0\t-",
  "chr2\t50\t60",
].join("\n");

describe("isBedHeaderLine", () => {
  test("recognizes comment, track and browser lines", () => {
    expect(isBedHeaderLine("# comment")).toBe(true);
    expect(isBedHeaderLine("track name=x")).toBe(true);
    expect(isBedHeaderLine("browser position chr1:1-100")).toBe(true);
    expect(isBedHeaderLine("track")).toBe(true);
  });

  test("treats contigs that start with a keyword as data", () => {
    expect(isBedHeaderLine("track1\t1\t2")).toBe(false);
    expect(isBedHeaderLine("chr1\t1\t2")).toBe(false);
  });
});

describe("parseBedRow", () => {
  test("maps fields to column names and leaves missing columns absent", () => {
    const row = parseBedRow("chr1\t10\t20\tpeak", 4);

    expect(row).toEqual({
      reference: "chr1",
      start: "10",
      end: "20",
      name: "peak",
      score: undefined,
      strand: undefined,
      thickStart: undefined,
      thickEnd: undefined,
      color: undefined,
      blockCount: undefined,
      blockSizes: undefined,
      blockStarts: undefined,
      lineNumber: 4,
    });
    expect(row.rest).toBeUndefined();
  });

  test("keeps empty fields as empty strings", () => {
    const row = parseBedRow("chr1\t\t20", 1);

    expect(row.start).toBe("");
    expect(row.end).toBe("20");
  });

  test("splits on tabs only", () => {
    expect(() => parseBedRow("chr1 10 20", 7)).toThrow(
      "BED format requires at least 3 fields, got 1"
    );
  });

  test("rejects rows with fewer than three fields", () => {
    try {
      parseBedRow("chr1\t10", 3);
      expect.unreachable("parseBedRow should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(BedError);
      if (error instanceof BedError) {
        expect(error.lineNumber).toBe(3);
        expect(error.reference).toBe("chr1");
        expect(error.format).toBe("BED");
      }
    }
  });

  test("collects columns past the twelfth", () => {
    const row = parseBedRow("chr1\t1\t2\tn\t0\t+\t1\t2\t0,0,0\t1\t1,\t0,\tx\ty", 1);

    expect(row.blockStarts).toBe("0,");
    expect(row.rest).toEqual(["x", "y"]);
  });

  test("rejects columns past the twelfth under the error policy", () => {
    expect(() => parseBedRow("chr1\t1\t2\tn\t0\t+\t1\t2\t0,0,0\t1\t1,\t0,\tx", 9, "error")).toThrow(
      "BED row has 13 fields, at most 12 allowed"
    );
  });
});

describe("FeatureReader", () => {
  describe("readString", () => {
    test("yields one feature per data row in file order", async () => {
      const reader = FeatureReader.create({ extension: 10, reverseFeatureShift: 2 });
      const features = await collect(reader.readString(PEAKS_BED));

      expect(features.map((f) => f.toRegionString())).toEqual([
        "chr1:90-210",
        "chr1:288-408",
        "chr2:40-70",
      ]);
      expect(features[0]?.toString()).toBe(
        "chr1\t100\t200\tpeak1\t5\t+\t\t\t0,0,0\t\t\t\t10\t2"
      );
    });

    test("uses default extension and shift", async () => {
      const features = await collect(FeatureReader.create().readString("chr2\t50\t60\n"));

      expect(features).toHaveLength(1);
      expect(features[0]?.regionStart).toBe(-50);
      expect(features[0]?.regionEnd).toBe(160);
      expect(features[0]?.reverseFeatureShift).toBe(0);
    });

    test("yields nothing for header-only input", async () => {
      const reader = FeatureReader.create();

      expect(await collect(reader.readString("# nothing here\n\ntrack name=x\n"))).toEqual([]);
      expect(await collect(reader.readString(""))).toEqual([]);
    });

    test("propagates feature parse errors unchanged", async () => {
      const reader = FeatureReader.create();

      await expect(collect(reader.readString("chr1\tabc\t200\n"))).rejects.toThrow(ParseError);
      await expect(collect(reader.readString("chr1\tabc\t200\n"))).rejects.toThrow(
        "Invalid start: 'abc' is not a valid integer"
      );
    });

    test("yields the rows before a malformed one", async () => {
      const features = FeatureReader.create().readString("chr1\t1\t2\nchr1\t5\n");

      const first = await features.next();
      expect(first.done).toBe(false);
      await expect(features.next()).rejects.toThrow(BedError);
    });
  });

  describe("extra columns", () => {
    const WIDE_ROW = "chr1\t1\t2\tn\t0\t+\t1\t2\t0,0,0\t1\t1,\t0,\textra";

    test("passes extra columns to the feature class and warns once", async () => {
      const seen: Array<readonly string[] | undefined> = [];
      class RestAwareFeature extends ExtendedFeature {
        constructor(init: FeatureInit) {
          super(init);
          seen.push(init.rest);
        }
      }
      const onWarning = vi.fn();
      const reader = new FeatureReader({ featureClass: RestAwareFeature, onWarning });

      const features = await collect(reader.readString(`${WIDE_ROW}\n${WIDE_ROW}\n`));

      expect(features).toHaveLength(2);
      expect(features[0]).toBeInstanceOf(RestAwareFeature);
      expect(seen).toEqual([["extra"], ["extra"]]);
      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith(
        "1 column(s) beyond blockStarts passed to the feature class as rest",
        1
      );
    });

    test("raises under the error policy", async () => {
      const reader = FeatureReader.create({ extraColumns: "error" });

      await expect(collect(reader.readString(WIDE_ROW))).rejects.toThrow(BedError);
    });
  });

  describe("custom feature classes", () => {
    test("builds any class taking a FeatureInit", async () => {
      class Interval {
        readonly label: string;
        constructor(init: FeatureInit) {
          this.label = `${init.reference}:${String(init.start)}:${String(init.extension)}`;
        }
      }
      const reader = new FeatureReader({ featureClass: Interval, extension: 25 });

      const intervals = await collect(reader.readString("chr9\t7\t8"));

      expect(intervals.map((i) => i.label)).toEqual(["chr9:7:25"]);
    });
  });

  describe("options", () => {
    test("rejects negative or fractional region sizes", () => {
      expect(() => FeatureReader.create({ extension: -1 })).toThrow(ValidationError);
      expect(() => FeatureReader.create({ reverseFeatureShift: 1.5 })).toThrow(ValidationError);
    });

    test("rejects unknown extra-column policies", () => {
      expect(
        () => new FeatureReader({ featureClass: ExtendedFeature, extraColumns: "drop" as unknown as "error" })
      ).toThrow("Invalid feature reader options");
    });
  });
});

describe("readFeatures", () => {
  const fixtures = createFixtureDir("bed-reader");
  let plainPath = "";
  let gzipPath = "";
  let disguisedGzipPath = "";

  beforeAll(() => {
    plainPath = fixtures.writeText("peaks.bed", `${PEAKS_BED}\n`);
    gzipPath = fixtures.writeGzip("peaks.bed.gz", `${PEAKS_BED}\n`);
    disguisedGzipPath = fixtures.writeGzip("peaks-compressed.bed", PEAKS_BED);
  });

  afterAll(() => {
    fixtures.cleanup();
  });

  test("reads a plain BED file", async () => {
    const features = await collect(readFeatures(plainPath, { extension: 10 }));

    expect(features.map((f) => f.name)).toEqual(["peak1", "peak2", undefined]);
    expect(features[1]?.regionStart).toBe(290);
    expect(features[1]?.regionEnd).toBe(410);
  });

  test("yields the same features from gzip and plain files", async () => {
    const plain = await collect(readFeatures(plainPath));
    const compressed = await collect(readFeatures(gzipPath));

    expect(compressed).toHaveLength(3);
    expect(compressed.map(String)).toEqual(plain.map(String));
  });

  test("detects gzip by content rather than file name", async () => {
    const features = await collect(readFeatures(disguisedGzipPath));

    expect(features.map((f) => f.reference)).toEqual(["chr1", "chr1", "chr2"]);
  });

  test("stops cleanly when the consumer breaks early", async () => {
    const seen: string[] = [];
    for await (const feature of readFeatures(gzipPath)) {
      seen.push(feature.reference);
      break;
    }

    expect(seen).toEqual(["chr1"]);
  });

  test("finishes after return() without reading further", async () => {
    const features = readFeatures(plainPath);

    await features.next();
    expect(await features.return(undefined)).toEqual({ done: true, value: undefined });
    expect(await features.next()).toEqual({ done: true, value: undefined });
  });

  test("accepts a custom feature class", async () => {
    class Named {
      readonly name: string;
      constructor(init: FeatureInit) {
        this.name = init.name ?? "unnamed";
      }
    }

    const features = await collect(readFeatures(plainPath, { featureClass: Named }));

    expect(features.map((f) => f.name)).toEqual(["peak1", "peak2", "unnamed"]);
  });

  test("fails with a FileError for a missing file", async () => {
    const missing = `${fixtures.dir}/missing.bed`;

    await expect(collect(readFeatures(missing))).rejects.toThrow(FileError);
  });
});
