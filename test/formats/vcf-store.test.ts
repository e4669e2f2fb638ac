/**
 * Tests for the header metadata store
 */

import { beforeEach, describe, expect, test } from "vitest";
import {
  DuplicateMetadataError,
  HeaderFinalizedError,
  StructuredLineMalformedError,
} from "../../src/errors";
import { HeaderMetadataStore } from "../../src/formats/vcf/store";
import type { HeaderStoreOptions } from "../../src/formats/vcf/types";

const HEADER = [
  "##fileformat=VCFv4.3",
  "##source=unitcaller",
  '##INFO=<ID=DP,Number=1,Type=Integer,Description="Total Depth">',
  '##INFO=<ID=AF,Number=A,Type=Float,Description="Allele Frequency">',
  '##FILTER=<ID=q10,Description="Quality below 10">',
  '##ALT=<ID=DEL,Description="Deletion">',
  '##FORMAT=<ID=GT,Number=1,Type=String,Description="Genotype">',
  "##contig=<ID=chr2,length=2000>",
  "##contig=<ID=chr1,length=1000>",
];

type Warning = [message: string, lineNumber: number | undefined];

function createStore(options: Omit<HeaderStoreOptions, "onWarning"> = {}): {
  store: HeaderMetadataStore;
  warnings: Warning[];
} {
  const warnings: Warning[] = [];
  const store = new HeaderMetadataStore({
    ...options,
    onWarning: (message, lineNumber) => warnings.push([message, lineNumber]),
  });
  return { store, warnings };
}

describe("HeaderMetadataStore", () => {
  let store: HeaderMetadataStore;
  let warnings: Warning[];

  beforeEach(() => {
    ({ store, warnings } = createStore());
  });

  describe("ingest", () => {
    test("accepts header lines until the first non-header line", () => {
      for (const line of HEADER) {
        expect(store.ingest(line)).toBe("accepted");
      }
      expect(store.isFinalized).toBe(false);
      expect(store.ingest("#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO")).toBe("headerEnded");
      expect(store.isFinalized).toBe(true);
      expect(store.lineCount).toBe(HEADER.length);
      expect(warnings).toEqual([]);
    });

    test("rejects lines after the header ended", () => {
      store.ingest("##fileformat=VCFv4.3");
      store.ingest("#CHROM");
      expect(() => store.ingest("##source=late")).toThrow(HeaderFinalizedError);
      expect(store.lineCount).toBe(1);
    });

    test("rejects lines after an explicit finalize", () => {
      store.finalize();
      expect(store.isFinalized).toBe(true);
      expect(() => store.ingest("##fileformat=VCFv4.3")).toThrow(HeaderFinalizedError);
    });

    test("an immediate body line leaves an empty header", () => {
      expect(store.ingest("#CHROM\tPOS")).toBe("headerEnded");
      expect(store.lineCount).toBe(0);
      expect(store.rawHeader).toBe("");
      expect(store.info.size).toBe(0);
    });

    test("a malformed structured line throws and is not recorded", () => {
      store.ingest("##fileformat=VCFv4.3");
      expect(() => store.ingest("##INFO=<ID=DP,Number=1>")).toThrow(StructuredLineMalformedError);
      expect(store.lineCount).toBe(1);
      expect(store.info.size).toBe(0);
    });
  });

  describe("ingestEntry", () => {
    test("returns the parsed entry with its line number", () => {
      store.ingest("##fileformat=VCFv4.3");
      expect(store.ingestEntry('##FILTER=<ID=PASS,Description="All filters passed">')).toEqual({
        kind: "FILTER",
        record: { id: "PASS", description: "All filters passed" },
        lineNumber: 2,
      });
      expect(store.ingestEntry("#CHROM")).toBeUndefined();
    });

    test("takes the source line number from the caller", () => {
      store.ingest("##fileformat=VCFv4.3", 1);
      expect(store.ingestEntry("##contig=<ID=chr1>", 3)).toEqual({
        kind: "contig",
        record: { id: "chr1" },
        lineNumber: 3,
      });
      expect(store.lineCount).toBe(2);
    });

    test("leaves out line numbers when tracking is off", () => {
      ({ store } = createStore({ trackLineNumbers: false }));
      const entry = store.ingestEntry("##contig=<ID=chr1>");
      expect(entry).toEqual({ kind: "contig", record: { id: "chr1" } });
    });
  });

  describe("lookups", () => {
    beforeEach(() => {
      for (const line of HEADER) store.ingest(line);
      store.ingest("#CHROM");
    });

    test("fetches structured records by kind and id", () => {
      expect(store.get("INFO", "DP")).toEqual({
        id: "DP",
        number: { kind: "fixed", count: 1 },
        type: "Integer",
        description: "Total Depth",
      });
      expect(store.get("FILTER", "q10")?.description).toBe("Quality below 10");
      expect(store.get("ALT", "DEL")?.description).toBe("Deletion");
      expect(store.get("FORMAT", "GT")?.type).toBe("String");
      expect(store.get("contig", "chr1")?.length).toBe(1000);
      expect(store.get("INFO", "MISSING")).toBeUndefined();
    });

    test("keeps declaration order", () => {
      expect(store.records("contig").map((contig) => contig.id)).toEqual(["chr2", "chr1"]);
      expect([...store.info.keys()]).toEqual(["DP", "AF"]);
    });

    test("exposes every map", () => {
      expect(store.filters.size).toBe(1);
      expect(store.alts.size).toBe(1);
      expect(store.formats.size).toBe(1);
      expect(store.contigs.size).toBe(2);
      expect([...store.generic.keys()]).toEqual(["fileformat", "source"]);
    });

    test("reads singular metadata", () => {
      expect(store.fileFormat).toBe("VCFv4.3");
      expect(store.getSingular("source")).toEqual({ kind: "scalar", value: "unitcaller" });
      expect(store.getSingular("reference")).toBeUndefined();
    });

    test("rawHeader reproduces the ingested lines", () => {
      expect(store.rawHeader).toBe(HEADER.map((line) => `${line}\n`).join(""));
    });
  });

  describe("duplicates", () => {
    test("a repeated structured id warns and the later declaration wins in place", () => {
      store.ingest('##INFO=<ID=DP,Number=1,Type=Integer,Description="first">');
      store.ingest('##INFO=<ID=AF,Number=A,Type=Float,Description="af">');
      store.ingest('##INFO=<ID=DP,Number=1,Type=Integer,Description="second">');

      expect(store.get("INFO", "DP")?.description).toBe("second");
      expect([...store.info.keys()]).toEqual(["DP", "AF"]);
      expect(warnings).toEqual([["Duplicate INFO id 'DP', later declaration wins", 3]]);
    });

    test("a repeated generic key keeps every value in order", () => {
      store.ingest("##source=callerA");
      store.ingest("##source=callerB");
      expect(store.generic.get("source")).toEqual([
        { kind: "scalar", value: "callerA" },
        { kind: "scalar", value: "callerB" },
      ]);
      expect(store.getSingular("source")).toEqual({ kind: "scalar", value: "callerB" });
      expect(warnings).toEqual([]);
    });

    test("a repeated singular key is overwritten with a warning by default", () => {
      store.ingest("##fileformat=VCFv4.2");
      store.ingest("##fileformat=VCFv4.3");
      expect(store.generic.get("fileformat")).toEqual([{ kind: "scalar", value: "VCFv4.3" }]);
      expect(store.fileFormat).toBe("VCFv4.3");
      expect(warnings).toEqual([
        ["Metadata key 'fileformat' should occur once, later value wins", 2],
      ]);
    });

    test("a repeated singular key throws under the reject policy", () => {
      ({ store } = createStore({ singularMetadata: "reject" }));
      store.ingest("##fileDate=20240101");
      try {
        store.ingest("##fileDate=20240102");
        expect.unreachable("ingest should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(DuplicateMetadataError);
        if (error instanceof DuplicateMetadataError) {
          expect(error.key).toBe("fileDate");
          expect(error.lineNumber).toBe(2);
        }
      }
    });
  });

  describe("reserved fields", () => {
    test("warns when a reserved INFO id has another type", () => {
      store.ingest('##INFO=<ID=DP,Number=1,Type=String,Description="Depth">');
      expect(warnings).toEqual([
        ["Reserved INFO field 'DP' declared as String, expected Integer", 1],
      ]);
    });

    test("warns when a reserved FORMAT id has another type", () => {
      store.ingest('##FORMAT=<ID=GQ,Number=1,Type=Float,Description="Quality">');
      expect(warnings).toEqual([
        ["Reserved FORMAT field 'GQ' declared as Float, expected Integer", 1],
      ]);
    });

    test("stays quiet for matching or unreserved ids", () => {
      store.ingest('##INFO=<ID=DP,Number=1,Type=Integer,Description="Depth">');
      store.ingest('##INFO=<ID=CUSTOM,Number=1,Type=String,Description="Mine">');
      expect(warnings).toEqual([]);
    });

    test("can be switched off", () => {
      ({ store, warnings } = createStore({ warnOnReservedMismatch: false }));
      store.ingest('##INFO=<ID=DP,Number=1,Type=String,Description="Depth">');
      expect(warnings).toEqual([]);
    });
  });
});
