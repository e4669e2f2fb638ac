/**
 * Tests for structured and generic header line parsing
 */

import { describe, expect, test } from "vitest";
import { FieldCountInvalidError, StructuredLineMalformedError } from "../../src/errors";
import {
  NO_VALUE,
  parseAltLine,
  parseContigLine,
  parseFilterLine,
  parseFormatLine,
  parseGenericLine,
  parseHeaderLine,
  parseInfoLine,
} from "../../src/formats/vcf/records";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

function malformed(fn: () => unknown): StructuredLineMalformedError {
  const error = thrown(fn);
  if (!(error instanceof StructuredLineMalformedError)) {
    throw new Error(`expected StructuredLineMalformedError, got ${String(error)}`);
  }
  return error;
}

describe("parseInfoLine", () => {
  test("parses the four required fields", () => {
    expect(parseInfoLine('##INFO=<ID=DP,Number=1,Type=Integer,Description="Total Depth">')).toEqual({
      id: "DP",
      number: { kind: "fixed", count: 1 },
      type: "Integer",
      description: "Total Depth",
    });
  });

  test("field order does not matter and quoted commas survive", () => {
    const record = parseInfoLine(
      '##INFO=<Description="Allele Frequency, per ALT",Type=Float,Number=A,ID=AF>'
    );
    expect(record.id).toBe("AF");
    expect(record.number).toEqual({ kind: "perAltAllele" });
    expect(record.type).toBe("Float");
    expect(record.description).toBe("Allele Frequency, per ALT");
  });

  test("reads optional Source and Version", () => {
    const record = parseInfoLine(
      '##INFO=<ID=RS,Number=.,Type=String,Description="dbSNP id",Source="dbsnp",Version="138">'
    );
    expect(record.source).toBe("dbsnp");
    expect(record.version).toBe("138");
  });

  test("accepts an unquoted Version", () => {
    const record = parseInfoLine(
      '##INFO=<ID=RS,Number=.,Type=String,Description="dbSNP id",Version=2>'
    );
    expect(record.version).toBe("2");
    expect("source" in record).toBe(false);
  });

  test("keeps an empty description", () => {
    expect(parseInfoLine('##INFO=<ID=X,Number=0,Type=Flag,Description="">').description).toBe("");
  });

  test("tolerates spaces after commas and trailing whitespace", () => {
    const record = parseInfoLine(
      '##INFO=<ID=DP, Number=1, Type=Integer, Description="Depth">  '
    );
    expect(record.number).toEqual({ kind: "fixed", count: 1 });
    expect(record.description).toBe("Depth");
  });

  test("returns a frozen record", () => {
    const record = parseInfoLine('##INFO=<ID=DP,Number=1,Type=Integer,Description="Depth">');
    expect(Object.isFrozen(record)).toBe(true);
  });

  test("rejects a missing required field", () => {
    const line = "##INFO=<ID=DP,Number=1,Type=Integer>";
    const error = malformed(() => parseInfoLine(line));
    expect(error.tag).toBe("INFO");
    expect(error.rawLine).toBe(line);
    expect(error.message).toBe(
      "One of the INFO lines is malformed: missing required field 'Description'"
    );
  });

  test("rejects an empty ID", () => {
    const error = malformed(() =>
      parseInfoLine('##INFO=<ID=,Number=1,Type=Integer,Description="d">')
    );
    expect(error.reason).toBe("ID must not be empty");
  });

  test("rejects an unknown Type", () => {
    const error = malformed(() =>
      parseInfoLine('##INFO=<ID=DP,Number=1,Type=Number,Description="d">')
    );
    expect(error.reason).toBe("unknown Type 'Number'");
  });

  test("rejects an unquoted Description", () => {
    const error = malformed(() =>
      parseInfoLine("##INFO=<ID=DP,Number=1,Type=Integer,Description=Depth>")
    );
    expect(error.reason).toBe("Description must be a quoted string");
  });

  test("rejects a body outside angle brackets", () => {
    const error = malformed(() => parseInfoLine("##INFO=ID=DP"));
    expect(error.reason).toBe("attributes must be enclosed in '<' and '>'");
  });

  test("rejects a line without '='", () => {
    const error = malformed(() => parseInfoLine("##INFO"));
    expect(error.reason).toBe("expected '##INFO=<...>'");
  });

  test("reports an invalid Number with its line", () => {
    const line = '##INFO=<ID=DP,Number=x,Type=Integer,Description="d">';
    const error = thrown(() => parseInfoLine(line, 4));
    expect(error).toBeInstanceOf(FieldCountInvalidError);
    if (error instanceof FieldCountInvalidError) {
      expect(error.token).toBe("x");
      expect(error.lineNumber).toBe(4);
      expect(error.context).toBe(line);
    }
  });
});

describe("parseFormatLine", () => {
  test("parses a genotype declaration", () => {
    expect(
      parseFormatLine('##FORMAT=<ID=GT,Number=1,Type=String,Description="Genotype">')
    ).toEqual({
      id: "GT",
      number: { kind: "fixed", count: 1 },
      type: "String",
      description: "Genotype",
    });
  });

  test("decodes per-genotype and per-allele counts", () => {
    expect(
      parseFormatLine('##FORMAT=<ID=PL,Number=G,Type=Integer,Description="Likelihoods">').number
    ).toEqual({ kind: "perGenotype" });
    expect(
      parseFormatLine('##FORMAT=<ID=AD,Number=R,Type=Integer,Description="Depths">').number
    ).toEqual({ kind: "perAlleleIncludingRef" });
  });

  test("requires Type", () => {
    const error = malformed(() => parseFormatLine('##FORMAT=<ID=GT,Number=1,Description="d">'));
    expect(error.tag).toBe("FORMAT");
    expect(error.reason).toBe("missing required field 'Type'");
  });
});

describe("parseFilterLine and parseAltLine", () => {
  test("parse id and description", () => {
    expect(parseFilterLine('##FILTER=<ID=q10,Description="Quality below 10">')).toEqual({
      id: "q10",
      description: "Quality below 10",
    });
    expect(parseAltLine('##ALT=<ID=DEL:ME,Description="Deletion of mobile element">')).toEqual({
      id: "DEL:ME",
      description: "Deletion of mobile element",
    });
  });

  test("FILTER requires Description", () => {
    const error = malformed(() => parseFilterLine("##FILTER=<ID=q10>"));
    expect(error.tag).toBe("FILTER");
    expect(error.reason).toBe("missing required field 'Description'");
  });

  test("ALT requires ID", () => {
    const error = malformed(() => parseAltLine('##ALT=<Description="d">'));
    expect(error.tag).toBe("ALT");
    expect(error.reason).toBe("missing required field 'ID'");
  });
});

describe("parseContigLine", () => {
  test("parses id and length and drops other attributes", () => {
    expect(
      parseContigLine('##contig=<ID=chr1,length=248956422,assembly=B38,md5="abc">')
    ).toEqual({ id: "chr1", length: 248956422 });
  });

  test("length is optional", () => {
    const record = parseContigLine("##contig=<ID=chr20>");
    expect(record).toEqual({ id: "chr20" });
    expect("length" in record).toBe(false);
  });

  test("reads length=. as no length", () => {
    const record = parseContigLine("##contig=<ID=chrUn,length=.>");
    expect(record).toEqual({ id: "chrUn" });
    expect("length" in record).toBe(false);
  });

  test("rejects a Number code as length", () => {
    expect(() => parseContigLine("##contig=<ID=chr1,length=A>")).toThrow(FieldCountInvalidError);
  });

  test("rejects a non-integer length", () => {
    const error = thrown(() => parseContigLine("##contig=<ID=chr1,length=12kb>", 9));
    expect(error).toBeInstanceOf(FieldCountInvalidError);
    if (error instanceof FieldCountInvalidError) {
      expect(error.token).toBe("12kb");
      expect(error.lineNumber).toBe(9);
    }
  });
});

describe("parseGenericLine", () => {
  test("splits a scalar line on the first '='", () => {
    expect(parseGenericLine("##fileformat=VCFv4.2")).toEqual({
      key: "fileformat",
      value: { kind: "scalar", value: "VCFv4.2" },
    });
    expect(parseGenericLine("##source=caller=v2").value).toEqual({
      kind: "scalar",
      value: "caller=v2",
    });
  });

  test("keeps keys and values verbatim", () => {
    expect(parseGenericLine("## spaced = x ")).toEqual({
      key: " spaced ",
      value: { kind: "scalar", value: " x " },
    });
  });

  test("an empty value is an empty scalar", () => {
    expect(parseGenericLine("##reference=").value).toEqual({ kind: "scalar", value: "" });
  });

  test("a line without '=' has no value", () => {
    const metadata = parseGenericLine("##bare");
    expect(metadata.key).toBe("bare");
    expect(metadata.value).toBe(NO_VALUE);
  });

  test("a bracketed body becomes an ordered attribute map", () => {
    const { key, value } = parseGenericLine('##SAMPLE=<ID=S1,Assay=WGS,Description="A, B">');
    expect(key).toBe("SAMPLE");
    expect(value.kind).toBe("attributes");
    if (value.kind === "attributes") {
      expect([...value.attributes]).toEqual([
        ["ID", "S1"],
        ["Assay", "WGS"],
        ["Description", '"A, B"'],
      ]);
    }
  });

  test("square brackets work the same way", () => {
    const { value } = parseGenericLine("##PEDIGREE=[Child=C1,Mother=M1]");
    if (value.kind !== "attributes") throw new Error("expected attributes");
    expect([...value.attributes]).toEqual([
      ["Child", "C1"],
      ["Mother", "M1"],
    ]);
  });

  test("the attribute map cannot be modified", () => {
    const { value } = parseGenericLine("##SAMPLE=<ID=S1>");
    if (value.kind !== "attributes") throw new Error("expected attributes");
    const attributes = value.attributes;
    expect(attributes).toBeInstanceOf(Map);
    if (attributes instanceof Map) {
      expect(() => attributes.set("ID", "S2")).toThrow(TypeError);
      expect(() => attributes.delete("ID")).toThrow(TypeError);
      expect(() => attributes.clear()).toThrow(TypeError);
    }
    expect(attributes.get("ID")).toBe("S1");
  });

  test("never throws on malformed vendor lines", () => {
    expect(() => parseGenericLine('##vendor=<broken="x')).not.toThrow();
    expect(() => parseGenericLine("##=")).not.toThrow();
  });
});

describe("parseHeaderLine", () => {
  test("dispatches on the tag and attaches the line number", () => {
    expect(parseHeaderLine('##FILTER=<ID=q10,Description="Low">', 3)).toEqual({
      kind: "FILTER",
      record: { id: "q10", description: "Low" },
      lineNumber: 3,
    });
  });

  test("omits the line number when none is given or it is not wanted", () => {
    expect(parseHeaderLine("##contig=<ID=chrM>")).toEqual({
      kind: "contig",
      record: { id: "chrM" },
    });
    const entry = parseHeaderLine("##contig=<ID=chrM>", 5, false);
    expect("lineNumber" in entry).toBe(false);
  });

  test("lowercase structured tags are generic", () => {
    const entry = parseHeaderLine("##info=<ID=DP>");
    expect(entry.kind).toBe("generic");
  });

  test("errors carry the line number and raw line", () => {
    const error = malformed(() => parseHeaderLine("##FILTER=<ID=q10>", 7));
    expect(error.lineNumber).toBe(7);
    expect(error.context).toBe("##FILTER=<ID=q10>");
    expect(error.toString().split("\n")[0]).toBe(
      "StructuredLineMalformedError: One of the FILTER lines is malformed: missing required field 'Description' (line 7)"
    );
  });

  test("a structured tag without a body is malformed, not generic", () => {
    const error = malformed(() => parseHeaderLine("##INFO"));
    expect(error.tag).toBe("INFO");
  });
});
