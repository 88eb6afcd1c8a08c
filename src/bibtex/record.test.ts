import { describe, expect, it } from "vitest";
import { BibtexRecord, formatFieldValue } from "./record.js";

/**
 * Minimal reader for the rendered syntax: one `key = value` per line,
 * values either bare integers or a single outer brace pair.
 */
function readBibtex(text: string): {
  entryType: string;
  entryId: string;
  fields: Record<string, string>;
} {
  const header = /^@(\w+)\{([^,]+),\n/.exec(text);
  if (!header?.[1] || !header[2]) throw new Error(`Bad header: ${text}`);
  const body = text.slice(header[0].length, text.lastIndexOf("\n}"));
  const fields: Record<string, string> = {};
  for (const line of body.split("\n")) {
    if (line === "") continue;
    const match = /^ {2}(\S+) = (.*?),?$/.exec(line);
    if (!match?.[1] || match[2] === undefined) throw new Error(`Bad line: ${line}`);
    const raw = match[2];
    fields[match[1]] =
      raw.startsWith("{") && raw.endsWith("}") ? raw.slice(1, -1).replace(/[{}]/g, "") : raw;
  }
  return { entryType: header[1], entryId: header[2], fields };
}

describe("formatFieldValue", () => {
  it("renders integers bare", () => {
    expect(formatFieldValue("volume", "120")).toBe("120");
    expect(formatFieldValue("volume", 11)).toBe("11");
    expect(formatFieldValue("year", "2010")).toBe("2010");
  });

  it("keeps leading-zero numbers as literal strings", () => {
    expect(formatFieldValue("pages", "0120")).toBe("{0120}");
    expect(formatFieldValue("number", "0")).toBe("{0}");
  });

  it("braces non-numeric strings", () => {
    expect(formatFieldValue("pages", "120--135")).toBe("{120--135}");
    expect(formatFieldValue("journal", "BMC Bioinformatics")).toBe("{BMC Bioinformatics}");
    expect(formatFieldValue("note", "")).toBe("{}");
  });

  it("writes large integer numbers in full", () => {
    expect(formatFieldValue("volume", 1e21)).toBe("1000000000000000000000");
    expect(formatFieldValue("volume", -(2 ** 60))).toBe("-1152921504606846976");
  });

  it("braces non-integer numbers", () => {
    expect(formatFieldValue("note", 1.5)).toBe("{1.5}");
  });

  it("protects inner capitals in titles", () => {
    expect(formatFieldValue("title", "SCPS: a fast implementation")).toBe(
      "{S{CPS}: a fast implementation}",
    );
    expect(formatFieldValue("Title", "Role of DNA")).toBe("{Role of {DNA}}");
  });

  it("does not protect capitals outside titles", () => {
    expect(formatFieldValue("journal", "SCPS: a fast implementation")).toBe(
      "{SCPS: a fast implementation}",
    );
  });
});

describe("BibtexRecord", () => {
  it("exposes its entry type and id", () => {
    const record = new BibtexRecord("article", "nepusz10");
    expect(record.entryType).toBe("article");
    expect(record.entryId).toBe("nepusz10");
  });

  it("supports field assignment, lookup, deletion and count", () => {
    const record = new BibtexRecord("article", "x10");
    record.set("title", "A").set("year", "2010");
    expect(record.size).toBe(2);
    expect(record.get("title")).toBe("A");
    expect(record.has("year")).toBe(true);
    expect(record.delete("year")).toBe(true);
    expect(record.delete("year")).toBe(false);
    expect(record.get("year")).toBeUndefined();
    expect(record.size).toBe(1);
  });

  it("renders fields in sorted key order with no trailing comma", () => {
    const record = new BibtexRecord("article", "nepusz10")
      .set("year", "2010")
      .set("author", "Nepusz, T.")
      .set("pages", "120--135");

    expect(record.render()).toBe(
      [
        "@article{nepusz10,",
        "  author = {Nepusz, T.},",
        "  pages = {120--135},",
        "  year = 2010",
        "}",
      ].join("\n"),
    );
  });

  it("renders the same text regardless of assignment order", () => {
    const a = new BibtexRecord("article", "k").set("b", "1").set("a", "x").set("c", "y");
    const b = new BibtexRecord("article", "k").set("c", "y").set("a", "x").set("b", "1");
    expect(a.render()).toBe(b.render());
    expect(a.keys()).toEqual(["a", "b", "c"]);
  });

  it("renders an empty body when there are no fields", () => {
    expect(new BibtexRecord("article", "empty").render()).toBe("@article{empty,\n\n}");
  });

  it("overwrites a field on reassignment", () => {
    const record = new BibtexRecord("article", "k").set("volume", "1").set("volume", "2");
    expect(record.render()).toBe("@article{k,\n  volume = 2\n}");
  });

  it("matches toString with render", () => {
    const record = new BibtexRecord("article", "k").set("volume", "7");
    expect(`${record}`).toBe(record.render());
  });

  it("reads back into the same type, id and fields", () => {
    const record = new BibtexRecord("article", "eloi99")
      .set("author", "Éloi, M. and Yu, H.")
      .set("title", "Mapping the HIV genome")
      .set("journal", "Nucleic acids research")
      .set("year", "1999")
      .set("volume", "27")
      .set("number", "4")
      .set("pages", "0120")
      .set("doi", "10.1000/xyz");

    expect(readBibtex(record.render())).toEqual({
      entryType: "article",
      entryId: "eloi99",
      fields: {
        author: "Éloi, M. and Yu, H.",
        title: "Mapping the HIV genome",
        journal: "Nucleic acids research",
        year: "1999",
        volume: "27",
        number: "4",
        pages: "0120",
        doi: "10.1000/xyz",
      },
    });
  });
});
