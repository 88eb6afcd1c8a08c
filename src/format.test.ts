import { describe, expect, it } from "vitest";
import { parseIntegerLiteral, protectCapitals, stripDiacritics } from "./format.js";

describe("stripDiacritics", () => {
  it("maps accented letters to ASCII", () => {
    expect(stripDiacritics("Éloi")).toBe("Eloi");
    expect(stripDiacritics("Nováková")).toBe("Novakova");
  });

  it("leaves plain ASCII untouched", () => {
    expect(stripDiacritics("Nepusz")).toBe("Nepusz");
  });
});

describe("parseIntegerLiteral", () => {
  it("parses digit strings", () => {
    expect(parseIntegerLiteral("120")).toBe(120n);
    expect(parseIntegerLiteral("2010")).toBe(2010n);
  });

  it("accepts a sign and surrounding whitespace", () => {
    expect(parseIntegerLiteral("-3")).toBe(-3n);
    expect(parseIntegerLiteral(" 42 ")).toBe(42n);
  });

  it("rejects anything that is not a whole integer", () => {
    expect(parseIntegerLiteral("")).toBeUndefined();
    expect(parseIntegerLiteral("1.5")).toBeUndefined();
    expect(parseIntegerLiteral("120--135")).toBeUndefined();
    expect(parseIntegerLiteral("e12")).toBeUndefined();
  });
});

describe("protectCapitals", () => {
  it("braces uppercase runs after the first character", () => {
    expect(protectCapitals("SCPS: a fast implementation")).toBe("S{CPS}: a fast implementation");
  });

  it("braces every run separately", () => {
    expect(protectCapitals("Role of DNA in HIV")).toBe("Role of {DNA} in {HIV}");
  });

  it("leaves a lone leading capital alone", () => {
    expect(protectCapitals("Graph clustering")).toBe("Graph clustering");
  });

  it("ignores non-ASCII capitals", () => {
    expect(protectCapitals("a Ö b")).toBe("a Ö b");
  });
});
