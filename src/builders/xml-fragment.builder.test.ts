import { describe, expect, it } from "vitest";

import { encodeValue, escapeXml } from "./xml-fragment.builder";

describe("escapeXml", () => {
  it("escapes the five reserved characters", () => {
    expect(escapeXml(`a&b<c>d"e'f`)).toBe(
      "a&amp;b&lt;c&gt;d&quot;e&apos;f",
    );
  });

  it("leaves plain text alone", () => {
    expect(escapeXml("Santiago 123")).toBe("Santiago 123");
  });
});

describe("encodeValue", () => {
  it("encodes a named map with fields in insertion order", () => {
    expect(
      encodeValue({ Country: "CL", Amount: 100, Active: true }, "Rates2Request"),
    ).toBe(
      "<mmt:Rates2Request>" +
        "<mmt:Country>CL</mmt:Country>" +
        "<mmt:Amount>100</mmt:Amount>" +
        "<mmt:Active>true</mmt:Active>" +
        "</mmt:Rates2Request>",
    );
  });

  it("merges an unnamed map into its parent", () => {
    expect(encodeValue({ A: "1", B: "2" })).toBe(
      "<mmt:A>1</mmt:A><mmt:B>2</mmt:B>",
    );
  });

  it("keeps Map insertion order", () => {
    const fields = new Map<string, string>([
      ["Zeta", "z"],
      ["Alpha", "a"],
    ]);
    expect(encodeValue(fields, "Req")).toBe(
      "<mmt:Req><mmt:Zeta>z</mmt:Zeta><mmt:Alpha>a</mmt:Alpha></mmt:Req>",
    );
  });

  it("repeats the tag once per sequence item", () => {
    expect(encodeValue({ Tax: ["1.5", "2.5"] })).toBe(
      "<mmt:Tax>1.5</mmt:Tax><mmt:Tax>2.5</mmt:Tax>",
    );
  });

  it("writes null as an empty element and skips undefined fields", () => {
    expect(
      encodeValue({ MiddleName: null, MaidenName: undefined, LastName: "Soto" }),
    ).toBe("<mmt:MiddleName></mmt:MiddleName><mmt:LastName>Soto</mmt:LastName>");
  });

  it("escapes text content inside nested maps", () => {
    expect(
      encodeValue({ Customer: { FirstName: "Ana & <Bea>" } }, "OrderInfo"),
    ).toBe(
      "<mmt:OrderInfo><mmt:Customer>" +
        "<mmt:FirstName>Ana &amp; &lt;Bea&gt;</mmt:FirstName>" +
        "</mmt:Customer></mmt:OrderInfo>",
    );
  });

  it("uses the given prefix", () => {
    expect(encodeValue("x", "Note", "ns1")).toBe("<ns1:Note>x</ns1:Note>");
  });

  it("returns an empty string for an unnamed null", () => {
    expect(encodeValue(null)).toBe("");
  });
});
