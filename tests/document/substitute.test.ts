/**
 * Substitution Engine Tests (word-processing)
 *
 * "First span absorbs, rest truncated", byte preservation outside tokens,
 * encoding of values and strict-mode all-or-nothing behavior.
 */

import { describe, it, expect } from "vitest";
import { containerTexts, openDocument } from "../../src/document/open.js";
import { scanDocument } from "../../src/document/scanner.js";
import { substituteDocument } from "../../src/document/substitute.js";
import type { TextDocument } from "../../src/document/types.js";
import { FilterRegistry } from "../../src/tokens/filters.js";
import type { RowValues } from "../../src/tokens/resolver.js";
import { ResolveError } from "../../src/shared/errors.js";
import { buildDocx, readPartText, wPara, wRun, wText } from "../helpers/ooxml.js";

const registry = new FilterRegistry();

function fill(pkg: Buffer, row: RowValues, strict = false) {
  const doc = openDocument(pkg, "docx");
  const result = substituteDocument(doc, scanDocument(doc), row, { strict, registry });
  const out = doc.toBuffer();
  return { result, out, reopened: openDocument(out, "docx"), xml: readPartText(out, "word/document.xml") };
}

function spanTexts(doc: TextDocument, region = 0): string[][] {
  return doc.containers(region).map((c) => doc.spans(c).map((s) => doc.spanText(s)));
}

describe("substituteDocument — span handling", () => {
  it("coalesces a token split across two spans", () => {
    const { reopened } = fill(buildDocx(wText("A {{X", "}} B")), { X: "1" });
    expect(containerTexts(reopened)).toEqual(["A 1 B"]);
    expect(spanTexts(reopened)).toEqual([["A 1", " B"]]);
  });

  it("removes emptied runs that hold nothing but the span", () => {
    const { reopened, xml } = fill(buildDocx(wText("Dear {{Na", "me", "}}!")), { Name: "Ana" });
    expect(spanTexts(reopened)).toEqual([["Dear Ana", "!"]]);
    expect(xml).not.toContain(">me<");
  });

  it("keeps an emptied span whose run has other content", () => {
    const body = wPara(wRun("Dear {{Na"), "<w:r><w:t>me</w:t><w:tab/></w:r>", wRun("}}!"));
    const { reopened, xml } = fill(buildDocx(body), { Name: "Ana" });
    expect(spanTexts(reopened)).toEqual([["Dear Ana", "", "!"]]);
    expect(xml).toContain('<w:r><w:t xml:space="preserve"></w:t><w:tab/></w:r>');
  });

  it("replaces a single-span token in place, keeping run properties", () => {
    const body = wPara(wRun("Hello {{Name}}, welcome", "<w:rPr><w:b/></w:rPr>"));
    const { xml } = fill(buildDocx(body), { Name: "Ana" });
    expect(xml).toContain('<w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">Hello Ana, welcome</w:t></w:r>');
  });

  it("leaves text outside tokens byte-for-byte unchanged", () => {
    const untouched = "<w:p><w:r><w:t>Static &amp; text</w:t></w:r></w:p>";
    const { xml } = fill(buildDocx(untouched + wText("{{A}}")), { A: "x" });
    expect(xml).toContain(untouched);
  });

  it("replaces several tokens in one span", () => {
    const { reopened } = fill(buildDocx(wText("{{A}}-{{B}}")), { A: "1", B: "22" });
    expect(containerTexts(reopened)).toEqual(["1-22"]);
  });

  it("resolves the worked scenario across runs", () => {
    const pkg = buildDocx(wText("{{Name|tr", "im|upper}} owes {{Amount|currency}} ref {{Missing?:N/A}}"));
    const { reopened } = fill(pkg, { Name: "  ana  ", Amount: "1234.5" });
    expect(containerTexts(reopened)).toEqual(["ANA owes 1,234.50 ref N/A"]);
  });

  it("substitutes in headers and footers", () => {
    const pkg = buildDocx(wText("body"), { headers: [wText("{{Company}}")], footers: [wText("p. {{Page?:1}}")] });
    const { out } = fill(pkg, { Company: "Globex" });
    expect(readPartText(out, "word/header1.xml")).toContain('<w:t xml:space="preserve">Globex</w:t>');
    expect(readPartText(out, "word/footer1.xml")).toContain('<w:t xml:space="preserve">p. 1</w:t>');
  });
});

describe("substituteDocument — values", () => {
  it("turns newlines into line breaks", () => {
    const { xml } = fill(buildDocx(wText("{{Address}}")), { Address: "line1\nline2" });
    expect(xml).toContain('<w:t xml:space="preserve">line1</w:t><w:br/><w:t xml:space="preserve">line2</w:t>');
  });

  it("escapes XML special characters", () => {
    const { xml } = fill(buildDocx(wText("{{V}}")), { V: '<b> & "q"' });
    expect(xml).toContain('<w:t xml:space="preserve">&lt;b&gt; &amp; &quot;q&quot;</w:t>');
  });

  it("drops characters XML does not allow", () => {
    const { reopened } = fill(buildDocx(wText("{{V}}")), { V: "a\u0001b" });
    expect(containerTexts(reopened)).toEqual(["ab"]);
  });

  it("resolves missing fields to empty when not strict", () => {
    const { reopened } = fill(buildDocx(wText("Hi {{Missing}}!")), {});
    expect(containerTexts(reopened)).toEqual(["Hi !"]);
  });

  it("reports filter warnings tagged with the field", () => {
    const { result } = fill(buildDocx(wText("{{Amount|currency}}")), { Amount: "abc" });
    expect(result.replaced).toBe(1);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].field).toBe("Amount");
    expect(result.warnings[0].kind).toBe("UnparseableInput");
  });
});

describe("substituteDocument — strict mode", () => {
  it("throws before mutating anything", () => {
    const pkg = buildDocx(wText("{{A}} {{Missing}}"));
    const doc = openDocument(pkg, "docx");
    const scan = scanDocument(doc);

    expect(() => substituteDocument(doc, scan, { A: "1" }, { strict: true, registry })).toThrow(ResolveError);
    expect(containerTexts(doc)).toEqual(["{{A}} {{Missing}}"]);
    expect(readPartText(doc.toBuffer(), "word/document.xml")).toBe(readPartText(pkg, "word/document.xml"));
  });

  it("succeeds when every field is present", () => {
    const { reopened } = fill(buildDocx(wText("{{A}}")), { a: "1" }, true);
    expect(containerTexts(reopened)).toEqual(["1"]);
  });
});
