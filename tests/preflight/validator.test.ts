import { describe, it, expect } from "vitest";
import { openDocument } from "../../src/document/open.js";
import { scanDocument } from "../../src/document/scanner.js";
import { templateTokens, validatePreflight } from "../../src/preflight/validator.js";
import type { TemplateTokens } from "../../src/preflight/validator.js";
import { buildDocx, wText } from "../helpers/ooxml.js";

function tokensOf(name: string, ...paragraphs: string[]): TemplateTokens {
  const doc = openDocument(buildDocx(paragraphs.map((p) => wText(p)).join("")), "docx");
  return templateTokens(name, scanDocument(doc));
}

describe("validatePreflight", () => {
  it("reports missing and unused columns, sorted", () => {
    const t = tokensOf("a.docx", "{{Name}} {{Zip}} {{City|upper}}");
    const result = validatePreflight([t], ["Name", "Phone", "City", "Age"]);
    expect(result.missingColumns).toEqual(["Zip"]);
    expect(result.unusedColumns).toEqual(["Age", "Phone"]);
  });

  it("does not report a field that has a default anywhere", () => {
    const t1 = tokensOf("a.docx", "{{Ref}}");
    const t2 = tokensOf("b.docx", "{{Ref?:none}}");
    expect(validatePreflight([t1, t2], []).missingColumns).toEqual([]);
  });

  it("matches case-insensitively unless asked otherwise", () => {
    const t = tokensOf("a.docx", "{{name}}");
    expect(validatePreflight([t], ["NAME"])).toMatchObject({ missingColumns: [], unusedColumns: [] });
    expect(validatePreflight([t], ["NAME"], { fieldMatching: "sensitive" })).toMatchObject({
      missingColumns: ["name"],
      unusedColumns: ["NAME"],
    });
  });

  it("never lists control columns as unused", () => {
    const t = tokensOf("a.docx", "{{Name}}");
    const result = validatePreflight([t], ["Name", "TEMPLATE", "skip", "Output"]);
    expect(result.unusedColumns).toEqual([]);
  });

  it("collects tokens, parse errors and warnings per template", () => {
    const t = tokensOf("a.docx", "{{A}} {{|upper}}", "open {{B");
    const result = validatePreflight([t], ["A"]);

    expect(result.perTemplateTokens["a.docx"].map((e) => e.fieldName)).toEqual(["A"]);
    expect(result.parseErrors).toEqual([
      { template: "a.docx", raw: "|upper", message: "Invalid token {{|upper}}: field name is empty" },
    ]);
    expect(result.warnings).toEqual(['a.docx: Unterminated "{{" in word/document.xml: "{{B"']);
  });

  it("keeps the two lists disjoint", () => {
    const t = tokensOf("a.docx", "{{X}} {{Y}}");
    const result = validatePreflight([t], ["x", "Z"]);
    expect(result.missingColumns).toEqual(["Y"]);
    expect(result.unusedColumns).toEqual(["Z"]);
  });
});
