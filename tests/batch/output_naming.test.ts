import { describe, it, expect } from "vitest";
import { formatOutputName, sanitizeFilename } from "../../src/batch/output_naming.js";
import { RowLookup } from "../../src/tokens/resolver.js";

const row = new RowLookup({ Name: "Ana", Path: "a/b:c", Code: "-5", Blank: "   " });

describe("sanitizeFilename", () => {
  it("replaces reserved characters and trims", () => {
    expect(sanitizeFilename(' a<b>c:"d"/e\\f|g?h*i ')).toBe("a_b_c__d__e_f_g_h_i");
  });
});

describe("formatOutputName", () => {
  it("zero-pads the row index", () => {
    expect(formatOutputName("{index:04d}.pdf", row, 7)).toEqual({ ok: true, name: "0007.pdf" });
  });

  it("appends .pdf when the pattern has no extension", () => {
    expect(formatOutputName("{Name}_{index}", row, 3)).toEqual({ ok: true, name: "Ana_3.pdf" });
    expect(formatOutputName("{Name}.PDF", row, 3)).toEqual({ ok: true, name: "Ana.PDF" });
  });

  it("looks columns up case-insensitively and sanitizes values", () => {
    expect(formatOutputName("{name} {path}", row, 0)).toEqual({ ok: true, name: "Ana a_b_c.pdf" });
  });

  it("treats doubled braces as literal braces", () => {
    expect(formatOutputName("{{x}}-{Name}", row, 0)).toEqual({ ok: true, name: "{x}-Ana.pdf" });
  });

  it("pads negative numbers after the sign", () => {
    expect(formatOutputName("{Code:04d}", row, 0)).toEqual({ ok: true, name: "-005.pdf" });
  });

  it("reports a missing column", () => {
    expect(formatOutputName("{Zip}-{index}", row, 0)).toEqual({
      ok: false,
      error: 'Filename pattern requires a missing column: "Zip". Pattern: {Zip}-{index}',
    });
  });

  it("reports values the spec cannot format", () => {
    expect(formatOutputName("{Name:03d}", row, 0)).toEqual({
      ok: false,
      error: 'Cannot format "Ana" with ":03d" in filename pattern',
    });
  });

  it("reports unbalanced braces and empty names", () => {
    expect(formatOutputName("{Name", row, 0)).toEqual({ ok: false, error: 'Unmatched "{" in filename pattern "{Name"' });
    expect(formatOutputName("Name}", row, 0)).toEqual({ ok: false, error: 'Unmatched "}" in filename pattern "Name}"' });
    expect(formatOutputName("{Blank}", row, 0)).toEqual({
      ok: false,
      error: 'Filename pattern "{Blank}" produced an empty name',
    });
  });
});
