#!/usr/bin/env node
/**
 * CLI: tokenfill-scan
 *
 * Usage: npm run tokenfill:scan -- <template.docx|template.pptx>
 *
 * Lists the tokens of one template (with region and filters), followed by
 * parse errors and unterminated-token warnings.
 */

import { readFileSync } from "fs";
import path from "path";
import { classifyTemplate, openDocument } from "../document/open.js";
import { scanDocument, scannedExpressions } from "../document/scanner.js";
import { errorMessage } from "../shared/errors.js";
import { serializeToken } from "../tokens/grammar.js";

async function main() {
  const args = process.argv.slice(2);
  const templatePath = args.find((a) => !a.startsWith("--"));
  if (!templatePath) {
    console.error("Usage: npm run tokenfill:scan -- <template.docx|template.pptx>");
    process.exit(1);
  }

  const kind = classifyTemplate(templatePath);
  if (kind.kind !== "native") {
    console.error(`  ✗ Only .docx and .pptx templates can be scanned directly: ${templatePath}`);
    process.exit(1);
  }

  const doc = openDocument(readFileSync(templatePath), kind.format, {}, path.basename(templatePath));
  const scan = scanDocument(doc);

  console.log(`  Template: ${path.basename(templatePath)} (${doc.format})`);
  console.log(`  Occurrences: ${scan.occurrences.length}`);
  console.log();

  for (const occ of scan.occurrences) {
    const region = doc.region(occ.location.region);
    console.log(`    {{${occ.raw}}}  [${region.kind} ${region.part}]`);
  }

  const distinct = scannedExpressions(scan);
  if (distinct.length > 0) {
    console.log();
    console.log("  Distinct tokens:");
    for (const expr of distinct) console.log(`    - ${serializeToken(expr)}`);
  }

  if (scan.parseErrors.length > 0) {
    console.log();
    console.log("  Parse errors:");
    for (const pe of scan.parseErrors) console.log(`    ✗ ${pe.error.message}`);
  }

  if (scan.warnings.length > 0) {
    console.log();
    console.log("  Warnings:");
    for (const w of scan.warnings) console.log(`    ! ${w.message}`);
  }

  if (scan.parseErrors.length > 0) process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error(`  ✗ ${errorMessage(err)}`);
  process.exit(1);
});
