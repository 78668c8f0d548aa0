/**
 * Generate a sample letter template with known tokens.
 *
 * The template exercises the cases the substitution engine must handle:
 * a token split across two differently formatted runs, filters, defaults,
 * a table, a header and a footer.
 *
 * Used by the integration test and by `npm run fixture:generate`, which
 * writes the file under tests/fixtures/ for manual runs.
 */

import {
  Document,
  Footer,
  Header,
  Packer,
  Paragraph,
  TextRun,
  Table,
  TableRow,
  TableCell,
  WidthType,
} from "docx";
import { writeFileSync, mkdirSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURE_DIR = path.resolve(__dirname, "..", "tests", "fixtures");

function textPara(text: string): Paragraph {
  return new Paragraph({
    children: [new TextRun(text)],
  });
}

function cell(text: string): TableCell {
  return new TableCell({
    children: [textPara(text)],
    width: { size: 4500, type: WidthType.DXA },
  });
}

export async function generateFixtureDocx(): Promise<Buffer> {
  const children: (Paragraph | Table)[] = [];

  children.push(
    new Paragraph({
      children: [
        new TextRun("Dear {{Na"),
        new TextRun({ text: "me|trim|upper}}", bold: true }),
        new TextRun(","),
      ],
    }),
  );
  children.push(textPara("Your invoice dated {{Date|date}} is attached."));
  children.push(
    new Table({
      rows: [
        new TableRow({ children: [cell("Concept"), cell("Amount")] }),
        new TableRow({ children: [cell("{{Concept}}"), cell("{{Amount|currency}}")] }),
      ],
      width: { size: 9000, type: WidthType.DXA },
    }),
  );
  children.push(textPara("Reference: {{Reference?:N/A}}"));

  const doc = new Document({
    sections: [
      {
        headers: { default: new Header({ children: [textPara("{{Company?:ACME}}")] }) },
        footers: { default: new Footer({ children: [textPara("Page footer {{Footer?:}}")] }) },
        children,
      },
    ],
  });

  return Packer.toBuffer(doc);
}

async function main() {
  mkdirSync(FIXTURE_DIR, { recursive: true });

  const buf = await generateFixtureDocx();
  const docxPath = path.join(FIXTURE_DIR, "letter_template.docx");
  writeFileSync(docxPath, buf);
  console.log(`  ✓ Written fixture DOCX: ${docxPath} (${buf.length} bytes)`);
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
