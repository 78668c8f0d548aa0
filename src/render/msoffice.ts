/**
 * Microsoft Office renderer — PowerShell COM automation, Windows only.
 *
 * Paths travel through environment variables so no quoting of user paths
 * ever happens inside the script text.
 */

import { existsSync } from "fs";
import path from "path";
import { RendererError } from "../shared/errors.js";
import { runProcess } from "./process.js";
import type { Renderer } from "./types.js";

const WORD_SCRIPT = `
$ErrorActionPreference = 'Stop'
$app = New-Object -ComObject Word.Application
$app.Visible = $false
$app.DisplayAlerts = 0
try {
  $doc = $app.Documents.Open($env:TOKENFILL_IN, $false, $true)
  try { $doc.ExportAsFixedFormat($env:TOKENFILL_OUT, 17) } finally { $doc.Close($false) }
} finally { $app.Quit() }
`;

const POWERPOINT_SCRIPT = `
$ErrorActionPreference = 'Stop'
$app = New-Object -ComObject PowerPoint.Application
try {
  $pres = $app.Presentations.Open($env:TOKENFILL_IN, $true, $false, $false)
  try { $pres.SaveAs($env:TOKENFILL_OUT, 32) } finally { $pres.Close() }
} finally { $app.Quit() }
`;

const PROBE_SCRIPT = `
$ErrorActionPreference = 'Stop'
$app = New-Object -ComObject Word.Application
$app.Quit()
`;

function powershellArgs(script: string): string[] {
  return ["-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass", "-Command", script];
}

export class MsOfficeRenderer implements Renderer {
  readonly name = "msoffice";
  readonly reentrant = false;
  private readonly shell: string;

  constructor(shell = "powershell.exe") {
    this.shell = shell;
  }

  static supportedPlatform(): boolean {
    return process.platform === "win32";
  }

  /** True when Word can be automated on this machine. */
  async isAvailable(): Promise<boolean> {
    if (!MsOfficeRenderer.supportedPlatform()) return false;
    try {
      const result = await runProcess(this.shell, powershellArgs(PROBE_SCRIPT));
      return result.code === 0;
    } catch {
      return false;
    }
  }

  async render(inputPath: string, outDir: string, signal?: AbortSignal): Promise<string> {
    if (!MsOfficeRenderer.supportedPlatform()) {
      throw new RendererError("Microsoft Office rendering is only available on Windows");
    }
    const ext = path.extname(inputPath).toLowerCase();
    const script = ext.startsWith(".pp") ? POWERPOINT_SCRIPT : WORD_SCRIPT;
    const outPath = path.resolve(outDir, path.basename(inputPath, ext) + ".pdf");

    const result = await runProcess(this.shell, powershellArgs(script), {
      signal,
      env: { ...process.env, TOKENFILL_IN: path.resolve(inputPath), TOKENFILL_OUT: outPath },
    });
    if (result.code !== 0 || !existsSync(outPath)) {
      const detail = result.stderr.trim() || `exit code ${result.code}`;
      throw new RendererError(`Office could not export ${path.basename(inputPath)}: ${detail}`, { inputPath });
    }
    return outPath;
  }
}
