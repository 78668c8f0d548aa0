/**
 * Engine selection and environment probing.
 */

import type { Logger } from "../shared/log.js";
import { silentLogger } from "../shared/log.js";
import { FallbackRenderer } from "./fallback.js";
import { LibreOfficeRenderer } from "./libreoffice.js";
import { MsOfficeRenderer } from "./msoffice.js";
import type { EngineName, LegacyConverter, Renderer } from "./types.js";

export interface EngineOptions {
  sofficeBin?: string;
  pdfFilterOptions?: string;
  logger?: Logger;
}

export interface SelectedEngine {
  renderer: Renderer;
  converter: LegacyConverter;
}

/**
 * auto:        Office first on Windows (LibreOffice as fallback), LibreOffice elsewhere
 * msoffice:    Office with LibreOffice fallback; LibreOffice off Windows
 * libreoffice: LibreOffice only
 */
export function selectRenderer(engine: EngineName, opts: EngineOptions = {}): SelectedEngine {
  const logger = opts.logger ?? silentLogger;
  const libreoffice = new LibreOfficeRenderer({ binary: opts.sofficeBin, pdfFilterOptions: opts.pdfFilterOptions });

  if (engine === "libreoffice") return { renderer: libreoffice, converter: libreoffice };

  if (!MsOfficeRenderer.supportedPlatform()) {
    if (engine === "msoffice") logger.warn("RENDER", "Microsoft Office is only available on Windows; using LibreOffice");
    return { renderer: libreoffice, converter: libreoffice };
  }

  return {
    renderer: new FallbackRenderer(new MsOfficeRenderer(), libreoffice, logger),
    converter: libreoffice,
  };
}

export interface EnvironmentReport {
  platform: string;
  libreoffice: { binary: string; version: string | null };
  msoffice: { available: boolean };
}

export async function checkEnvironment(opts: EngineOptions = {}): Promise<EnvironmentReport> {
  const libreoffice = new LibreOfficeRenderer({ binary: opts.sofficeBin });
  const [version, office] = await Promise.all([libreoffice.version(), new MsOfficeRenderer().isAvailable()]);
  return {
    platform: process.platform,
    libreoffice: { binary: libreoffice.binary, version },
    msoffice: { available: office },
  };
}
