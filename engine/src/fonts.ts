import { readFile, readdir } from "fs/promises";
import path from "path";
import type { PipelineWarning } from "./types.js";
import type { EmbeddedFont } from "./render.js";

const FONT_FORMATS: Record<string, { mimeType: string; format: string }> = {
  ".ttf": { mimeType: "font/ttf", format: "truetype" },
  ".otf": { mimeType: "font/otf", format: "opentype" },
  ".woff": { mimeType: "font/woff", format: "woff" },
  ".woff2": { mimeType: "font/woff2", format: "woff2" },
};
const FONT_EXTENSIONS = Object.keys(FONT_FORMATS);
export const FALLBACK_FONT_FAMILY = "sans-serif";

export interface FontResolution {
  family: string;
  file?: string;
  warning?: PipelineWarning;
}

function normalize(name: string): string {
  return name.toLowerCase().replace(/[\s_-]+/g, "");
}

/**
 * Look for a font file whose name starts with the requested family. A font
 * that cannot be found falls back to the generic family with a warning.
 */
export async function resolveFontFamily(font: string, fontsDir: string): Promise<FontResolution> {
  const wanted = normalize(font);
  let entries: string[] = [];
  try {
    entries = await readdir(fontsDir);
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code !== "ENOENT" && code !== "ENOTDIR") throw error;
  }
  const match = entries
    .filter((entry) => FONT_EXTENSIONS.includes(path.extname(entry).toLowerCase()))
    .sort()
    .find((entry) => normalize(path.basename(entry, path.extname(entry))).startsWith(wanted));
  if (match) return { family: font, file: path.join(fontsDir, match) };
  return {
    family: FALLBACK_FONT_FAMILY,
    warning: { kind: "AssetMissing", message: `Font "${font}" not found in ${fontsDir}; using ${FALLBACK_FONT_FAMILY}` },
  };
}

/** Read a font file for embedding in vector output. */
export async function loadFontFace(family: string, file: string): Promise<EmbeddedFont> {
  const kind = FONT_FORMATS[path.extname(file).toLowerCase()] ?? FONT_FORMATS[".ttf"];
  return { family, ...kind, data: await readFile(file) };
}
