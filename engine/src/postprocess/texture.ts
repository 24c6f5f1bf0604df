import { access, readFile } from "fs/promises";
import path from "path";
import sharp from "sharp";
import { z } from "zod";
import type { RasterCanvas } from "../types.js";
import { AssetMissingError, extractErrorMessage } from "../errors.js";
import { fromRaster, toRaster } from "../raster.js";
import { adjustBrightness, adjustContrast } from "./adjust.js";

const TextureManifest = z.object({
  categories: z.record(
    z.string(),
    z.object({
      description: z.string().optional(),
      textures: z.array(
        z.object({
          name: z.string().optional(),
          filename: z.string().min(1),
          path: z.string().min(1),
        })
      ),
    })
  ),
});

const SEARCH_DIRS = ["base", "specialty", "artistic", "edges", "stains", ""];
const SEARCH_EXTENSIONS = [".jpg", ".png", ".jpeg"];

async function exists(file: string): Promise<boolean> {
  return access(file).then(
    () => true,
    () => false
  );
}

async function readManifest(texturesDir: string): Promise<z.infer<typeof TextureManifest> | null> {
  const file = path.join(texturesDir, "manifest.json");
  if (!(await exists(file))) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, "utf8"));
  } catch (error) {
    throw new AssetMissingError("manifest.json", `Texture manifest is unreadable: ${extractErrorMessage(error)}`, {
      cause: error,
    });
  }
  const parsed = TextureManifest.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Locate a texture by name: manifest entries first, then the conventional
 * subdirectories with common image extensions.
 */
export async function findTexture(name: string, texturesDir: string): Promise<string | null> {
  const manifest = await readManifest(texturesDir);
  if (manifest) {
    for (const category of Object.keys(manifest.categories).sort()) {
      for (const texture of manifest.categories[category].textures) {
        const stem = path.basename(texture.filename, path.extname(texture.filename));
        if (stem !== name && texture.name !== name) continue;
        const file = path.resolve(texturesDir, texture.path);
        if (await exists(file)) return file;
      }
    }
  }
  for (const dir of SEARCH_DIRS) {
    for (const ext of SEARCH_EXTENSIONS) {
      const file = path.join(texturesDir, dir, `${name}${ext}`);
      if (await exists(file)) return file;
    }
  }
  return null;
}

/** Blend the texture over the canvas at `intensity`, then lift brightness and contrast by 10%. */
export async function applyTexture(
  canvas: RasterCanvas,
  name: string,
  intensity: number,
  texturesDir: string
): Promise<RasterCanvas> {
  const file = await findTexture(name, texturesDir);
  if (!file) throw new AssetMissingError(name, `Texture "${name}" not found in ${texturesDir}`);

  let overlay: Buffer;
  try {
    overlay = await sharp(file)
      .resize(canvas.width, canvas.height, { fit: "fill" })
      .removeAlpha()
      .toColourspace("srgb")
      .ensureAlpha(intensity)
      .raw()
      .toBuffer();
  } catch (error) {
    throw new AssetMissingError(name, `Texture "${name}" could not be decoded: ${extractErrorMessage(error)}`, {
      cause: error,
    });
  }

  const blended = await toRaster(
    fromRaster(canvas).composite([
      { input: overlay, raw: { width: canvas.width, height: canvas.height, channels: 4 }, blend: "over" },
    ]),
    canvas.width,
    canvas.height
  );
  return adjustContrast(await adjustBrightness(blended, 1.1), 1.1);
}
