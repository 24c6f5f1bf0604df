import { randomUUID } from "crypto";
import { link, mkdir, rm, writeFile } from "fs/promises";
import path from "path";
import PDFDocument from "pdfkit";
import extractChunks from "png-chunks-extract";
import encodeChunks from "png-chunks-encode";
import * as pngText from "png-chunk-text";
import type { Canvas, OutputFormat, PosterMetadata, PosterSpec, RasterCanvas } from "./types.js";
import { ExportError, extractErrorMessage } from "./errors.js";
import { fromRaster, rasterize } from "./raster.js";
import { escapeXml } from "./labels.js";

export interface ExportOptions {
  outputDir: string;
}

const EXTENSIONS: Record<OutputFormat, string> = { png: "png", jpg: "jpg", jpeg: "jpeg", svg: "svg", pdf: "pdf" };

export function slugify(value: string): string {
  const slug = value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug || "poster";
}

export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function posterFileStem(metadata: PosterMetadata): string {
  return `${slugify(metadata.city)}_${slugify(metadata.theme)}_${formatTimestamp(metadata.createdAt)}`;
}

export function locationLabel(metadata: PosterMetadata): string {
  return [metadata.city, metadata.state, metadata.country].filter((part) => part && part.length > 0).join(", ");
}

/** Key/value pairs embedded in every format that can carry them. */
export function metadataFields(metadata: PosterMetadata): Record<string, string> {
  return {
    Title: `${metadata.city} Map Poster`,
    Artist: metadata.artist,
    Software: metadata.software,
    "Creation Time": metadata.createdAt.toISOString(),
    theme: metadata.theme,
    latitude: metadata.coordinate.latitude.toFixed(6),
    longitude: metadata.coordinate.longitude.toFixed(6),
    location: locationLabel(metadata),
  };
}

export function posterFileName(stem: string, ext: string, n: number): string {
  return n < 2 ? `${stem}.${ext}` : `${stem}_${n}.${ext}`;
}

function isTaken(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

/**
 * Hard-links the finished file under the first free name: `<stem>.<ext>`,
 * then `<stem>_2.<ext>`, `<stem>_3.<ext>`... `link` fails on an existing
 * name, so two writers never end up on the same path.
 */
export async function claimPosterPath(source: string, outputDir: string, stem: string, ext: string): Promise<string> {
  for (let n = 1; ; n++) {
    const candidate = path.join(outputDir, posterFileName(stem, ext, n));
    try {
      await link(source, candidate);
      return candidate;
    } catch (error) {
      if (!isTaken(error)) throw error;
    }
  }
}

async function encodePng(canvas: RasterCanvas, spec: PosterSpec, fields: Record<string, string>): Promise<Buffer> {
  const png = await fromRaster(canvas).withMetadata({ density: spec.dpi }).png({ compressionLevel: 9 }).toBuffer();
  const chunks = extractChunks(png);
  const textChunks = Object.entries(fields).map(([keyword, text]) => pngText.encode(keyword, text));
  chunks.splice(chunks.length - 1, 0, ...textChunks);
  return Buffer.from(encodeChunks(chunks));
}

async function encodeJpeg(canvas: RasterCanvas, spec: PosterSpec, metadata: PosterMetadata): Promise<Buffer> {
  const fields = metadataFields(metadata);
  return fromRaster(canvas)
    .withMetadata({ density: spec.dpi })
    .withExif({
      IFD0: {
        Artist: metadata.artist,
        Software: metadata.software,
        DateTime: metadata.createdAt.toISOString().slice(0, 19).replace("T", " ").replace(/-/g, ":"),
        ImageDescription: JSON.stringify(fields),
      },
    })
    .jpeg({ quality: 95 })
    .toBuffer();
}

async function encodePdf(canvas: RasterCanvas, spec: PosterSpec, metadata: PosterMetadata): Promise<Buffer> {
  const image = await fromRaster(canvas).png().toBuffer();
  const pageWidth = spec.widthInches * 72;
  const pageHeight = spec.heightInches * 72;
  const doc = new PDFDocument({
    size: [pageWidth, pageHeight],
    margin: 0,
    info: {
      Title: `${metadata.city} Map Poster`,
      Author: metadata.artist,
      Subject: `Map of ${locationLabel(metadata)}`,
      Keywords: `theme:${metadata.theme}, lat:${metadata.coordinate.latitude.toFixed(6)}, lon:${metadata.coordinate.longitude.toFixed(6)}`,
      Creator: metadata.software,
      Producer: metadata.software,
      CreationDate: metadata.createdAt,
    },
  });
  const parts: Buffer[] = [];
  const done = new Promise<Buffer>((resolve, reject) => {
    doc.on("data", (chunk: Buffer) => parts.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(parts)));
    doc.on("error", reject);
  });
  doc.image(image, 0, 0, { width: pageWidth, height: pageHeight });
  doc.end();
  return done;
}

function annotateSvg(svg: string, metadata: PosterMetadata): string {
  const open = svg.indexOf(">");
  if (open < 0) throw new ExportError("Vector canvas is not an SVG document");
  const header =
    `<title>${escapeXml(`${metadata.city} Map Poster`)}</title>` +
    `<metadata>${escapeXml(JSON.stringify(metadataFields(metadata)))}</metadata>`;
  return svg.slice(0, open + 1) + header + svg.slice(open + 1);
}

async function encode(canvas: Canvas, spec: PosterSpec, metadata: PosterMetadata): Promise<Buffer> {
  if (spec.format === "svg") {
    if (canvas.kind !== "vector") throw new ExportError("SVG output needs a vector canvas");
    return Buffer.from(annotateSvg(canvas.svg, metadata), "utf8");
  }
  const raster = canvas.kind === "raster" ? canvas : await rasterize(canvas);
  switch (spec.format) {
    case "png":
      return encodePng(raster, spec, metadataFields(metadata));
    case "jpg":
    case "jpeg":
      return encodeJpeg(raster, spec, metadata);
    case "pdf":
      return encodePdf(raster, spec, metadata);
  }
}

/**
 * Encode and write the poster under a fresh file name. The bytes land in a
 * temporary file that is linked into place; on failure nothing is left behind.
 */
export async function exportPoster(
  canvas: Canvas,
  spec: PosterSpec,
  metadata: PosterMetadata,
  options: ExportOptions
): Promise<string> {
  const ext = EXTENSIONS[spec.format];
  if (!ext) throw new ExportError(`Unsupported output format "${String(spec.format)}"`);

  let tempFile: string | undefined;
  try {
    const bytes = await encode(canvas, spec, metadata);
    await mkdir(options.outputDir, { recursive: true });
    const stem = posterFileStem(metadata);
    tempFile = path.join(options.outputDir, `.${stem}.${randomUUID()}.tmp`);
    await writeFile(tempFile, bytes);
    return await claimPosterPath(tempFile, options.outputDir, stem, ext);
  } catch (error) {
    if (error instanceof ExportError) throw error;
    throw new ExportError(`Writing ${spec.format} poster failed: ${extractErrorMessage(error)}`, { cause: error });
  } finally {
    if (tempFile) await rm(tempFile, { force: true });
  }
}
