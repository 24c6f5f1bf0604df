import sharp from "sharp";
import type { Coordinate, PosterLabels, PosterSpec } from "./types.js";
import { pixelSize } from "./types.js";
import type { ResolvedTheme } from "./theme/resolve.js";

export const DEFAULT_ATTRIBUTION = "© OpenStreetMap contributors";

/** Reference poster width the label sizes are tuned for, in inches. */
const REFERENCE_WIDTH_IN = 12;
const FONT_SIZES_PT = { city: 60, country: 22, coords: 14, attribution: 8 };
/** Share of the font size between the baseline and the middle of a line of capitals. */
const BASELINE_TO_MIDDLE = 0.35;

export const svgNumber = (value: number) => String(Math.round(value * 100) / 100);

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function formatCoordinates(coordinate: Coordinate): string {
  const lat = `${Math.abs(coordinate.latitude).toFixed(4)}° ${coordinate.latitude >= 0 ? "N" : "S"}`;
  const lon = `${Math.abs(coordinate.longitude).toFixed(4)}° ${coordinate.longitude >= 0 ? "E" : "W"}`;
  return `${lat} / ${lon}`;
}

export function spacedTitle(city: string): string {
  return Array.from(city.toUpperCase()).join("  ");
}

/** City title size in points; long names shrink but never below 10pt at reference scale. */
export function titleFontSize(city: string, scale: number): number {
  const base = FONT_SIZES_PT.city * scale;
  const length = Array.from(city).length;
  if (length <= 10) return base;
  return Math.max(base * (10 / length), 10 * scale);
}

export interface LabelText {
  content: string;
  /** Anchor point in poster pixels; `y` is the baseline. */
  x: number;
  y: number;
  anchor: "middle" | "end";
  sizePt: number;
  bold: boolean;
  opacity: number;
}

export interface LabelLayout {
  color: string;
  texts: LabelText[];
  divider: { x1: number; x2: number; y: number; width: number; opacity: number };
}

/** Where each line of the label block goes, in poster pixels. */
export function layoutLabels(theme: ResolvedTheme, spec: PosterSpec, labels: PosterLabels): LabelLayout {
  const { width, height } = pixelSize(spec);
  const scale = spec.widthInches / REFERENCE_WIDTH_IN;
  const opacity = theme.styles.labels.opacity;
  const yAt = (fraction: number) => height * (1 - fraction);
  const centered = (fraction: number, sizePt: number, content: string, shade = 1, bold = false): LabelText => ({
    content,
    x: width / 2,
    y: yAt(fraction),
    anchor: "middle",
    sizePt,
    bold,
    opacity: opacity * shade,
  });

  return {
    color: theme.styles.labels.color,
    texts: [
      centered(0.14, titleFontSize(labels.city, scale), spacedTitle(labels.city), 1, true),
      centered(0.1, FONT_SIZES_PT.country * scale, labels.country.toUpperCase()),
      centered(0.07, FONT_SIZES_PT.coords * scale, formatCoordinates(labels.coordinate), 0.7),
      {
        content: labels.attribution ?? DEFAULT_ATTRIBUTION,
        x: width * 0.98,
        y: yAt(0.02),
        anchor: "end",
        sizePt: FONT_SIZES_PT.attribution * scale,
        bold: false,
        opacity: opacity * 0.5,
      },
    ],
    divider: { x1: width * 0.4, x2: width * 0.6, y: yAt(0.125), width: scale * (spec.dpi / 72), opacity },
  };
}

export interface TextRequest {
  /** Pango markup. */
  markup: string;
  /** Pango font description, e.g. `Roboto Bold 22`. */
  font: string;
  fontfile: string;
  dpi: number;
}

export interface TextImage {
  png: Buffer;
  width: number;
  height: number;
}

export type TextRenderer = (request: TextRequest) => Promise<TextImage>;

export const sharpTextRenderer: TextRenderer = async ({ markup, font, fontfile, dpi }) => {
  const { data, info } = await sharp({ text: { text: markup, font, fontfile, dpi, rgba: true } })
    .png()
    .toBuffer({ resolveWithObject: true });
  return { png: data, width: info.width, height: info.height };
};

/** A pre-rendered line of text placed on the poster. */
export interface LabelImage {
  x: number;
  y: number;
  width: number;
  height: number;
  href: string;
}

export function textMarkup(text: LabelText, color: string): string {
  return `<span foreground="${color}" fgalpha="${Math.round(text.opacity * 100)}%">${escapeXml(text.content)}</span>`;
}

export function fontDescription(family: string, text: LabelText): string {
  return `${family}${text.bold ? " Bold" : ""} ${svgNumber(text.sizePt)}`;
}

/**
 * Draw each label line with the given font file. The resulting images are
 * centred vertically on the middle of the line they replace.
 */
export async function rasterizeLabels(
  layout: LabelLayout,
  font: { family: string; file: string },
  dpi: number,
  renderText: TextRenderer = sharpTextRenderer
): Promise<LabelImage[]> {
  const images: LabelImage[] = [];
  for (const text of layout.texts) {
    if (text.content.trim().length === 0) continue;
    const image = await renderText({
      markup: textMarkup(text, layout.color),
      font: fontDescription(font.family, text),
      fontfile: font.file,
      dpi,
    });
    const middle = text.y - BASELINE_TO_MIDDLE * text.sizePt * (dpi / 72);
    images.push({
      x: text.anchor === "middle" ? text.x - image.width / 2 : text.x - image.width,
      y: middle - image.height / 2,
      width: image.width,
      height: image.height,
      href: `data:image/png;base64,${image.png.toString("base64")}`,
    });
  }
  return images;
}
