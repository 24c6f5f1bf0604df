import type { Position } from "geojson";
import type { Coordinate, MapShape, PosterLabels, PosterSpec, StyledLayer, VectorCanvas } from "./types.js";
import { escapeXml, svgNumber as fmt, layoutLabels, type LabelImage, type LabelLayout } from "./labels.js";
import { pixelSize } from "./types.js";
import type { ResolvedTheme } from "./theme/resolve.js";
import { computeViewport, createPosterProjection, isAreal, isLinear, projectGeometry, toSvgPath } from "./geometry.js";

export const MASK_FILL = "#FFFFFF";

const GRADIENT_SHARE = 0.25;

export interface RenderScene {
  center: Coordinate;
  radius: number;
  labels: PosterLabels;
}

/** A font file carried inside vector output as an `@font-face` rule. */
export interface EmbeddedFont {
  family: string;
  mimeType: string;
  format: string;
  data: Buffer;
}

export interface RenderOptions {
  fontFamily?: string;
  /** Pre-rendered label lines drawn in place of `<text>` elements. */
  labelImages?: LabelImage[];
  fontFace?: EmbeddedFont;
}

/** SVG for the mask boundary, or null for the rectangle. */
export function maskShape(shape: MapShape, width: number, height: number): string | null {
  switch (shape) {
    case "rectangle":
      return null;
    case "circle":
      return `<circle cx="${fmt(width / 2)}" cy="${fmt(height / 2)}" r="${fmt(Math.min(width, height) / 2)}"/>`;
    case "triangle": {
      const m = 0.05 * Math.min(width, height);
      const points = [
        [width / 2, m],
        [m, height - m],
        [width - m, height - m],
      ]
        .map(([x, y]) => `${fmt(x)},${fmt(y)}`)
        .join(" ");
      return `<polygon points="${points}"/>`;
    }
  }
}

function renderLayer(layer: StyledLayer, project: ReturnType<typeof createPosterProjection>, pxPerPt: number): string {
  const areas: string[] = [];
  const lines: string[] = [];
  const points: Position[] = [];
  for (const feature of layer.features) {
    if (!feature.geometry) continue;
    const projected = projectGeometry(feature.geometry, project);
    if (!projected) continue;
    if (projected.type === "Point") {
      points.push(projected.coordinates);
      continue;
    }
    if (projected.type === "MultiPoint") {
      points.push(...projected.coordinates);
      continue;
    }
    const d = toSvgPath(projected);
    if (!d) continue;
    if (isAreal(projected)) areas.push(`<path d="${d}"/>`);
    else if (isLinear(projected)) lines.push(`<path d="${d}"/>`);
  }
  if (areas.length === 0 && lines.length === 0 && points.length === 0) return "";

  const { color, opacity } = layer.style;
  const size = Math.max(layer.style.width * layer.widthScale * pxPerPt, 0.1);
  const parts = [`<g data-layer="${layer.category}/${layer.subtype}">`];
  if (areas.length > 0) {
    parts.push(`<g fill="${color}" fill-opacity="${opacity}" fill-rule="evenodd" stroke="none">${areas.join("")}</g>`);
  }
  if (lines.length > 0) {
    parts.push(
      `<g fill="none" stroke="${color}" stroke-opacity="${opacity}" stroke-width="${fmt(size)}" ` +
        `stroke-linecap="round" stroke-linejoin="round">${lines.join("")}</g>`
    );
  }
  if (points.length > 0) {
    // markers: the layer width is the dot radius
    const dots = points.map(([x, y]) => `<circle cx="${fmt(x)}" cy="${fmt(y)}" r="${fmt(size)}"/>`);
    parts.push(`<g fill="${color}" fill-opacity="${opacity}" stroke="none">${dots.join("")}</g>`);
  }
  parts.push("</g>");
  return parts.join("");
}

function renderLabels(layout: LabelLayout, fontFamily: string, pxPerPt: number, images?: LabelImage[]): string {
  const { color, divider } = layout;
  const family = escapeXml(fontFamily === "sans-serif" ? fontFamily : `'${fontFamily}', sans-serif`);
  const texts = images
    ? images.map(
        (image) =>
          `<image x="${fmt(image.x)}" y="${fmt(image.y)}" width="${image.width}" height="${image.height}" href="${image.href}"/>`
      )
    : layout.texts.map(
        (text) =>
          `<text x="${fmt(text.x)}" y="${fmt(text.y)}" text-anchor="${text.anchor}" font-family="${family}" ` +
          `font-size="${fmt(text.sizePt * pxPerPt)}" fill="${color}" fill-opacity="${fmt(text.opacity)}"` +
          `${text.bold ? ` font-weight="bold" xml:space="preserve"` : ""}>${escapeXml(text.content)}</text>`
      );
  const rule =
    `<line x1="${fmt(divider.x1)}" y1="${fmt(divider.y)}" x2="${fmt(divider.x2)}" y2="${fmt(divider.y)}" ` +
    `stroke="${color}" stroke-opacity="${fmt(divider.opacity)}" stroke-width="${fmt(divider.width)}"/>`;
  return [texts[0] ?? "", rule, ...texts.slice(1)].join("");
}

function fontFaceRule(font: EmbeddedFont): string {
  return (
    `<style>@font-face{font-family:'${escapeXml(font.family)}';` +
    `src:url(data:${font.mimeType};base64,${font.data.toString("base64")}) format('${font.format}');}</style>`
  );
}

/**
 * Compose the poster as an SVG document: background, layers in z-order,
 * gradient fades, then labels, all clipped to the shape mask.
 */
export function renderPoster(theme: ResolvedTheme, spec: PosterSpec, scene: RenderScene, options: RenderOptions = {}): VectorCanvas {
  const { width, height } = pixelSize(spec);
  const viewport = computeViewport(width, height, scene.radius);
  const project = createPosterProjection(scene.center, viewport);
  const pxPerPt = spec.dpi / 72;
  const { background, gradient } = theme.palette;

  const layers = [...theme.layers].sort((a, b) => a.zIndex - b.zIndex);
  const body = [
    `<rect x="0" y="0" width="${width}" height="${height}" fill="${background}"/>`,
    ...layers.map((layer) => renderLayer(layer, project, pxPerPt)),
    `<rect x="0" y="0" width="${width}" height="${fmt(height * GRADIENT_SHARE)}" fill="url(#fade-top)"/>`,
    `<rect x="0" y="${fmt(height * (1 - GRADIENT_SHARE))}" width="${width}" height="${fmt(height * GRADIENT_SHARE)}" fill="url(#fade-bottom)"/>`,
    renderLabels(layoutLabels(theme, spec, scene.labels), options.fontFamily ?? "sans-serif", pxPerPt, options.labelImages),
  ].join("");

  const mask = maskShape(spec.shape, width, height);
  const defs = [
    `<linearGradient id="fade-top" x1="0" y1="0" x2="0" y2="1">` +
      `<stop offset="0" stop-color="${gradient}" stop-opacity="1"/><stop offset="1" stop-color="${gradient}" stop-opacity="0"/>` +
      `</linearGradient>`,
    `<linearGradient id="fade-bottom" x1="0" y1="0" x2="0" y2="1">` +
      `<stop offset="0" stop-color="${gradient}" stop-opacity="0"/><stop offset="1" stop-color="${gradient}" stop-opacity="1"/>` +
      `</linearGradient>`,
  ];
  if (mask) defs.push(`<clipPath id="poster-mask">${mask}</clipPath>`);
  if (options.fontFace) defs.push(fontFaceRule(options.fontFace));

  const content = mask
    ? `<rect x="0" y="0" width="${width}" height="${height}" fill="${MASK_FILL}"/><g clip-path="url(#poster-mask)">${body}</g>`
    : body;
  const svg =
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
    `<defs>${defs.join("")}</defs>${content}</svg>`;
  return { kind: "vector", width, height, svg };
}
