import { describe, expect, it, vi } from "vitest";
import {
  EARTH_RADIUS_M,
  classify,
  computeViewport,
  createPosterProjection,
  MASK_FILL,
  escapeXml,
  formatCoordinates,
  layoutLabels,
  maskShape,
  parseTheme,
  rasterize,
  rasterizeLabels,
  renderPoster,
  resolveTheme,
  spacedTitle,
  titleFontSize,
  type MapShape,
  type PosterSpec,
  type TextImage,
  type TextRequest,
} from "poster-engine";
import { dataset, line, pixel, point, square } from "./helpers/fixtures.js";

const spec = (shape: MapShape = "rectangle"): PosterSpec => ({
  widthInches: 2,
  heightInches: 3,
  dpi: 20,
  format: "png",
  font: "Roboto",
  shape,
  texture: null,
  textureIntensity: 0.3,
  artisticEffect: null,
  colorEnhancement: null,
});

const dark = parseTheme({ bg: "#000000", text: "#FFFFFF", gradient_color: "#000000" }, "dark");
const scene = {
  center: { latitude: 40, longitude: -89 },
  radius: 1000,
  labels: { city: "Springfield", country: "Testland", coordinate: { latitude: 40, longitude: -89 } },
};

describe("label helpers", () => {
  it("formats coordinates with hemispheres", () => {
    expect(formatCoordinates({ latitude: 40, longitude: -89 })).toBe("40.0000° N / 89.0000° W");
    expect(formatCoordinates({ latitude: -33.8688, longitude: 151.2093 })).toBe("33.8688° S / 151.2093° E");
  });

  it("spaces the city title and shrinks long names", () => {
    expect(spacedTitle("Rome")).toBe("R  O  M  E");
    expect(titleFontSize("Paris", 0.5)).toBe(30);
    expect(titleFontSize("Springfield", 1)).toBeCloseTo(600 / 11, 10);
    expect(titleFontSize("A".repeat(100), 1)).toBe(10);
  });

  it("escapes markup in text", () => {
    expect(escapeXml(`a<b & 'c' "d"`)).toBe("a&lt;b &amp; &apos;c&apos; &quot;d&quot;");
  });

  it("describes the mask geometry", () => {
    expect(maskShape("rectangle", 40, 60)).toBeNull();
    expect(maskShape("circle", 40, 60)).toBe(`<circle cx="20" cy="30" r="20"/>`);
    expect(maskShape("triangle", 40, 60)).toBe(`<polygon points="20,2 2,58 38,58"/>`);
  });
});

describe("viewport and projection", () => {
  it("crops the shorter side of the radius square", () => {
    const portrait = computeViewport(40, 60, 1000);
    expect(portrait.halfHeightMeters).toBe(1000);
    expect(portrait.halfWidthMeters).toBeCloseTo(2000 / 3, 9);
    expect(portrait.pixelsPerMeter).toBeCloseTo(0.03, 12);

    const landscape = computeViewport(60, 40, 1000);
    expect(landscape.halfWidthMeters).toBe(1000);
    expect(landscape.halfHeightMeters).toBeCloseTo(2000 / 3, 9);
  });

  it("puts the center in the middle and keeps ground distance from it", () => {
    const project = createPosterProjection({ latitude: 40, longitude: -89 }, computeViewport(40, 60, 1000));
    const center = project([-89, 40]);
    expect(center?.[0]).toBeCloseTo(20, 6);
    expect(center?.[1]).toBeCloseTo(30, 6);

    const north = project([-89, 40 + (1000 / EARTH_RADIUS_M) * (180 / Math.PI)]);
    expect(north?.[0]).toBeCloseTo(20, 6);
    expect(north?.[1]).toBeCloseTo(0, 4);
  });
});

describe("renderPoster", () => {
  const layers = classify(
    dataset({
      roads: [line({ highway: "motorway" }), line({ highway: "residential" })],
      water: [square({ natural: "water" })],
      rail: [line({ railway: "rail" })],
    })
  );

  it("writes an svg of the poster's pixel size with layers in z-order", () => {
    const canvas = renderPoster(resolveTheme(dark, layers, { terrain: "urban" }), spec(), scene);
    expect(canvas.width).toBe(40);
    expect(canvas.height).toBe(60);
    expect(canvas.svg.startsWith(`<svg xmlns="http://www.w3.org/2000/svg" width="40" height="60" viewBox="0 0 40 60">`)).toBe(true);

    const water = canvas.svg.indexOf(`data-layer="water/water"`);
    const motorway = canvas.svg.indexOf(`data-layer="roads/motorway"`);
    const residential = canvas.svg.indexOf(`data-layer="roads/residential"`);
    const rail = canvas.svg.indexOf(`data-layer="rail/rail"`);
    expect(water).toBeGreaterThan(-1);
    expect(water).toBeLessThan(motorway);
    expect(motorway).toBeLessThan(residential);
    expect(residential).toBeLessThan(rail);
    expect(canvas.svg).not.toContain(`data-layer="parks/park"`);
    expect(canvas.svg).not.toContain("clip-path");
  });

  it("draws the title, country and coordinates", () => {
    const canvas = renderPoster(resolveTheme(dark, layers, { terrain: "urban" }), spec(), scene);
    expect(canvas.svg).toContain(">S  P  R  I  N  G  F  I  E  L  D</text>");
    expect(canvas.svg).toContain(">TESTLAND</text>");
    expect(canvas.svg).toContain(">40.0000° N / 89.0000° W</text>");
    expect(canvas.svg).toContain(">© OpenStreetMap contributors</text>");
  });

  it("clips to the mask over a white ground", () => {
    const canvas = renderPoster(resolveTheme(dark, layers, { terrain: "urban" }), spec("circle"), scene);
    expect(canvas.svg).toContain(`<clipPath id="poster-mask"><circle cx="20" cy="30" r="20"/></clipPath>`);
    expect(canvas.svg).toContain(`<rect x="0" y="0" width="40" height="60" fill="#FFFFFF"/><g clip-path="url(#poster-mask)">`);
  });

  it("draws stations as dots sized by the rail width", () => {
    const stations = classify(dataset({ rail: [point({ railway: "station" }), line({ railway: "rail" })] }));
    const canvas = renderPoster(resolveTheme(dark, stations, { terrain: "urban" }), spec(), scene);
    // rail defaults to width 1.2pt; stations scale it by 2, at 20/72 px per pt
    expect(canvas.svg).toContain(
      `<g data-layer="rail/station"><g fill="#5A5A5A" fill-opacity="1" stroke="none"><circle cx="20" cy="30" r="0.67"/></g></g>`
    );
    expect(canvas.svg.indexOf(`data-layer="rail/rail"`)).toBeLessThan(canvas.svg.indexOf(`data-layer="rail/station"`));
  });

  it("places pre-rendered label lines instead of text elements", () => {
    const canvas = renderPoster(resolveTheme(dark, layers, { terrain: "urban" }), spec(), scene, {
      labelImages: [{ x: 18, y: 52.64, width: 4, height: 2, href: "data:image/png;base64,AAAA" }],
    });
    expect(canvas.svg).toContain(`<image x="18" y="52.64" width="4" height="2" href="data:image/png;base64,AAAA"/>`);
    expect(canvas.svg).not.toContain("<text");
    expect(canvas.svg).toContain(`<line x1="16" y1="52.5" x2="24" y2="52.5"`);
  });

  it("embeds a font file as an @font-face rule", () => {
    const canvas = renderPoster(resolveTheme(dark, layers, { terrain: "urban" }), spec(), scene, {
      fontFamily: "Roboto",
      fontFace: { family: "Roboto", mimeType: "font/ttf", format: "truetype", data: Buffer.from("test-font") },
    });
    expect(canvas.svg).toContain(
      "<style>@font-face{font-family:'Roboto';src:url(data:font/ttf;base64,dGVzdC1mb250) format('truetype');}</style>"
    );
    expect(canvas.svg).toContain(`font-family="&apos;Roboto&apos;, sans-serif"`);
  });

  it("renders a dataset with whole categories missing", () => {
    const partial = classify(dataset({ roads: [line({ highway: "primary" })] }, ["water", "parks"]));
    const canvas = renderPoster(resolveTheme(dark, partial, { terrain: "urban" }), spec(), scene);
    expect(canvas.svg).toContain(`data-layer="roads/primary"`);
    expect(canvas.svg).not.toContain(`data-layer="water/water"`);
  });
});

describe("rasterizeLabels", () => {
  it("draws each line with the font file and centres it on the line", async () => {
    const renderText = vi.fn(
      async (_request: TextRequest): Promise<TextImage> => ({ png: Buffer.from("img"), width: 4, height: 2 })
    );
    const layout = layoutLabels(resolveTheme(dark, classify(dataset()), { terrain: "urban" }), spec(), scene.labels);
    const images = await rasterizeLabels(layout, { family: "Roboto", file: "/fonts/Roboto.ttf" }, 20, renderText);

    expect(renderText.mock.calls.map(([request]) => request.font)).toEqual([
      "Roboto Bold 9.09",
      "Roboto 3.67",
      "Roboto 2.33",
      "Roboto 1.33",
    ]);
    expect(renderText.mock.calls[2][0]).toEqual({
      markup: `<span foreground="#FFFFFF" fgalpha="70%">40.0000° N / 89.0000° W</span>`,
      font: "Roboto 2.33",
      fontfile: "/fonts/Roboto.ttf",
      dpi: 20,
    });
    // country: baseline 54, 22/6 pt at 20 dpi
    expect(images[1].x).toBe(18);
    expect(images[1].y).toBeCloseTo(54 - 0.35 * (22 / 6) * (20 / 72) - 1, 9);
    expect(images[1].href).toBe(`data:image/png;base64,${Buffer.from("img").toString("base64")}`);
    // attribution is right-aligned at 98% of the width
    expect(images[3].x).toBeCloseTo(39.2 - 4, 9);
  });

  it("skips empty lines", async () => {
    const renderText = vi.fn(
      async (_request: TextRequest): Promise<TextImage> => ({ png: Buffer.from("img"), width: 4, height: 2 })
    );
    const layout = layoutLabels(resolveTheme(dark, classify(dataset()), { terrain: "urban" }), spec(), {
      ...scene.labels,
      country: "",
    });
    const images = await rasterizeLabels(layout, { family: "Roboto", file: "/fonts/Roboto.ttf" }, 20, renderText);
    expect(images).toHaveLength(3);
    expect(renderText).toHaveBeenCalledTimes(3);
  });
});

describe("rasterize", () => {
  const empty = classify(dataset());

  it("is deterministic for identical input", async () => {
    const vector = renderPoster(resolveTheme(dark, classify(dataset({ roads: [line({ highway: "primary" })] })), { terrain: "urban" }), spec(), scene);
    const first = await rasterize(vector);
    const second = await rasterize(vector);
    expect(first.width).toBe(40);
    expect(first.height).toBe(60);
    expect(first.data.length).toBe(40 * 60 * 3);
    expect(first.data.equals(second.data)).toBe(true);
  });

  it("fills outside the circle mask with white", async () => {
    const circle = await rasterize(renderPoster(resolveTheme(dark, empty, { terrain: "urban" }), spec("circle"), scene));
    expect(pixel(circle, 0, 0)).toEqual([255, 255, 255]);
    expect(pixel(circle, 20, 30)).toEqual([0, 0, 0]);

    const rectangle = await rasterize(renderPoster(resolveTheme(dark, empty, { terrain: "urban" }), spec(), scene));
    expect(pixel(rectangle, 0, 0)).toEqual([0, 0, 0]);
  });

  it("fills outside the triangle mask with white", async () => {
    const triangle = await rasterize(renderPoster(resolveTheme(dark, empty, { terrain: "urban" }), spec("triangle"), scene));
    const white = [0, 2, 4].map((i) => parseInt(MASK_FILL.slice(1 + i, 3 + i), 16));
    expect(pixel(triangle, 0, 0)).toEqual(white);
    expect(pixel(triangle, 0, 59)).toEqual(white);
    expect(pixel(triangle, 39, 59)).toEqual(white);
    expect(pixel(triangle, 39, 0)).toEqual(white);
    expect(pixel(triangle, 20, 40)).toEqual([0, 0, 0]);
  });

  it("renders the same poster to identical pixels twice", async () => {
    const theme = resolveTheme(dark, classify(dataset({ roads: [line({ highway: "primary" })] })), { terrain: "urban" });
    const first = await rasterize(renderPoster(theme, spec("circle"), scene));
    const second = await rasterize(renderPoster(theme, spec("circle"), scene));
    expect(first.data.equals(second.data)).toBe(true);
  });
});
