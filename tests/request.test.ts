import { describe, expect, it } from "vitest";
import { InvalidRequestError } from "poster-engine";
import { parseGenerationRequest } from "../src/request.js";

describe("parseGenerationRequest", () => {
  it("fills defaults", () => {
    expect(parseGenerationRequest({ location: { city: "Springfield" } })).toEqual({
      location: { city: "Springfield", country: "" },
      theme: "feature_based",
      distanceRadius: 12000,
      posterWidth: 12,
      posterHeight: 16,
      outputFormat: "png",
      font: "Roboto",
      texture: null,
      mapShape: "rectangle",
      artisticEffect: null,
      colorEnhancement: null,
    });
  });

  it("normalizes the output format and optional stages", () => {
    const request = parseGenerationRequest({
      location: { city: " Lyon ", country: "France" },
      outputFormat: ".JPG",
      texture: "paper_grain",
      artisticEffect: "none",
      colorEnhancement: "seasonal_winter",
    });
    expect(request.location.city).toBe("Lyon");
    expect(request.outputFormat).toBe("jpg");
    expect(request.texture).toBe("paper_grain");
    expect(request.artisticEffect).toBeNull();
    expect(request.colorEnhancement).toBe("seasonal_winter");
  });

  it.each([
    ["a radius below the minimum", { distanceRadius: 999 }],
    ["a radius above the maximum", { distanceRadius: 500_001 }],
    ["a narrow poster", { posterWidth: 3 }],
    ["an unknown format", { outputFormat: "gif" }],
    ["an unknown effect", { artisticEffect: "glitter" }],
    ["an unknown field", { colour: "red" }],
    ["a theme path", { theme: "../etc" }],
    ["a texture path", { texture: "../../secrets/key" }],
    ["a texture with a separator", { texture: "base/paper_grain" }],
  ])("rejects %s", (_label, extra) => {
    expect(() => parseGenerationRequest({ location: { city: "Springfield" }, ...extra })).toThrow(InvalidRequestError);
  });

  it("rejects unusable city names", () => {
    expect(() => parseGenerationRequest({ location: { city: "   " } })).toThrow(/location\.city: city is required/);
    expect(() => parseGenerationRequest({ location: { city: "a/b" } })).toThrow(/location\.city/);
    expect(() => parseGenerationRequest({ location: { city: "x".repeat(101) } })).toThrow(/location\.city/);
  });

  it("caps the poster area", () => {
    expect(() => parseGenerationRequest({ location: { city: "Springfield" }, posterWidth: 40, posterHeight: 30 })).toThrow(
      "Invalid generation request: posterWidth: poster area 1200 sq in exceeds 1000 sq in"
    );
    expect(parseGenerationRequest({ location: { city: "Springfield" }, posterWidth: 40, posterHeight: 25 }).posterHeight).toBe(25);
  });
});
