export * from "./clock.js";
export * from "./rateLimiter.js";
export * from "./retry.js";
export * from "./cache.js";
export * from "./geocode.js";
export * from "./resolver.js";
export * from "./overpass.js";
export * from "./fetcher.js";
