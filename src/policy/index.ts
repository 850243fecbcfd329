export { CircleMarkPolicy, CIRCLE_RADIUS, hueAt, type Clock } from "./circle";
export { DeterministicPolicy, deterministicIndex } from "./deterministic";
export { GlyphRenderPolicy, GLYPH_FONT_SIZE } from "./glyph";
export { NamedFilePolicy } from "./named-file";
export { RandomPolicy } from "./random";
export {
  createImageRegistry,
  createSoundRegistry,
  PolicyRegistry,
  resolvePolicyName,
  type ImageRegistryOptions,
} from "./registry";
export * from "./types";
