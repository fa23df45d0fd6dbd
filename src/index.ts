export * from "./world/actions.js";
export * from "./world/blocks.js";
export * from "./world/builder.js";
export * from "./world/direction.js";
export * from "./world/errors.js";
export * from "./world/grammar.js";
export * from "./world/lines.js";
export * from "./world/position.js";
export * from "./world/sections.js";
export * from "./world/sparseTileArray.js";
export * from "./world/tile.js";
export * from "./world/worldJsonV1.js";
export * from "./world/worldMap.js";
export * from "./world/worldMapCodec.js";
export * from "./world/worldMapFile.js";
export * from "./world/worldTransform.js";
export * from "./world/render/worldRenderer.js";
