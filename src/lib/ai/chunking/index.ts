/**
 * Chunking Module
 *
 * 大規模PRをトークン上限内のレビュー単位に分割する
 */

export { chunkDiff, getChunkPaths, formatChunkingSummary } from "./chunk-processor.js";
