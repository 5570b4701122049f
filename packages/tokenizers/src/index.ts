/**
 * @ranktok/tokenizers -- byte-level BPE encodings.
 *
 * Provides the rank table, the merge engine, segmentation, the split cache,
 * the `Encoding` orchestrator with its batch executors, vocabulary loaders,
 * and the named encodings with their model lookup.
 */

// ── Engine ────────────────────────────────────────────────────────────────
export { RankTable, MAX_RANK } from "./rank-table.js";
export {
  bytePairMerge,
  bytePairSplit,
  mergeBoundaries,
  linearMergeBoundaries,
  heapMergeBoundaries,
  HEAP_MERGE_THRESHOLD,
  type RankLookup,
} from "./merge.js";
export {
  compilePattern,
  escapeRegex,
  forEachPiece,
  literalPattern,
  segment,
  splitOrdinary,
  SpecialMatcher,
  type Segment,
} from "./segment.js";
export { SplitCache, type SplitCacheOptions, type SplitCacheStats } from "./split-cache.js";
export { utf8ByteString, bytesToByteString, byteStringToBytes, isByteString, concatBytes } from "./bytes.js";
export { Encoding, type UnstableEncoding } from "./encoding.js";

// ── Batches ───────────────────────────────────────────────────────────────
export { FiberExecutor, ThreadExecutor, partition, forEachInOrder, type BatchExecutor, type BatchDispatcher } from "./batch.js";
export { ThreadPool, makeExecutor } from "./worker-pool.js";
export {
  runBatchRequest,
  serializeFailure,
  reviveFailure,
  type BatchRequest,
  type BatchResult,
  type BatchFailure,
} from "./batch-protocol.js";

// ── Vocabularies ──────────────────────────────────────────────────────────
export {
  parseTiktokenBpe,
  dumpTiktokenBpe,
  dataGymToMergeableBpeRanks,
  cacheFilename,
  readFileCached,
  loadTiktokenBpe,
  loadDataGymRanks,
} from "./load.js";
export { saveRanks, loadRanks } from "./persist.js";

// ── Named encodings ───────────────────────────────────────────────────────
export {
  ENDOFTEXT,
  FIM_PREFIX,
  FIM_MIDDLE,
  FIM_SUFFIX,
  ENDOFPROMPT,
  R50K_PATTERN,
  CL100K_PATTERN,
  ENCODING_CONSTRUCTORS,
  gpt2,
  r50kBase,
  p50kBase,
  p50kEdit,
  cl100kBase,
  encodingRegistry,
  makeEncodingRegistry,
  getEncoding,
  listEncodingNames,
  type EncodingRegistry,
} from "./public.js";
export { encodingNameForModel, encodingForModel } from "./models.js";
