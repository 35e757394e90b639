export * from "./ProductTypes";
export * from "./Errors";
export { loadConfig, defaultConfig, DEFAULT_WEIGHTS, DEFAULT_K1, DEFAULT_B } from "./Config";
export type { SearchConfig, SearchConfigInput, RankingWeights, BM25Parameters } from "./Config";
export { ProductSearch } from "./ProductSearch";
export type { SearchOptions } from "./ProductSearch";
export { DocumentStore, loadDocuments, parseDocumentLine, parseDocumentLines, toProductDocument } from "./documents/DocumentStore";
export { tokenize, createTokenizer, STOPWORDS } from "./search/NLPUtils";
export { buildIndexes, buildPositionalIndex, buildFeatureIndex, discoverFeatureKeys } from "./search/InvertedIndex";
export { computeReviewStats, buildReviewStats } from "./search/ReviewStats";
export { QueryProcessor, buildSynonymTable, loadSynonymTable } from "./search/QueryProcessor";
export { filterAny, filterAll, filterDocuments } from "./search/CandidateFilter";
export { bm25, computeBM25Score, inverseDocumentFrequency } from "./search/BM25/BM25";
export { computeScore, scoreBreakdown, combineScore, scoreCandidates, bm25Totals } from "./search/Scoring";
export { rank } from "./search/Ranker";
export { readSnapshot, writeSnapshot, computeFingerprint, featureFileName, featureKeyFromFileName } from "./snapshot/Snapshot";
export type { SnapshotManifest, SnapshotOptions, LoadedSnapshot } from "./snapshot/Snapshot";
