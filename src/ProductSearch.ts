import { uuidv7 } from "uuidv7";
import { ProductDocument, QueryResult, RankingMode, SearchIndexes, SynonymTable } from "./ProductTypes";
import { defaultConfig, SearchConfig } from "./Config";
import { DocumentStore } from "./documents/DocumentStore";
import { buildIndexes } from "./search/InvertedIndex";
import { createTokenizer, Tokenizer } from "./search/NLPUtils";
import { QueryProcessor } from "./search/QueryProcessor";
import { filterDocuments } from "./search/CandidateFilter";
import { scoreCandidates } from "./search/Scoring";
import { rank } from "./search/Ranker";
import { readSnapshot, SnapshotManifest, writeSnapshot } from "./snapshot/Snapshot";
import { logger } from "./Logger";

const log = logger.child({ module: "search" });

export interface SearchOptions
{
    ranking?: RankingMode,
    limit?: number
}

//indexes and documents are built (or loaded) once, every query only reads them
export class ProductSearch
{
    readonly indexes: SearchIndexes;
    readonly documents: DocumentStore;
    readonly config: SearchConfig;
    private readonly processor: QueryProcessor;

    constructor(indexes: SearchIndexes, documents: DocumentStore, synonyms: SynonymTable = new Map(), config: SearchConfig = defaultConfig())
    {
        this.indexes = indexes;
        this.documents = documents;
        this.config = config;
        this.processor = new QueryProcessor(synonyms, ProductSearch.tokenizerFor(config));
    }

    static tokenizerFor(config: SearchConfig) : Tokenizer
    {
        return createTokenizer({ stem: config.tokenizer.stem });
    }

    static fromDocuments(documents: readonly ProductDocument[], synonyms: SynonymTable = new Map(), config: SearchConfig = defaultConfig()) : ProductSearch
    {
        const { indexes } = buildIndexes(documents, {
            fields: config.textFields,
            featureKeys: config.featureKeys,
            tokenizer: ProductSearch.tokenizerFor(config),
        });
        return new ProductSearch(indexes, DocumentStore.from(documents), synonyms, config);
    }

    //the snapshot holds the indexes, titles and descriptions for display come from the corpus
    //a manifest's tokenizer settings win over the given config, queries must tokenize like the indexes did
    static async fromSnapshot(directory: string, documents: readonly ProductDocument[], synonyms: SynonymTable = new Map(), config: SearchConfig = defaultConfig()) : Promise<ProductSearch>
    {
        const { indexes, manifest } = await readSnapshot(directory, config.featureFileAliases);

        let effective = config;
        if (manifest && manifest.tokenizer.stem !== config.tokenizer.stem) {
            log.warn({ directory, snapshot_stem: manifest.tokenizer.stem, config_stem: config.tokenizer.stem }, "Using the tokenizer settings the snapshot was built with");
            effective = { ...config, tokenizer: { ...config.tokenizer, stem: manifest.tokenizer.stem } };
        }

        return new ProductSearch(indexes, DocumentStore.from(documents), synonyms, effective);
    }

    //same indexes and documents, a different synonym table
    withSynonyms(synonyms: SynonymTable) : ProductSearch
    {
        return new ProductSearch(this.indexes, this.documents, synonyms, this.config);
    }

    async saveSnapshot(directory: string) : Promise<SnapshotManifest>
    {
        return await writeSnapshot(directory, this.indexes, {
            featureFileAliases: this.config.featureFileAliases,
            stem: this.config.tokenizer.stem,
        });
    }

    processQuery(query: string) : Set<string>
    {
        return this.processor.process(query);
    }

    async search(query: string, options: SearchOptions = {}) : Promise<QueryResult>
    {
        const query_id = uuidv7();
        const start_time = performance.now();
        const ranking = options.ranking ?? this.config.ranking;

        const tokens = this.processor.process(query);
        const candidates = filterDocuments(tokens, this.indexes);

        const scores = await scoreCandidates(candidates, tokens, this.indexes, {
            mode: ranking,
            weights: this.config.weights,
            bm25: this.config.bm25,
            concurrency: this.config.scoring.concurrency,
            chunkSize: this.config.scoring.chunkSize,
        });

        const results = rank(scores, url => this.documents.get(url), options.limit ?? this.config.limit);

        log.info({
            query_id,
            tokens: Array.from(tokens),
            ranking,
            candidates: candidates.size,
            returned: results.length,
            time_taken_in_ms: performance.now() - start_time
        }, "Answered query");

        return {
            query,
            total_documents: this.indexes.documentCount,
            filtered_documents: candidates.size,
            results,
        };
    }
}
