import { uuidv7 } from "uuidv7";
import { FeatureIndex, PositionalIndex, ProductDocument, ReviewStats, SearchIndexes, TEXT_FIELDS, TextField } from "../ProductTypes";
import { buildReviewStats, isLastReviewOutOfDateOrder } from "./ReviewStats";
import { Tokenizer, tokenize } from "./NLPUtils";
import { logger } from "../Logger";

const log = logger.child({ module: "index-builder" });

export interface BuildOptions
{
    fields?: readonly TextField[],
    featureKeys?: readonly string[], //undefined indexes every feature key found in the corpus
    tokenizer?: Tokenizer
}

export interface BuildResult
{
    indexes: SearchIndexes,
    skipped: number
}

interface MutablePositionalIndex
{
    index: Map<string, Map<string, number[]>>,
    lengths: Map<string, number>
}

//token -> { url -> [positions] }, every occurrence recorded in token order
export function buildPositionalIndex(documents: readonly ProductDocument[], tokensOf: (document: ProductDocument) => string[] | undefined) : MutablePositionalIndex
{
    const index = new Map<string, Map<string, number[]>>();
    const lengths = new Map<string, number>();

    for (const document of documents)
    {
        const tokens = tokensOf(document);
        //a document without the field still counts towards the average length
        lengths.set(document.url, tokens?.length ?? 0);
        if (tokens === undefined) continue;

        tokens.forEach((token, position) => {
            let postings = index.get(token);
            if (!postings) {
                postings = new Map<string, number[]>();
                index.set(token, postings);
            }
            let positions = postings.get(document.url);
            if (!positions) {
                positions = [];
                postings.set(document.url, positions);
            }
            positions.push(position);
        });
    }

    return { index, lengths };
}

//token -> set of urls, repeated tokens do not duplicate urls
export function buildFeatureIndex(documents: readonly ProductDocument[], featureKey: string, tokenizer: Tokenizer = tokenize) : Map<string, Set<string>>
{
    const index = new Map<string, Set<string>>();

    for (const document of documents)
    {
        const value = document.features[featureKey];
        if (value === undefined) continue;

        for (const token of tokenizer(value))
        {
            let urls = index.get(token);
            if (!urls) {
                urls = new Set<string>();
                index.set(token, urls);
            }
            urls.add(document.url);
        }
    }

    return index;
}

//feature keys in first seen order
export function discoverFeatureKeys(documents: readonly ProductDocument[]) : string[]
{
    const keys = new Set<string>();
    for (const document of documents)
    {
        for (const key of Object.keys(document.features)) keys.add(key);
    }
    return Array.from(keys);
}

//the url must be present and unique, the first document for a url wins
function selectIndexableDocuments(documents: readonly ProductDocument[]) : { accepted: ProductDocument[], skipped: number }
{
    const seen = new Set<string>();
    const accepted: ProductDocument[] = [];
    let skipped = 0;

    for (const document of documents)
    {
        if (!document.url || seen.has(document.url)) {
            skipped++;
            continue;
        }
        seen.add(document.url);
        accepted.push(document);
    }

    return { accepted, skipped };
}

function reviewTokens(document: ProductDocument, tokenizer: Tokenizer) : string[] | undefined
{
    if (document.reviews.length === 0) return undefined;
    //positions run on across reviews in list order
    return document.reviews.flatMap(review => review.text === undefined ? [] : tokenizer(review.text));
}

export function buildIndexes(documents: readonly ProductDocument[], options: BuildOptions = {}) : BuildResult
{
    const build_id = uuidv7();
    const start_time = performance.now();
    const tokenizer = options.tokenizer ?? tokenize;
    const fieldSelectors = options.fields ?? TEXT_FIELDS;

    const { accepted, skipped } = selectIndexableDocuments(documents);
    if (skipped > 0) log.warn({ build_id, skipped }, "Skipped documents without a unique url");

    const fields = new Map<TextField, PositionalIndex>();
    const fieldLengths = new Map<TextField, ReadonlyMap<string, number>>();
    for (const field of fieldSelectors)
    {
        const { index, lengths } = buildPositionalIndex(accepted, document => {
            const text = document[field];
            return text === undefined ? undefined : tokenizer(text);
        });
        fields.set(field, index);
        fieldLengths.set(field, lengths);
    }

    const reviewText = buildPositionalIndex(accepted, document => reviewTokens(document, tokenizer)).index;

    const featureKeys = options.featureKeys ?? discoverFeatureKeys(accepted);
    const features = new Map<string, FeatureIndex>();
    for (const key of featureKeys)
    {
        features.set(key, buildFeatureIndex(accepted, key, tokenizer));
    }

    const reviewStats: ReadonlyMap<string, ReviewStats> = buildReviewStats(accepted);

    const out_of_order = accepted.filter(document => isLastReviewOutOfDateOrder(document.reviews)).length;
    if (out_of_order > 0) {
        log.warn({ build_id, documents: out_of_order }, "last_rating follows list order but a later dated review exists");
    }

    const indexes: SearchIndexes = Object.freeze({
        fields,
        reviewText,
        features,
        reviewStats,
        fieldLengths,
        documentCount: accepted.length,
    });

    log.info({
        build_id,
        documents: accepted.length,
        fields: fieldSelectors,
        features: featureKeys,
        time_taken_in_ms: performance.now() - start_time
    }, "Built indexes");

    return { indexes, skipped };
}
