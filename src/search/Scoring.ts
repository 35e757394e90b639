import { PromisePool } from "@supercharge/promise-pool";
import { BM25Parameters, DEFAULT_SCORING_CHUNK_SIZE, DEFAULT_SCORING_CONCURRENCY, DEFAULT_WEIGHTS, RankingWeights } from "../Config";
import { DocumentScore, PositionalIndex, RankingMode, SearchIndexes } from "../ProductTypes";
import { bm25, DEFAULT_BM25 } from "./BM25/BM25";

//raw counts behind a combined score, the total is recomputable from these alone
export interface ScoreBreakdown
{
    titleOccurrences: number,
    descriptionOccurrences: number,
    reviewTextOccurrences: number,
    exactTitleMatch: boolean, //every query token appears in the title
    totalReviews: number
}

export interface ScoringOptions
{
    mode?: RankingMode,
    weights?: RankingWeights,
    bm25?: BM25Parameters,
    concurrency?: number,
    chunkSize?: number
}

function occurrences(index: PositionalIndex | undefined, token: string, url: string) : number
{
    return index?.get(token)?.get(url)?.length ?? 0;
}

export function scoreBreakdown(url: string, tokens: ReadonlySet<string>, indexes: SearchIndexes) : ScoreBreakdown
{
    const title = indexes.fields.get("title");
    const description = indexes.fields.get("description");

    const breakdown: ScoreBreakdown = {
        titleOccurrences: 0,
        descriptionOccurrences: 0,
        reviewTextOccurrences: 0,
        exactTitleMatch: tokens.size > 0,
        totalReviews: indexes.reviewStats.get(url)?.total_reviews ?? 0,
    };

    for (const token of tokens)
    {
        const in_title = occurrences(title, token, url);
        breakdown.titleOccurrences += in_title;
        breakdown.descriptionOccurrences += occurrences(description, token, url);
        breakdown.reviewTextOccurrences += occurrences(indexes.reviewText, token, url);
        if (in_title === 0) breakdown.exactTitleMatch = false;
    }

    return breakdown;
}

export function combineScore(breakdown: ScoreBreakdown, weights: RankingWeights = DEFAULT_WEIGHTS) : number
{
    return weights.title * breakdown.titleOccurrences
        + weights.description * breakdown.descriptionOccurrences
        + weights.reviewText * breakdown.reviewTextOccurrences
        + (breakdown.exactTitleMatch ? weights.exactTitleMatch : 0)
        + weights.perReview * breakdown.totalReviews;
}

//the production ranking signal
export function computeScore(url: string, tokens: ReadonlySet<string>, indexes: SearchIndexes, weights: RankingWeights = DEFAULT_WEIGHTS) : number
{
    return combineScore(scoreBreakdown(url, tokens, indexes), weights);
}

//title BM25 + description BM25, a diagnostic alternative to the combined score
export function bm25Totals(tokens: ReadonlySet<string>, indexes: SearchIndexes, params: BM25Parameters = DEFAULT_BM25) : Map<string, number>
{
    const totals = new Map<string, number>();

    for (const [field, index] of indexes.fields)
    {
        const lengths = indexes.fieldLengths.get(field) ?? new Map<string, number>();
        for (const [url, score] of bm25(tokens, index, lengths, indexes.documentCount, params))
        {
            totals.set(url, (totals.get(url) ?? 0) + score);
        }
    }

    return totals;
}

function chunk<T>(items: readonly T[], size: number) : T[][]
{
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size)
    {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

//score disjoint chunks of candidates concurrently, the indexes are frozen so no locking is needed
//corpus wide aggregates (N, avgdl, df) are settled before the pool starts
export async function scoreCandidates(candidates: Iterable<string>, tokens: ReadonlySet<string>, indexes: SearchIndexes, options: ScoringOptions = {}) : Promise<DocumentScore[]>
{
    const urls = Array.from(candidates);
    if (urls.length === 0 || indexes.documentCount === 0) return [];

    const mode = options.mode ?? "combined";
    const weights = options.weights ?? DEFAULT_WEIGHTS;
    const bm25_totals = mode === "bm25" ? bm25Totals(tokens, indexes, options.bm25) : undefined;

    const { results, errors } = await PromisePool
        .withConcurrency(options.concurrency ?? DEFAULT_SCORING_CONCURRENCY)
        .for(chunk(urls, options.chunkSize ?? DEFAULT_SCORING_CHUNK_SIZE))
        .process(async (urls_chunk) => urls_chunk.map((url): DocumentScore => ({
            url,
            score: bm25_totals ? bm25_totals.get(url) ?? 0 : computeScore(url, tokens, indexes, weights),
        })));

    //a failed chunk fails the whole query
    if (errors.length > 0) throw errors[0];

    return results.flat();
}
