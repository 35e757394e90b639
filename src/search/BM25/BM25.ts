import { BM25Parameters, DEFAULT_B, DEFAULT_K1 } from "../../Config";
import { PositionalIndex } from "../../ProductTypes";

export const DEFAULT_BM25: BM25Parameters = { k1: DEFAULT_K1, b: DEFAULT_B };

//IDF(t) = ln((N - df + 0.5) / (df + 0.5) + 1), the +1 keeps it positive even when df = N
export function inverseDocumentFrequency(documentCount: number, documentFrequency: number) : number
{
    return Math.log((documentCount - documentFrequency + 0.5) / (documentFrequency + 0.5) + 1);
}

//compute the BM25 score for a single TOKEN_X_DOCUMENT pair
export function computeBM25Score(
    inverseDocumentFrequency: number,
    termFrequency: number,
    documentLength: number,
    averageDocumentLength: number,
    params: BM25Parameters = DEFAULT_BM25
) : number
{
    if (termFrequency <= 0) return 0;
    const { k1, b } = params;

    return (
        (inverseDocumentFrequency * (termFrequency * (k1 + 1))) /
        (termFrequency + k1 * (1 - b + (b * documentLength) / averageDocumentLength))
    );
}

export function averageDocumentLength(lengths: ReadonlyMap<string, number>) : number
{
    if (lengths.size === 0) return 0;
    let total = 0;
    for (const length of lengths.values()) total += length;
    return total / lengths.size;
}

//BM25 totals over one field for every document holding at least one query token
//N = 0 or an all empty field leaves BM25 undefined, the answer is then no scores at all
export function bm25(
    tokens: Iterable<string>,
    index: PositionalIndex,
    lengths: ReadonlyMap<string, number>,
    documentCount: number,
    params: BM25Parameters = DEFAULT_BM25
) : Map<string, number>
{
    const scores = new Map<string, number>();
    const avgdl = averageDocumentLength(lengths);
    if (documentCount === 0 || avgdl === 0) return scores;

    for (const token of tokens)
    {
        const postings = index.get(token);
        if (!postings) continue;

        const idf = inverseDocumentFrequency(documentCount, postings.size);
        for (const [url, positions] of postings)
        {
            const score = computeBM25Score(idf, positions.length, lengths.get(url) ?? 0, avgdl, params);
            scores.set(url, (scores.get(url) ?? 0) + score);
        }
    }

    return scores;
}
