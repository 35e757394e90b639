import BTree from "sorted-btree";
import { DocumentScore, ProductDocument, ScoredResult } from "../ProductTypes";

export type DocumentLookup = (url: string) => ProductDocument | undefined;

//score descending, then url ascending, a total order over candidates
export function compareScores(a: DocumentScore, b: DocumentScore) : number
{
    if (a.score !== b.score) return b.score > a.score ? 1 : -1;
    return a.url < b.url ? -1 : a.url > b.url ? 1 : 0;
}

export function roundScore(score: number) : number
{
    return Math.round(score * 1000) / 1000;
}

//ordering uses the exact score, the emitted score is rounded to 3 decimals
export function rank(scores: Iterable<DocumentScore>, lookup: DocumentLookup, limit?: number) : ScoredResult[]
{
    const ordered = new BTree<DocumentScore, undefined>(undefined, compareScores);
    for (const score of scores) ordered.set(score, undefined);

    const results: ScoredResult[] = [];
    for (const entry of ordered.keys())
    {
        if (limit !== undefined && results.length >= limit) break;
        const document = lookup(entry.url);
        results.push({
            title: document?.title ?? "",
            url: entry.url,
            description: document?.description ?? "",
            score: roundScore(entry.score),
        });
    }
    return results;
}
