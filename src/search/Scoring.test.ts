import { bm25Totals, combineScore, computeScore, scoreBreakdown, scoreCandidates } from "./Scoring";
import { bm25 } from "./BM25/BM25";
import { buildIndexes } from "./InvertedIndex";
import { DEFAULT_WEIGHTS } from "../Config";
import { ReviewStats } from "../ProductTypes";
import { buildTestDocs, BLACK_GLOVES, RED_SCARF, WHITE_BEANIE } from "../test_data/TestData";

const { indexes } = buildIndexes(buildTestDocs());
const WHITE_BEANIE_QUERY = new Set(["white", "beanie"]);

describe('Scoring', () => {
    test('breakdown counts occurrences, not presence', () => {
        expect(scoreBreakdown(WHITE_BEANIE, WHITE_BEANIE_QUERY, indexes)).toEqual({
            titleOccurrences: 2,
            descriptionOccurrences: 1,
            reviewTextOccurrences: 0,
            exactTitleMatch: true,
            totalReviews: 5,
        });
        expect(scoreBreakdown(RED_SCARF, WHITE_BEANIE_QUERY, indexes)).toEqual({
            titleOccurrences: 0,
            descriptionOccurrences: 1,
            reviewTextOccurrences: 1,
            exactTitleMatch: false,
            totalReviews: 2,
        });
    });

    test('"white beanie" against "White Wool Beanie"', () => {
        //3 * 2 title + 1 * 1 description + 5 full title coverage + 0.1 * 5 reviews
        expect(computeScore(WHITE_BEANIE, WHITE_BEANIE_QUERY, indexes)).toBe(12.5);
        //1 description + 0.5 review text + 0.1 * 2 reviews
        expect(computeScore(RED_SCARF, WHITE_BEANIE_QUERY, indexes)).toBeCloseTo(1.7, 12);
    });

    test('total equals the weighted raw counts', () => {
        for (const url of [WHITE_BEANIE, RED_SCARF, BLACK_GLOVES])
        {
            const b = scoreBreakdown(url, WHITE_BEANIE_QUERY, indexes);
            const expected = 3 * b.titleOccurrences + 1 * b.descriptionOccurrences + 0.5 * b.reviewTextOccurrences + (b.exactTitleMatch ? 5 : 0) + 0.1 * b.totalReviews;
            expect(computeScore(url, WHITE_BEANIE_QUERY, indexes)).toBeCloseTo(expected, 12);
        }
    });

    test('full coverage needs every expanded token', () => {
        const tokens = new Set(["white", "beanie", "usa"]);
        const breakdown = scoreBreakdown(WHITE_BEANIE, tokens, indexes);
        expect(breakdown.exactTitleMatch).toBe(false);
        expect(combineScore(breakdown)).toBe(7.5);
    });

    test('no tokens, no coverage bonus', () => {
        expect(scoreBreakdown(BLACK_GLOVES, new Set(), indexes).exactTitleMatch).toBe(false);
        expect(computeScore(BLACK_GLOVES, new Set(), indexes)).toBe(0);
    });

    test('weights are configurable', () => {
        const title_only = { ...DEFAULT_WEIGHTS, description: 0, reviewText: 0, exactTitleMatch: 0, perReview: 0, title: 1 };
        expect(computeScore(WHITE_BEANIE, WHITE_BEANIE_QUERY, indexes, title_only)).toBe(2);
    });

    test('score candidates concurrently in chunks', async () => {
        const candidates = [WHITE_BEANIE, RED_SCARF, BLACK_GLOVES];
        const chunked = await scoreCandidates(candidates, WHITE_BEANIE_QUERY, indexes, { chunkSize: 1, concurrency: 2 });
        const single = await scoreCandidates(candidates, WHITE_BEANIE_QUERY, indexes);

        const asMap = (scores: { url: string, score: number }[]) => new Map(scores.map(s => [s.url, s.score]));
        expect(asMap(chunked)).toEqual(asMap(single));
        expect(asMap(chunked).get(WHITE_BEANIE)).toBe(12.5);
        expect(asMap(chunked).get(BLACK_GLOVES)).toBe(0);
        expect(chunked).toHaveLength(3);
    });

    test('bm25 ranking sums title and description BM25', async () => {
        const totals = bm25Totals(WHITE_BEANIE_QUERY, indexes);
        const title = bm25(WHITE_BEANIE_QUERY, indexes.fields.get("title") ?? new Map(), indexes.fieldLengths.get("title") ?? new Map(), 3);
        const description = bm25(WHITE_BEANIE_QUERY, indexes.fields.get("description") ?? new Map(), indexes.fieldLengths.get("description") ?? new Map(), 3);

        expect(totals.get(WHITE_BEANIE)).toBeCloseTo((title.get(WHITE_BEANIE) ?? 0) + (description.get(WHITE_BEANIE) ?? 0), 12);
        expect(totals.get(RED_SCARF)).toBeCloseTo(description.get(RED_SCARF) ?? 0, 12);

        const scores = await scoreCandidates([WHITE_BEANIE, RED_SCARF], WHITE_BEANIE_QUERY, indexes, { mode: "bm25" });
        const by_url = new Map(scores.map(s => [s.url, s.score]));
        expect(by_url.get(WHITE_BEANIE)).toBe(totals.get(WHITE_BEANIE));
        expect(by_url.get(WHITE_BEANIE) ?? 0).toBeGreaterThan(by_url.get(RED_SCARF) ?? 0);
    });

    test('nothing to score', async () => {
        expect(await scoreCandidates([], WHITE_BEANIE_QUERY, indexes)).toEqual([]);
        const empty = buildIndexes([]).indexes;
        expect(await scoreCandidates(["ghost"], WHITE_BEANIE_QUERY, empty)).toEqual([]);
    });

    test('a failing chunk fails the whole scoring run', async () => {
        class UnavailableStats extends Map<string, ReviewStats>
        {
            get(url: string) : ReviewStats | undefined
            {
                if (url === RED_SCARF) throw new Error("review stats unavailable");
                return super.get(url);
            }
        }
        const broken = { ...indexes, reviewStats: new UnavailableStats(indexes.reviewStats) };

        await expect(scoreCandidates([WHITE_BEANIE, RED_SCARF, BLACK_GLOVES], WHITE_BEANIE_QUERY, broken, { chunkSize: 1, concurrency: 2 }))
            .rejects.toThrow("review stats unavailable");
    });
});
