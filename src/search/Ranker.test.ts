import { compareScores, rank, roundScore } from "./Ranker";
import { ProductDocument } from "../ProductTypes";

const documents = new Map<string, ProductDocument>([
    ["https://shop.test/a", { url: "https://shop.test/a", title: "A", description: "first", features: {}, reviews: [] }],
    ["https://shop.test/b", { url: "https://shop.test/b", title: "B", features: {}, reviews: [] }],
]);
const lookup = (url: string) => documents.get(url);

describe('Ranker', () => {
    test('score descending', () => {
        const results = rank([
            { url: "https://shop.test/b", score: 1.5 },
            { url: "https://shop.test/a", score: 7 },
            { url: "https://shop.test/c", score: 3.25 },
        ], lookup);

        expect(results).toEqual([
            { title: "A", url: "https://shop.test/a", description: "first", score: 7 },
            { title: "", url: "https://shop.test/c", description: "", score: 3.25 },
            { title: "B", url: "https://shop.test/b", description: "", score: 1.5 },
        ]);
    });

    test('ties break by url ascending whatever the input order', () => {
        const forward = rank([{ url: "b", score: 2 }, { url: "a", score: 2 }, { url: "c", score: 2 }], lookup);
        const backward = rank([{ url: "c", score: 2 }, { url: "a", score: 2 }, { url: "b", score: 2 }], lookup);
        expect(forward.map(r => r.url)).toEqual(["a", "b", "c"]);
        expect(backward.map(r => r.url)).toEqual(["a", "b", "c"]);
    });

    test('order uses exact scores, output is rounded', () => {
        const results = rank([{ url: "a", score: 1.0004 }, { url: "b", score: 1.0001 }], lookup);
        expect(results.map(r => r.url)).toEqual(["a", "b"]);
        expect(results.map(r => r.score)).toEqual([1, 1]);
        expect(roundScore(12.34567)).toBe(12.346);
    });

    test('limit', () => {
        const results = rank([{ url: "a", score: 1 }, { url: "b", score: 3 }, { url: "c", score: 2 }], lookup, 2);
        expect(results.map(r => r.url)).toEqual(["b", "c"]);
    });

    test('compareScores', () => {
        expect(compareScores({ url: "a", score: 2 }, { url: "b", score: 1 })).toBeLessThan(0);
        expect(compareScores({ url: "b", score: 1 }, { url: "a", score: 1 })).toBeGreaterThan(0);
        expect(compareScores({ url: "a", score: 1 }, { url: "a", score: 1 })).toBe(0);
    });
});
