import { join } from "path";
import { DocumentStore, loadDocuments, parseDocumentLine, parseDocumentLines, toProductDocument } from "./DocumentStore";
import { CorpusLoadError } from "../Errors";
import { BLACK_GLOVES, PRODUCTS_FILE, RED_SCARF, WHITE_BEANIE } from "../test_data/TestData";

describe('DocumentStore', () => {
    test('parse a full record', () => {
        const parsed = parseDocumentLine(JSON.stringify({
            url: "https://shop.test/p/1",
            title: "Blue Cap",
            description: "Cotton cap",
            product_features: { brand: "Acme", size: 58, washable: true, tags: ["x"] },
            product_reviews: [{ rating: 5, date: "2024-01-01", text: "Great" }, { rating: 9, text: "Too high" }, "not a review"],
        }));

        expect(parsed).toEqual({
            ok: true,
            document: {
                url: "https://shop.test/p/1",
                title: "Blue Cap",
                description: "Cotton cap",
                features: { brand: "Acme", size: "58", washable: "true" },
                reviews: [{ rating: 5, date: "2024-01-01", text: "Great" }, { text: "Too high" }, {}],
            },
        });
    });

    test('skip reasons', () => {
        expect(parseDocumentLine("   ")).toEqual({ ok: false, reason: "empty" });
        expect(parseDocumentLine("{oops")).toEqual({ ok: false, reason: "invalid_json" });
        expect(parseDocumentLine('{"title": "no url"}')).toEqual({ ok: false, reason: "invalid_record" });
        expect(parseDocumentLine('{"url": "  "}')).toEqual({ ok: false, reason: "invalid_record" });
        expect(parseDocumentLine("42")).toEqual({ ok: false, reason: "invalid_record" });
    });

    test('missing optional fields become empty', () => {
        expect(toProductDocument({ url: "u", product_reviews: "many" })).toEqual({ url: "u", features: {}, reviews: [] });
    });

    test('crawler records use the first paragraph as description', () => {
        const document = toProductDocument({ url: "u", title: "T", first_paragraph: "Opening text", links: ["u2"] });
        expect(document?.description).toBe("Opening text");

        const preferred = toProductDocument({ url: "u", description: "Real description", first_paragraph: "Opening text" });
        expect(preferred?.description).toBe("Real description");
    });

    test('count skipped and duplicate lines', () => {
        const corpus = parseDocumentLines([
            '{"url": "a", "title": "first"}',
            "not json",
            "",
            '{"url": "a", "title": "second"}',
            '{"url": "b"}',
        ]);
        expect(corpus.documents.map(d => d.title ?? null)).toEqual(["first", null]);
        expect(corpus.skipped).toBe(1);
        expect(corpus.duplicates).toBe(1);
    });

    test('load a jsonl file', async () => {
        const corpus = await loadDocuments(PRODUCTS_FILE);
        expect(corpus.documents.map(d => d.url)).toEqual([WHITE_BEANIE, RED_SCARF, BLACK_GLOVES]);
        expect(corpus.skipped).toBe(2);
        expect(corpus.duplicates).toBe(1);
        expect(corpus.documents[0].title).toBe("White Wool Beanie");
    });

    test('an unreadable corpus is fatal', async () => {
        await expect(loadDocuments(join(__dirname, "does-not-exist.jsonl"))).rejects.toBeInstanceOf(CorpusLoadError);
    });

    test('store keeps the first document per url in url order', () => {
        const store = DocumentStore.from([
            { url: "b", title: "B", features: {}, reviews: [] },
            { url: "a", title: "A", features: {}, reviews: [] },
            { url: "b", title: "B2", features: {}, reviews: [] },
        ]);
        expect(store.size).toBe(2);
        expect(store.get("b")?.title).toBe("B");
        expect(store.has("a")).toBe(true);
        expect(store.has("c")).toBe(false);
        expect(store.values().map(d => d.url)).toEqual(["a", "b"]);
    });
});
