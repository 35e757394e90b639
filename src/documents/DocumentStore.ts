import BTree from "sorted-btree";
import { z } from "zod";
import { createReadStream } from "fs";
import { access } from "fs/promises";
import { createInterface } from "readline";
import { ProductDocument, Review } from "../ProductTypes";
import { CorpusLoadError } from "../Errors";
import { logger } from "../Logger";

const log = logger.child({ module: "documents" });

const RatingSchema = z.number().int().min(1).max(5);

//lenient per field: a bad value makes the field absent, it never rejects the record
const ReviewSchema = z.object({
    rating: z.unknown().transform((v) => {
        const parsed = RatingSchema.safeParse(v);
        return parsed.success ? parsed.data : undefined;
    }),
    date: z.string().optional().catch(undefined),
    text: z.string().optional().catch(undefined),
}).catch({ rating: undefined, date: undefined, text: undefined });

const RecordSchema = z.object({
    url: z.string().refine((url) => url.trim().length > 0),
    title: z.string().optional().catch(undefined),
    description: z.string().optional().catch(undefined),
    //crawler records carry the first paragraph instead of a description
    first_paragraph: z.string().optional().catch(undefined),
    product_features: z.record(z.unknown()).optional().catch(undefined),
    product_reviews: z.array(ReviewSchema).optional().catch(undefined),
});

export type SkipReason = "empty" | "invalid_json" | "invalid_record";

export type ParsedLine =
    | { ok: true, document: ProductDocument }
    | { ok: false, reason: SkipReason };

export interface LoadedCorpus
{
    documents: ProductDocument[],
    skipped: number,
    duplicates: number
}

function stringifyFeatures(raw: Record<string, unknown> | undefined) : Record<string, string>
{
    const features: Record<string, string> = {};
    if (!raw) return features;

    for (const [key, value] of Object.entries(raw))
    {
        if (typeof value === "string") features[key] = value;
        else if (typeof value === "number" || typeof value === "boolean") features[key] = String(value);
    }
    return features;
}

function stripUndefined(review: { rating?: number, date?: string, text?: string }) : Review
{
    const out: Review = {};
    if (review.rating !== undefined) out.rating = review.rating;
    if (review.date !== undefined) out.date = review.date;
    if (review.text !== undefined) out.text = review.text;
    return out;
}

//map one already-decoded JSON value onto the typed document shape
export function toProductDocument(value: unknown) : ProductDocument | undefined
{
    const result = RecordSchema.safeParse(value);
    if (!result.success) return undefined;

    const record = result.data;
    const description = record.description ?? record.first_paragraph;

    return {
        url: record.url,
        ...(record.title !== undefined ? { title: record.title } : {}),
        ...(description !== undefined ? { description } : {}),
        features: stringifyFeatures(record.product_features),
        reviews: (record.product_reviews ?? []).map(stripUndefined),
    };
}

export function parseDocumentLine(line: string) : ParsedLine
{
    if (line.trim().length === 0) return { ok: false, reason: "empty" };

    let value: unknown;
    try {
        value = JSON.parse(line);
    } catch {
        return { ok: false, reason: "invalid_json" };
    }

    const document = toProductDocument(value);
    if (!document) return { ok: false, reason: "invalid_record" };
    return { ok: true, document };
}

//first record wins for a url, later ones are counted as duplicates
export function parseDocumentLines(lines: Iterable<string>) : LoadedCorpus
{
    const seen = new Set<string>();
    const corpus: LoadedCorpus = { documents: [], skipped: 0, duplicates: 0 };

    for (const line of lines)
    {
        addLine(corpus, seen, line);
    }
    return corpus;
}

function addLine(corpus: LoadedCorpus, seen: Set<string>, line: string) : void
{
    const parsed = parseDocumentLine(line);
    if (!parsed.ok) {
        //blank lines are formatting, not malformed records
        if (parsed.reason !== "empty") corpus.skipped++;
        return;
    }
    if (seen.has(parsed.document.url)) {
        corpus.duplicates++;
        return;
    }
    seen.add(parsed.document.url);
    corpus.documents.push(parsed.document);
}

//stream a JSONL corpus, malformed lines are skipped and counted, an unreadable file is fatal
export async function loadDocuments(path: string) : Promise<LoadedCorpus>
{
    try {
        await access(path);
    } catch (error) {
        throw new CorpusLoadError(path, error);
    }

    const seen = new Set<string>();
    const corpus: LoadedCorpus = { documents: [], skipped: 0, duplicates: 0 };

    try {
        const lines = createInterface({ input: createReadStream(path, { encoding: "utf-8" }), crlfDelay: Infinity });
        for await (const line of lines)
        {
            addLine(corpus, seen, line);
        }
    } catch (error) {
        throw new CorpusLoadError(path, error);
    }

    if (corpus.skipped > 0 || corpus.duplicates > 0) {
        log.warn({ path, skipped: corpus.skipped, duplicates: corpus.duplicates }, "Skipped records while loading corpus");
    }
    log.info({ path, documents: corpus.documents.length }, "Loaded corpus");

    return corpus;
}

//url ordered, read-only once built
export class DocumentStore
{
    private readonly store: BTree<string, ProductDocument>;

    private constructor(store: BTree<string, ProductDocument>)
    {
        this.store = store;
    }

    static from(documents: Iterable<ProductDocument>) : DocumentStore
    {
        const store = new BTree<string, ProductDocument>();
        for (const document of documents)
        {
            //setIfNotPresent keeps the first record for a url
            store.setIfNotPresent(document.url, document);
        }
        store.freeze();
        return new DocumentStore(store);
    }

    get(url: string) : ProductDocument | undefined
    {
        return this.store.get(url);
    }

    has(url: string) : boolean
    {
        return this.store.has(url);
    }

    get size() : number
    {
        return this.store.size;
    }

    values() : ProductDocument[]
    {
        return Array.from(this.store.values());
    }
}
