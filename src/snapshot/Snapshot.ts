import { mkdir, readdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import { sha256 } from "js-sha256";
import { z } from "zod";
import { FeatureIndex, PositionalIndex, ReviewStats, SearchIndexes, TEXT_FIELDS, TextField } from "../ProductTypes";
import { DEFAULT_FEATURE_FILE_ALIASES } from "../Config";
import { SnapshotError } from "../Errors";
import { logger } from "../Logger";

const log = logger.child({ module: "snapshot" });

export const SNAPSHOT_VERSION = 1;
export const MANIFEST_FILE = "manifest.json";
export const REVIEWS_FILE = "reviews_index.json";
export const REVIEW_TEXT_FILE = "reviews_text_index.json";

const INDEX_FILE_SUFFIX = "_index.json";
const FEATURE_FILE_PATTERN = /^[\p{L}\p{N}_-]+_index\.json$/u;

//wire shapes, these are the exact files other tools read and write
export type PositionalIndexJSON = Record<string, Record<string, number[]>>;
export type FeatureIndexJSON = Record<string, string[]>;
export type ReviewStatsJSON = Record<string, { total_reviews: number, mean_mark: number | null, last_rating: number | null }>;

const PositionalIndexSchema = z.record(z.record(z.array(z.number().int().nonnegative())));
const FeatureIndexSchema = z.record(z.array(z.string()));
const ReviewStatsSchema = z.record(z.object({
    total_reviews: z.number().int().nonnegative(),
    mean_mark: z.number().nullable(),
    last_rating: z.number().int().nullable(),
}));
const ManifestSchema = z.object({
    version: z.literal(SNAPSHOT_VERSION),
    documentCount: z.number().int().nonnegative(),
    fields: z.array(z.enum(["title", "description"])),
    features: z.record(z.string().regex(FEATURE_FILE_PATTERN)),
    //queries must be tokenized the way the indexes were
    tokenizer: z.object({
        stem: z.boolean(),
    }),
    fingerprint: z.string(),
});

export type SnapshotManifest = z.infer<typeof ManifestSchema>;

export interface SnapshotOptions
{
    featureFileAliases?: Readonly<Record<string, string>>,
    stem?: boolean
}

export interface LoadedSnapshot
{
    indexes: SearchIndexes,
    manifest: SnapshotManifest | undefined //undefined for a bare index directory
}

export function fieldFileName(field: TextField) : string
{
    return `${field}_index.json`;
}

//"made in" -> origin_index.json, "fit type" -> fit_type_index.json
export function featureFileName(featureKey: string, aliases: Readonly<Record<string, string>> = DEFAULT_FEATURE_FILE_ALIASES) : string
{
    const base = aliases[featureKey] ?? featureKey;
    return `${base.trim().replace(/[^\p{L}\p{N}_-]+/gu, "_")}${INDEX_FILE_SUFFIX}`;
}

//origin_index.json -> "made in", brand_index.json -> "brand"
export function featureKeyFromFileName(file: string, aliases: Readonly<Record<string, string>> = DEFAULT_FEATURE_FILE_ALIASES) : string
{
    const base = file.slice(0, -INDEX_FILE_SUFFIX.length);
    const aliased = Object.entries(aliases).find(([, alias]) => alias === base);
    return aliased ? aliased[0] : base;
}

export function serializePositionalIndex(index: PositionalIndex) : PositionalIndexJSON
{
    return Object.fromEntries(Array.from(index, ([token, postings]): [string, Record<string, number[]>] =>
        [token, Object.fromEntries(Array.from(postings, ([url, positions]): [string, number[]] => [url, [...positions]]))]
    ));
}

export function serializeFeatureIndex(index: FeatureIndex) : FeatureIndexJSON
{
    return Object.fromEntries(Array.from(index, ([token, urls]): [string, string[]] => [token, Array.from(urls)]));
}

export function serializeReviewStats(stats: ReadonlyMap<string, ReviewStats>) : ReviewStatsJSON
{
    return Object.fromEntries(Array.from(stats, ([url, entry]): [string, ReviewStatsJSON[string]] => [url, {
        total_reviews: entry.total_reviews,
        mean_mark: entry.mean_mark ?? null,
        last_rating: entry.last_rating ?? null,
    }]));
}

export function deserializePositionalIndex(json: PositionalIndexJSON) : Map<string, Map<string, number[]>>
{
    return new Map(Object.entries(json).map(([token, postings]): [string, Map<string, number[]>] => [token, new Map(Object.entries(postings))]));
}

export function deserializeFeatureIndex(json: FeatureIndexJSON) : Map<string, Set<string>>
{
    return new Map(Object.entries(json).map(([token, urls]): [string, Set<string>] => [token, new Set(urls)]));
}

export function deserializeReviewStats(json: ReviewStatsJSON) : Map<string, ReviewStats>
{
    return new Map(Object.entries(json).map(([url, entry]): [string, ReviewStats] => [url, {
        total_reviews: entry.total_reviews,
        mean_mark: entry.mean_mark ?? undefined,
        last_rating: entry.last_rating ?? undefined,
    }]));
}

//a field's token length is the sum of its term frequencies, positions cover every kept token
export function fieldLengthsFromIndex(index: PositionalIndex, urls: Iterable<string>) : Map<string, number>
{
    const lengths = new Map<string, number>();
    for (const url of urls) lengths.set(url, 0);

    for (const postings of index.values())
    {
        for (const [url, positions] of postings)
        {
            lengths.set(url, (lengths.get(url) ?? 0) + positions.length);
        }
    }
    return lengths;
}

function sortedEntries<V>(entries: Iterable<[string, V]>) : [string, V][]
{
    return Array.from(entries).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

//sha256 over a key sorted rendering, insertion order does not change it
export function computeFingerprint(indexes: SearchIndexes) : string
{
    const canonicalPositional = (index: PositionalIndex) => sortedEntries(index).map(([token, postings]) => [token, sortedEntries(postings)]);

    const canonical = {
        documentCount: indexes.documentCount,
        fields: sortedEntries(indexes.fields).map(([field, index]) => [field, canonicalPositional(index)]),
        reviewText: canonicalPositional(indexes.reviewText),
        features: sortedEntries(indexes.features).map(([key, index]) => [key, sortedEntries(index).map(([token, urls]) => [token, Array.from(urls).sort()])]),
        reviewStats: sortedEntries(Object.entries(serializeReviewStats(indexes.reviewStats))),
    };

    return sha256(JSON.stringify(canonical));
}

async function writeJSON(path: string, value: unknown) : Promise<void>
{
    await writeFile(path, JSON.stringify(value, null, 2), "utf-8");
}

export async function writeSnapshot(directory: string, indexes: SearchIndexes, options: SnapshotOptions = {}) : Promise<SnapshotManifest>
{
    const aliases = options.featureFileAliases ?? DEFAULT_FEATURE_FILE_ALIASES;
    const fields = TEXT_FIELDS.filter(field => indexes.fields.has(field));

    const reserved = reservedFileNames();
    const features: Record<string, string> = {};
    for (const key of indexes.features.keys())
    {
        const file = featureFileName(key, aliases);
        if (reserved.has(file)) throw new SnapshotError(`Feature "${key}" maps to a file name already in use: ${file}`, file);
        reserved.add(file);
        features[key] = file;
    }

    try {
        await mkdir(directory, { recursive: true });

        for (const field of fields)
        {
            const index = indexes.fields.get(field);
            if (index) await writeJSON(join(directory, fieldFileName(field)), serializePositionalIndex(index));
        }
        await writeJSON(join(directory, REVIEW_TEXT_FILE), serializePositionalIndex(indexes.reviewText));
        await writeJSON(join(directory, REVIEWS_FILE), serializeReviewStats(indexes.reviewStats));

        for (const [key, index] of indexes.features)
        {
            await writeJSON(join(directory, features[key]), serializeFeatureIndex(index));
        }
    } catch (error) {
        throw new SnapshotError(`Unable to write snapshot to ${directory}`, undefined, error);
    }

    const manifest: SnapshotManifest = {
        version: SNAPSHOT_VERSION,
        documentCount: indexes.documentCount,
        fields,
        features,
        tokenizer: { stem: options.stem ?? false },
        fingerprint: computeFingerprint(indexes),
    };
    try {
        await writeJSON(join(directory, MANIFEST_FILE), manifest);
    } catch (error) {
        throw new SnapshotError(`Unable to write snapshot manifest to ${directory}`, MANIFEST_FILE, error);
    }

    log.info({ directory, documents: manifest.documentCount, fingerprint: manifest.fingerprint }, "Wrote snapshot");
    return manifest;
}

async function readJSON<T>(directory: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>) : Promise<T>
{
    let text: string;
    try {
        text = await readFile(join(directory, file), "utf-8");
    } catch (error) {
        throw new SnapshotError(`Unable to read snapshot file: ${file}`, file, error);
    }

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        throw new SnapshotError(`Snapshot file is not valid JSON: ${file}`, file, error);
    }

    const result = schema.safeParse(json);
    if (!result.success) throw new SnapshotError(`Snapshot file has an unexpected shape: ${file}`, file, result.error);
    return result.data;
}

async function listDirectory(directory: string) : Promise<string[]>
{
    try {
        return await readdir(directory);
    } catch (error) {
        throw new SnapshotError(`Unable to read snapshot directory: ${directory}`, undefined, error);
    }
}

function reservedFileNames() : Set<string>
{
    return new Set<string>([MANIFEST_FILE, REVIEWS_FILE, REVIEW_TEXT_FILE, ...TEXT_FIELDS.map(fieldFileName)]);
}

async function readFields(directory: string, fieldsToRead: readonly TextField[], urls: ReadonlyMap<string, unknown>)
    : Promise<Pick<SearchIndexes, "fields" | "fieldLengths">>
{
    const fields = new Map<TextField, PositionalIndex>();
    const fieldLengths = new Map<TextField, ReadonlyMap<string, number>>();
    for (const field of fieldsToRead)
    {
        const index = deserializePositionalIndex(await readJSON(directory, fieldFileName(field), PositionalIndexSchema));
        fields.set(field, index);
        fieldLengths.set(field, fieldLengthsFromIndex(index, urls.keys()));
    }
    return { fields, fieldLengths };
}

//a directory holding only the flat index files, as other indexers write them
async function readBareIndexes(directory: string, files: readonly string[], aliases: Readonly<Record<string, string>>) : Promise<SearchIndexes>
{
    const reviewStats = deserializeReviewStats(await readJSON(directory, REVIEWS_FILE, ReviewStatsSchema));
    const present = new Set(files);

    const fieldsToRead = TEXT_FIELDS.filter(field => field === "title" || present.has(fieldFileName(field)));
    const { fields, fieldLengths } = await readFields(directory, fieldsToRead, reviewStats);

    const reviewText = present.has(REVIEW_TEXT_FILE)
        ? deserializePositionalIndex(await readJSON(directory, REVIEW_TEXT_FILE, PositionalIndexSchema))
        : new Map<string, Map<string, number[]>>();

    const reserved = reservedFileNames();
    const features = new Map<string, FeatureIndex>();
    for (const file of [...files].sort())
    {
        if (reserved.has(file) || !FEATURE_FILE_PATTERN.test(file)) continue;
        features.set(featureKeyFromFileName(file, aliases), deserializeFeatureIndex(await readJSON(directory, file, FeatureIndexSchema)));
    }

    return Object.freeze({
        fields,
        reviewText,
        features,
        reviewStats,
        fieldLengths,
        documentCount: reviewStats.size,
    });
}

export async function readSnapshot(directory: string, aliases: Readonly<Record<string, string>> = DEFAULT_FEATURE_FILE_ALIASES) : Promise<LoadedSnapshot>
{
    const files = await listDirectory(directory);

    if (!files.includes(MANIFEST_FILE)) {
        const indexes = await readBareIndexes(directory, files, aliases);
        log.info({ directory, documents: indexes.documentCount, features: Array.from(indexes.features.keys()) }, "Loaded index directory without a manifest");
        return { indexes, manifest: undefined };
    }

    const manifest = await readJSON(directory, MANIFEST_FILE, ManifestSchema);

    const reviewStats = deserializeReviewStats(await readJSON(directory, REVIEWS_FILE, ReviewStatsSchema));
    if (reviewStats.size !== manifest.documentCount) {
        throw new SnapshotError(`Manifest lists ${manifest.documentCount} documents but the review index holds ${reviewStats.size}`, REVIEWS_FILE);
    }

    const { fields, fieldLengths } = await readFields(directory, manifest.fields, reviewStats);

    const reviewText = deserializePositionalIndex(await readJSON(directory, REVIEW_TEXT_FILE, PositionalIndexSchema));

    const features = new Map<string, FeatureIndex>();
    for (const [key, file] of Object.entries(manifest.features))
    {
        features.set(key, deserializeFeatureIndex(await readJSON(directory, file, FeatureIndexSchema)));
    }

    const indexes: SearchIndexes = Object.freeze({
        fields,
        reviewText,
        features,
        reviewStats,
        fieldLengths,
        documentCount: manifest.documentCount,
    });

    if (computeFingerprint(indexes) !== manifest.fingerprint) {
        throw new SnapshotError("Snapshot contents do not match the manifest fingerprint", MANIFEST_FILE);
    }

    log.info({ directory, documents: manifest.documentCount }, "Loaded snapshot");
    return { indexes, manifest };
}
