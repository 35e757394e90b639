//a single customer review as it appears in the product record
export interface Review
{
    rating?: number, //integer 1-5, absent when missing or not a valid rating
    date?: string,
    text?: string
}

//the typed form of one JSONL product record, immutable once loaded
export interface ProductDocument
{
    readonly url: string, //primary key
    readonly title?: string,
    readonly description?: string,
    readonly features: Readonly<Record<string, string>>, //eg. { brand: "Acme", "made in": "France" }
    readonly reviews: readonly Review[]
}

export type TextField = "title" | "description";
export const TEXT_FIELDS: readonly TextField[] = ["title", "description"];

type IndexToken = string;
type DocumentURL = string;

//token -> url -> strictly increasing token offsets
export type PositionalIndex = ReadonlyMap<IndexToken, ReadonlyMap<DocumentURL, readonly number[]>>;

//token -> urls sharing that feature token
export type FeatureIndex = ReadonlyMap<IndexToken, ReadonlySet<DocumentURL>>;

//either kind of index can feed the candidate filter, only the url keys matter there
export type TokenIndex = ReadonlyMap<IndexToken, ReadonlyMap<DocumentURL, unknown> | ReadonlySet<DocumentURL>>;

export interface ReviewStats
{
    total_reviews: number,
    mean_mark: number | undefined, //undefined when no review carries a rating
    last_rating: number | undefined //rating of the last review in the given order
}

//the frozen bundle every query stage reads from
export interface SearchIndexes
{
    readonly fields: ReadonlyMap<TextField, PositionalIndex>,
    readonly reviewText: PositionalIndex,
    readonly features: ReadonlyMap<string, FeatureIndex>,
    readonly reviewStats: ReadonlyMap<DocumentURL, ReviewStats>,
    readonly fieldLengths: ReadonlyMap<TextField, ReadonlyMap<DocumentURL, number>>,
    readonly documentCount: number
}

export type SynonymTable = ReadonlyMap<IndexToken, readonly string[]>;

export type RankingMode = "combined" | "bm25";

export interface DocumentScore
{
    url: string,
    score: number
}

export interface ScoredResult
{
    title: string,
    url: string,
    description: string,
    score: number
}

export interface QueryResult
{
    query: string,
    total_documents: number,
    filtered_documents: number,
    results: ScoredResult[]
}
