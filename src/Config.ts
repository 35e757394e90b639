import { z } from "zod";
import { ConfigError } from "./Errors";

//k1 caps how much repeated terms count, b scales the penalty for long fields
export const DEFAULT_K1 = 1.5;
export const DEFAULT_B = 0.75;

//weights of the combined ranking signal
export const DEFAULT_WEIGHTS = {
    title: 3, //per title occurrence of a query token
    description: 1, //per description occurrence
    reviewText: 0.5, //per review text occurrence
    exactTitleMatch: 5, //every query token appears in the title
    perReview: 0.1 //per review the product has received
} as const;

//change this depending on core count and corpus size
export const DEFAULT_SCORING_CONCURRENCY = 4;
export const DEFAULT_SCORING_CHUNK_SIZE = 256;

//features whose snapshot file name differs from the feature key
export const DEFAULT_FEATURE_FILE_ALIASES: Readonly<Record<string, string>> = Object.freeze({ "made in": "origin" });

const WeightsSchema = z.object({
    title: z.number().nonnegative().default(DEFAULT_WEIGHTS.title),
    description: z.number().nonnegative().default(DEFAULT_WEIGHTS.description),
    reviewText: z.number().nonnegative().default(DEFAULT_WEIGHTS.reviewText),
    exactTitleMatch: z.number().nonnegative().default(DEFAULT_WEIGHTS.exactTitleMatch),
    perReview: z.number().nonnegative().default(DEFAULT_WEIGHTS.perReview),
}).strict();

const SearchConfigSchema = z.object({
    bm25: z.object({
        k1: z.number().positive().default(DEFAULT_K1),
        b: z.number().min(0).max(1).default(DEFAULT_B),
    }).strict().default({}),
    weights: WeightsSchema.default({}),
    scoring: z.object({
        concurrency: z.number().int().positive().default(DEFAULT_SCORING_CONCURRENCY),
        chunkSize: z.number().int().positive().default(DEFAULT_SCORING_CHUNK_SIZE),
    }).strict().default({}),
    tokenizer: z.object({
        stem: z.boolean().default(false),
    }).strict().default({}),
    textFields: z.array(z.enum(["title", "description"])).default(["title", "description"]),
    //undefined means every feature key found in the corpus
    featureKeys: z.array(z.string().min(1)).optional(),
    featureFileAliases: z.record(z.string().min(1)).default(() => ({ ...DEFAULT_FEATURE_FILE_ALIASES })),
    ranking: z.enum(["combined", "bm25"]).default("combined"),
    limit: z.number().int().positive().optional(),
})
.strict()
.superRefine((data, ctx) => {
    //the AND filter and the exact match bonus both read the title index
    if (!data.textFields.includes("title")) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "textFields must include title",
            path: ["textFields"],
        });
    }
});

const EnvSchema = z.object({
    PRODUCT_SEARCH_CONCURRENCY: z.coerce.number().int().positive().optional(),
    PRODUCT_SEARCH_STEM: z
        .enum(["true", "false"])
        .optional()
        .transform((v) => v === undefined ? undefined : v === "true"),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type SearchConfigInput = z.input<typeof SearchConfigSchema>;
export type RankingWeights = SearchConfig["weights"];
export type BM25Parameters = SearchConfig["bm25"];

function isRecord(v: unknown): v is Record<string, unknown>
{
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function formatIssues(error: z.ZodError): string
{
    return error.issues.map((e) => `  - ${e.path.join(".") || "(root)"}: ${e.message}`).join("\n");
}

//precedence: explicit overrides > environment > defaults
export function loadConfig(overrides: unknown = {}, env: NodeJS.ProcessEnv = process.env): SearchConfig
{
    if (!isRecord(overrides)) throw new ConfigError("Configuration must be a JSON object");

    const envResult = EnvSchema.safeParse(env);
    if (!envResult.success) throw new ConfigError(`Invalid environment:\n${formatIssues(envResult.error)}`, envResult.error);

    const fromEnv = envResult.data;
    const scoring = isRecord(overrides.scoring) ? overrides.scoring : {};
    const tokenizer = isRecord(overrides.tokenizer) ? overrides.tokenizer : {};

    const merged = {
        ...overrides,
        scoring: fromEnv.PRODUCT_SEARCH_CONCURRENCY === undefined ? overrides.scoring : { concurrency: fromEnv.PRODUCT_SEARCH_CONCURRENCY, ...scoring },
        tokenizer: fromEnv.PRODUCT_SEARCH_STEM === undefined ? overrides.tokenizer : { stem: fromEnv.PRODUCT_SEARCH_STEM, ...tokenizer },
    };

    const result = SearchConfigSchema.safeParse(merged);
    if (!result.success) throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error)}`, result.error);

    return result.data;
}

export function defaultConfig(): SearchConfig
{
    return loadConfig({}, {});
}
