#!/usr/bin/env node
import { Command, Option } from "commander";
import { readFile, writeFile } from "fs/promises";
import { loadConfig, SearchConfig } from "./Config";
import { ConfigError, SearchEngineError } from "./Errors";
import { ProductSearch } from "./ProductSearch";
import { loadDocuments } from "./documents/DocumentStore";
import { loadSynonymTable } from "./search/QueryProcessor";
import { RankingMode, SynonymTable } from "./ProductTypes";
import { logger } from "./Logger";

async function readConfig(path: string | undefined, overrides: Record<string, unknown> = {}) : Promise<SearchConfig>
{
    if (!path) return loadConfig(overrides);

    let json: unknown;
    try {
        json = JSON.parse(await readFile(path, "utf-8"));
    } catch (error) {
        throw new ConfigError(`Unable to read configuration file: ${path}`, error);
    }
    if (typeof json !== "object" || json === null || Array.isArray(json)) throw new ConfigError(`Configuration file must hold a JSON object: ${path}`);
    return loadConfig({ ...json, ...overrides });
}

async function output(text: string, path: string | undefined) : Promise<void>
{
    if (path) await writeFile(path, text, "utf-8");
    else process.stdout.write(text + "\n");
}

//a fresh command tree per run, commander keeps parsed option values on the instance
export function createProgram() : Command
{
    const program = new Command()
        .name("product-search")
        .description("Index product documents and answer ranked keyword queries");

    program
        .command("build")
        .description("Build title, description, review and feature indexes from a JSONL corpus")
        .requiredOption("-i, --input <file>", "JSONL corpus, one product per line")
        .requiredOption("-o, --out <dir>", "snapshot directory to write")
        .option("-f, --features <keys...>", "feature keys to index (default: every key in the corpus)")
        .option("-c, --config <file>", "JSON configuration file")
        .action(async (options: { input: string, out: string, features?: string[], config?: string }) => {
            const config = await readConfig(options.config, options.features ? { featureKeys: options.features } : {});
            const corpus = await loadDocuments(options.input);
            const engine = ProductSearch.fromDocuments(corpus.documents, new Map(), config);
            const manifest = await engine.saveSnapshot(options.out);

            await output(JSON.stringify({
                documents: manifest.documentCount,
                skipped: corpus.skipped,
                duplicates: corpus.duplicates,
                features: Object.keys(manifest.features),
                fingerprint: manifest.fingerprint,
            }, null, 2), undefined);
        });

    program
        .command("search")
        .description("Answer a query against a snapshot")
        .argument("<query>", "free text query")
        .requiredOption("-x, --index <dir>", "snapshot directory written by build")
        .requiredOption("-d, --documents <file>", "JSONL corpus the snapshot was built from")
        .option("-s, --synonyms <file>", "JSON synonym table { token: [synonyms] }")
        .addOption(new Option("-r, --ranking <mode>", "ranking signal").choices(["combined", "bm25"]))
        .option("-l, --limit <n>", "maximum number of results", (value: string) => Number.parseInt(value, 10))
        .option("-c, --config <file>", "JSON configuration file")
        .option("-o, --out <file>", "write the result JSON here instead of stdout")
        .action(async (query: string, options: { index: string, documents: string, synonyms?: string, ranking?: RankingMode, limit?: number, config?: string, out?: string }) => {
            const config = await readConfig(options.config);
            const corpus = await loadDocuments(options.documents);
            const loaded = await ProductSearch.fromSnapshot(options.index, corpus.documents, new Map(), config);
            //synonyms go through the tokenizer the snapshot was built with
            const synonyms: SynonymTable = options.synonyms ? await loadSynonymTable(options.synonyms, ProductSearch.tokenizerFor(loaded.config)) : new Map();
            const engine = loaded.withSynonyms(synonyms);

            if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 1)) {
                throw new ConfigError("--limit must be a positive integer");
            }

            const result = await engine.search(query, { ranking: options.ranking, limit: options.limit });
            await output(JSON.stringify(result, null, 2), options.out);
        });

    return program;
}

export async function main(argv: string[] = process.argv) : Promise<void>
{
    try {
        await createProgram().parseAsync(argv);
    } catch (error) {
        if (error instanceof SearchEngineError) {
            logger.error({ code: error.code, cause: error.cause }, error.message);
        } else {
            logger.error({ err: error }, "Unexpected failure");
        }
        process.exitCode = 1;
    }
}

if (require.main === module) {
    void main();
}
