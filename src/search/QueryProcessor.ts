import { readFile } from "fs/promises";
import { z } from "zod";
import { SynonymTable } from "../ProductTypes";
import { SynonymTableError } from "../Errors";
import { Tokenizer, tokenize } from "./NLPUtils";

const SynonymFileSchema = z.record(z.array(z.string()));

//keys and values are run through the tokenizer so they meet query tokens on equal terms
//a multi word value ("united states") contributes each of its tokens
export function buildSynonymTable(raw: Record<string, readonly string[]>, tokenizer: Tokenizer = tokenize) : SynonymTable
{
    const table = new Map<string, string[]>();

    for (const [key, values] of Object.entries(raw))
    {
        const expansions = values.flatMap(value => tokenizer(value));
        for (const canonical of tokenizer(key))
        {
            const existing = table.get(canonical) ?? [];
            table.set(canonical, Array.from(new Set([...existing, ...expansions])));
        }
    }

    return table;
}

export async function loadSynonymTable(path: string, tokenizer: Tokenizer = tokenize) : Promise<SynonymTable>
{
    let text: string;
    try {
        text = await readFile(path, "utf-8");
    } catch (error) {
        throw new SynonymTableError(`Unable to read synonym table: ${path}`, error);
    }

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        throw new SynonymTableError(`Synonym table is not valid JSON: ${path}`, error);
    }

    const result = SynonymFileSchema.safeParse(json);
    if (!result.success) throw new SynonymTableError(`Synonym table must map strings to string arrays: ${path}`, result.error);

    return buildSynonymTable(result.data, tokenizer);
}

export class QueryProcessor
{
    private readonly tokenizer: Tokenizer;
    private readonly synonyms: SynonymTable;

    constructor(synonyms: SynonymTable = new Map(), tokenizer: Tokenizer = tokenize)
    {
        this.synonyms = synonyms;
        this.tokenizer = tokenizer;
    }

    process(rawQuery: string) : Set<string>
    {
        const tokens = this.tokenizer(rawQuery);
        const normalized = this.normalize(tokens);
        return this.expandWithSynonyms(normalized);
    }

    //stopwords (and stems, when enabled) are already handled by the tokenizer
    normalize(tokens: string[]) : string[]
    {
        return tokens;
    }

    //one level deep, additive, follows the table direction only
    expandWithSynonyms(tokens: readonly string[]) : Set<string>
    {
        const expanded = new Set<string>(tokens);
        for (const token of tokens)
        {
            const synonyms = this.synonyms.get(token);
            if (!synonyms) continue;
            for (const synonym of synonyms) expanded.add(synonym);
        }
        return expanded;
    }
}
