import { SearchIndexes, TokenIndex } from "../ProductTypes";

function urlsOf(index: TokenIndex, token: string) : Iterable<string> | undefined
{
    const entry = index.get(token);
    //positional indexes map url -> positions, feature indexes hold the urls directly
    return entry === undefined ? undefined : entry.keys();
}

//documents containing at least one token in this index (OR)
export function filterAny(tokens: Iterable<string>, index: TokenIndex) : Set<string>
{
    const docs = new Set<string>();
    for (const token of tokens)
    {
        const urls = urlsOf(index, token);
        if (!urls) continue;
        for (const url of urls) docs.add(url);
    }
    return docs;
}

//documents containing every token in this index (AND), empty for an empty token set
export function filterAll(tokens: Iterable<string>, index: TokenIndex) : Set<string>
{
    let docs: Set<string> | undefined;

    for (const token of tokens)
    {
        const urls = urlsOf(index, token);
        if (!urls) return new Set<string>();

        if (docs === undefined) {
            docs = new Set(urls);
            continue;
        }
        const current = new Set(urls);
        for (const url of docs)
        {
            if (!current.has(url)) docs.delete(url);
        }
        if (docs.size === 0) return docs;
    }

    return docs ?? new Set<string>();
}

//OR across every index for recall, AND on the title for precision, union of both
export function filterDocuments(tokens: ReadonlySet<string>, indexes: SearchIndexes) : Set<string>
{
    const candidates = new Set<string>();
    if (tokens.size === 0) return candidates;

    const all_indexes: TokenIndex[] = [...indexes.fields.values(), ...indexes.features.values()];
    for (const index of all_indexes)
    {
        for (const url of filterAny(tokens, index)) candidates.add(url);
    }

    const title = indexes.fields.get("title");
    if (title) {
        for (const url of filterAll(tokens, title)) candidates.add(url);
    }

    return candidates;
}
