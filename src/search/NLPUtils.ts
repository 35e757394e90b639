/// <reference path="../types/wink-nlp-utils.d.ts" />
import nlp_utils from "wink-nlp-utils";
import stopword_list from "./stopwords.json";

//fixed list shared by indexing and querying, no locale dependence
export const STOPWORDS: ReadonlySet<string> = new Set(stopword_list);

//apostrophes are dropped in place so "don't" stays one token ("dont")
const APOSTROPHES = /['’]/g;
//every other punctuation or symbol character separates tokens
const SEPARATORS = /[\p{P}\p{S}]/gu;

export interface TokenizeOptions
{
    stem?: boolean,
    stopwords?: ReadonlySet<string>
}

//lowercase -> strip punctuation -> split on whitespace -> drop stopwords (-> stem)
//token order is preserved, positional indexes depend on it
export function tokenize(text: string, options: TokenizeOptions = {}) : string[]
{
    const stopwords = options.stopwords ?? STOPWORDS;

    const lowerCase = nlp_utils.string.lowerCase(text);
    const separated = lowerCase.replace(APOSTROPHES, "").replace(SEPARATORS, " ");
    const tokens = nlp_utils.string.removeExtraSpaces(separated)
        .split(" ")
        .filter(token => token.length > 0 && !stopwords.has(token));

    return options.stem ? nlp_utils.tokens.stem(tokens) : tokens;
}

//binds the options once so the builder and the query processor cannot drift apart
export type Tokenizer = (text: string) => string[];

export function createTokenizer(options: TokenizeOptions = {}) : Tokenizer
{
    return (text: string) => tokenize(text, options);
}
