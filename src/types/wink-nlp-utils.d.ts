//wink-nlp-utils ships no type declarations and has no @types package,
//only the helpers this project calls are declared
declare module "wink-nlp-utils" {
    interface WinkStringHelpers {
        lowerCase(str: string): string;
        removeExtraSpaces(str: string): string;
    }

    interface WinkTokenHelpers {
        stem(tokens: string[]): string[];
    }

    const nlp_utils: {
        string: WinkStringHelpers;
        tokens: WinkTokenHelpers;
    };

    export = nlp_utils;
}
