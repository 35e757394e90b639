//base error for everything the engine raises, code is stable for callers to switch on
export class SearchEngineError extends Error
{
    constructor(message: string, public readonly code: string, options?: { cause?: unknown })
    {
        super(message, options);
        this.name = "SearchEngineError";
    }
}

//the corpus file could not be opened or read, there is nothing to index
export class CorpusLoadError extends SearchEngineError
{
    constructor(path: string, cause?: unknown)
    {
        super(`Unable to read corpus file: ${path}`, "CORPUS_LOAD_FAILED", { cause });
        this.name = "CorpusLoadError";
    }
}

export class SynonymTableError extends SearchEngineError
{
    constructor(message: string, cause?: unknown)
    {
        super(message, "SYNONYM_TABLE_INVALID", { cause });
        this.name = "SynonymTableError";
    }
}

export class SnapshotError extends SearchEngineError
{
    constructor(message: string, public readonly file?: string, cause?: unknown)
    {
        super(message, "SNAPSHOT_INVALID", { cause });
        this.name = "SnapshotError";
    }
}

export class ConfigError extends SearchEngineError
{
    constructor(message: string, cause?: unknown)
    {
        super(message, "CONFIG_INVALID", { cause });
        this.name = "ConfigError";
    }
}
