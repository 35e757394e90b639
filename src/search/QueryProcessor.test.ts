import { join } from "path";
import { writeFile, mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { buildSynonymTable, loadSynonymTable, QueryProcessor } from "./QueryProcessor";
import { SynonymTableError } from "../Errors";
import { SYNONYMS_FILE } from "../test_data/TestData";

describe('QueryProcessor', () => {
    test('tokenize and collapse duplicates', () => {
        const processor = new QueryProcessor();
        expect(processor.process("White white BEANIE, the best")).toEqual(new Set(["white", "beanie", "best"]));
    });

    test('empty query', () => {
        expect(new QueryProcessor().process("  the ")).toEqual(new Set());
    });

    test('expand one way with tokenized synonyms', async () => {
        const processor = new QueryProcessor(await loadSynonymTable(SYNONYMS_FILE));
        expect(processor.process("beanie usa")).toEqual(new Set(["beanie", "usa", "united", "states", "america"]));
        //reverse lookups are not part of the table
        expect(processor.process("america")).toEqual(new Set(["america"]));
    });

    test('expansion is one level deep', () => {
        const processor = new QueryProcessor(buildSynonymTable({ cap: ["hat"], hat: ["beanie"] }));
        expect(processor.process("cap")).toEqual(new Set(["cap", "hat"]));
    });

    test('synonym lookup miss keeps the original tokens', () => {
        const processor = new QueryProcessor(buildSynonymTable({ usa: ["america"] }));
        expect(processor.process("scarf")).toEqual(new Set(["scarf"]));
    });

    test('merge keys that tokenize to the same token', () => {
        const table = buildSynonymTable({ "USA": ["america"], "usa!": ["states"] });
        expect(table.get("usa")).toEqual(["america", "states"]);
    });

    test('an invalid synonym table is fatal', async () => {
        const directory = await mkdtemp(join(tmpdir(), "synonyms-"));
        try {
            const broken = join(directory, "broken.json");
            await writeFile(broken, "{ usa: ", "utf-8");
            await expect(loadSynonymTable(broken)).rejects.toBeInstanceOf(SynonymTableError);

            const wrong_shape = join(directory, "wrong.json");
            await writeFile(wrong_shape, JSON.stringify({ usa: "america" }), "utf-8");
            await expect(loadSynonymTable(wrong_shape)).rejects.toBeInstanceOf(SynonymTableError);

            await expect(loadSynonymTable(join(directory, "missing.json"))).rejects.toBeInstanceOf(SynonymTableError);
        } finally {
            await rm(directory, { recursive: true, force: true });
        }
    });
});
