import { readFileSync } from "fs";
import { join } from "path";
import { ProductDocument } from "../ProductTypes";
import { parseDocumentLines } from "../documents/DocumentStore";

export const PRODUCTS_FILE = join(__dirname, "products.jsonl");
export const SYNONYMS_FILE = join(__dirname, "synonyms.json");

export const WHITE_BEANIE = "https://shop.test/products/white-beanie";
export const RED_SCARF = "https://shop.test/products/red-scarf";
export const BLACK_GLOVES = "https://shop.test/products/black-gloves";

//three products, the fixture also holds two malformed lines, a blank line and a duplicate url
export function buildTestDocs() : ProductDocument[]
{
    const lines = readFileSync(PRODUCTS_FILE, "utf-8").split("\n");
    return parseDocumentLines(lines).documents;
}
