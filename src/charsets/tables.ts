import * as fs from "node:fs";

const DATA_DIR = new URL("../../data/", import.meta.url);

function isCodePointList(value: unknown): value is number[] {
    return (
        Array.isArray(value) &&
        value.every((v) => typeof v === "number" && Number.isInteger(v) && v >= 0)
    );
}

/**
 * Named lists of code points, one per category, as stored in
 * `data/<name>.json`.
 */
export class CodePointTable<K extends string> {
    private constructor(
        readonly label: string,
        private readonly lists: ReadonlyMap<K, readonly number[]>,
    ) {}

    /**
     * Parse a table and check that each of `categories` is present as a list
     * of code points. Extra keys are ignored.
     */
    static parse<K extends string>(
        source: string,
        categories: readonly K[],
        label = "table",
    ): CodePointTable<K> {
        const parsed: unknown = JSON.parse(source);
        if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
            throw new Error(`Malformed code point table ${label}: expected an object`);
        }

        const entries = new Map<string, unknown>(Object.entries(parsed));
        const lists = new Map<K, readonly number[]>();
        for (const category of categories) {
            const list = entries.get(category);
            if (!isCodePointList(list)) {
                throw new Error(
                    `Malformed code point table ${label}: "${category}" is not a list of code points`,
                );
            }
            lists.set(category, list);
        }
        return new CodePointTable(label, lists);
    }

    /** Read `data/<name>.json` from the package root. */
    static load<K extends string>(name: string, categories: readonly K[]): CodePointTable<K> {
        const source = fs.readFileSync(new URL(`${name}.json`, DATA_DIR), "utf-8");
        return CodePointTable.parse(source, categories, `${name}.json`);
    }

    get(category: K): readonly number[] {
        const list = this.lists.get(category);
        if (list === undefined) {
            throw new Error(`Unknown category "${category}" in ${this.label}`);
        }
        return list;
    }

    categories(): K[] {
        return [...this.lists.keys()];
    }
}
