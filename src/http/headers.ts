interface HeaderField {
    name: string;
    values: string[];
}

/**
 * Ordered header multimap. Lookups ignore case; the casing of the last write
 * is what gets forwarded.
 */
export class HeaderMap {
    private readonly fields: HeaderField[] = [];

    static from(pairs: Iterable<readonly [string, string]>): HeaderMap {
        const headers = new HeaderMap();
        for (const [name, value] of pairs) {
            headers.append(name, value);
        }
        return headers;
    }

    get size(): number {
        return this.fields.length;
    }

    /** Replaces every value of `name`, keeping the field's position if it exists. */
    set(name: string, values: string | readonly string[]): this {
        const list = typeof values === "string" ? [values] : [...values];
        const field = this.find(name);
        if (field) {
            field.name = name;
            field.values = list;
        } else {
            this.fields.push({ name, values: list });
        }
        return this;
    }

    append(name: string, value: string): this {
        const field = this.find(name);
        if (field) {
            field.values.push(value);
        } else {
            this.fields.push({ name, values: [value] });
        }
        return this;
    }

    get(name: string): readonly string[] | undefined {
        return this.find(name)?.values;
    }

    first(name: string): string | undefined {
        return this.find(name)?.values[0];
    }

    has(name: string): boolean {
        return this.find(name) !== undefined;
    }

    delete(name: string): boolean {
        const lower = name.toLowerCase();
        const index = this.fields.findIndex((field) => field.name.toLowerCase() === lower);
        if (index === -1) return false;
        this.fields.splice(index, 1);
        return true;
    }

    *entries(): IterableIterator<[string, readonly string[]]> {
        for (const field of this.fields) {
            yield [field.name, field.values];
        }
    }

    /** One `[name, value]` pair per value, in order. */
    *pairs(): IterableIterator<[string, string]> {
        for (const field of this.fields) {
            for (const value of field.values) {
                yield [field.name, value];
            }
        }
    }

    private find(name: string): HeaderField | undefined {
        const lower = name.toLowerCase();
        return this.fields.find((field) => field.name.toLowerCase() === lower);
    }
}
