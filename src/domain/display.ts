/**
 * Sink a marker's formatter writes into.
 */
export class Formatter {
    private readonly chunks: string[] = [];

    write(...chunks: Array<string | number | bigint>): this {
        for (const chunk of chunks) {
            this.chunks.push(String(chunk));
        }
        return this;
    }

    toString(): string {
        return this.chunks.join('');
    }
}

/**
 * Formatting logic a marker supplies for the wrappers it tags.
 */
export interface DisplayerOf<W> {
    display(value: W, f: Formatter): void;
}

/**
 * Renders `value` through the marker's displayer instead of the
 * representation's own formatting. Holds the wrapper only as long as the
 * proxy itself is referenced; every `toString()` formats afresh.
 */
export class DisplayProxy<W extends object> {
    constructor(
        private readonly value: W,
        private readonly displayer?: DisplayerOf<W>
    ) {}

    toString(): string {
        if (!this.displayer) {
            return String(this.value);
        }
        const f = new Formatter();
        this.displayer.display(this.value, f);
        return f.toString();
    }
}
